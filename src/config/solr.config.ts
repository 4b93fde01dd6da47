import { registerAs } from '@nestjs/config';

export type SolrConfig = {
  scheme: 'http' | 'https';
  host: string;
  port: number;
  basePath: string;
  timeout: number;
  maxUrlLength: number;
  username?: string;
  password?: string;
};

export default registerAs(
  'solr',
  (): SolrConfig => ({
    // Connection
    scheme: process.env.SOLR_SCHEME === 'https' ? 'https' : 'http',
    host: process.env.SOLR_HOST || 'localhost',
    port: parseInt(process.env.SOLR_PORT ?? '', 10) || 8983,
    basePath: process.env.SOLR_BASE_PATH || 'solr',

    // Requests
    timeout: parseInt(process.env.SOLR_TIMEOUT ?? '', 10) || 10000, // 10 seconds
    maxUrlLength: parseInt(process.env.SOLR_MAX_URL_LENGTH ?? '', 10) || 4096,

    // Basic authentication, only used when both are set
    username: process.env.SOLR_USERNAME || undefined,
    password: process.env.SOLR_PASSWORD || undefined,
  }),
);
