import 'reflect-metadata';
import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { SolrClient } from '../client';
import { SolrClientOptions } from '../client/lib/client';
import solrConfig, { SolrConfig } from '../config/solr.config';

export function toClientOptions(config: SolrConfig): SolrClientOptions {
  const { scheme, host, port, basePath, timeout, maxUrlLength, username, password } = config;
  return {
    scheme,
    host,
    port,
    basePath,
    timeout,
    maxUrlLength,
    ...(username && password ? { auth: { username, password } } : {}),
  };
}

/**
 * Makes a SolrClient injectable across the application
 */
@Module({})
export class SolrModule {
  static forRoot(options: SolrClientOptions): DynamicModule {
    return {
      module: SolrModule,
      global: true,
      providers: [{ provide: SolrClient, useValue: new SolrClient(options) }],
      exports: [SolrClient],
    };
  }

  /**
   * Build the client from the `solr` configuration namespace
   */
  static forRootAsync(): DynamicModule {
    return {
      module: SolrModule,
      global: true,
      imports: [ConfigModule.forFeature(solrConfig)],
      providers: [
        {
          provide: SolrClient,
          useFactory: (config: ConfigType<typeof solrConfig>) =>
            new SolrClient(toClientOptions(config)),
          inject: [solrConfig.KEY],
        },
      ],
      exports: [SolrClient],
    };
  }
}
