import { Logger, LoggerService } from '@nestjs/common';
import { DecodeError, ServerError, TransportError, UsageError } from './errors';
import { isJsonObject, JsonObject, JsonValue, parseJson } from './json';
import { AxiosTransport, HttpMethod, Transport, TransportResponse } from './transport';

/**
 * Solr client configuration options
 */
export interface SolrClientOptions {
  host: string;
  scheme?: 'http' | 'https';
  port?: number;
  /** Path prefix of every endpoint, `solr` on a stock install */
  basePath?: string;
  timeout?: number;
  auth?: {
    username: string;
    password: string;
  };
  headers?: Record<string, string>;
  /** Select requests whose URL would exceed this length are sent as a form POST */
  maxUrlLength?: number;
  transport?: Transport;
  logger?: LoggerService;
}

/**
 * Request assembled by a builder, relative to the base path
 */
export interface SolrRequest {
  method: HttpMethod;
  path: string;
  params?: URLSearchParams;
  body?: string;
  contentType?: string;
}

/**
 * The header Solr puts in front of every JSON response
 */
export interface ResponseHeader {
  status: number;
  QTime?: number;
  params?: JsonObject;
}

const DEFAULT_PORT = 8983;
const DEFAULT_MAX_URL_LENGTH = 4096;

/**
 * Executes assembled requests against Solr and interprets the response envelope.
 *
 * Every builder's commit goes through `execute`, which sends exactly one request.
 */
export class SolrHttpClient {
  readonly scheme: 'http' | 'https';
  readonly host: string;
  readonly port: number;
  readonly basePath: string;
  readonly maxUrlLength: number;

  private readonly transport: Transport;
  private readonly headers: Record<string, string>;
  private readonly customLogger?: LoggerService;
  private readonly logger: LoggerService;

  constructor(options: SolrClientOptions) {
    const {
      scheme = 'http',
      host,
      port = DEFAULT_PORT,
      basePath = 'solr',
      timeout = 10000,
      auth,
      headers = {},
      maxUrlLength = DEFAULT_MAX_URL_LENGTH,
      transport,
      logger,
    } = options;

    if (scheme !== 'http' && scheme !== 'https') {
      throw new UsageError(`Unsupported scheme "${String(scheme)}"`);
    }
    if (!host || !host.trim()) {
      throw new UsageError('Solr host must not be empty');
    }
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new UsageError(`Invalid Solr port ${port}`);
    }

    this.scheme = scheme;
    this.host = host;
    this.port = port;
    this.basePath = basePath.replace(/^\/+|\/+$/g, '');
    this.maxUrlLength = maxUrlLength;
    this.headers = {
      Accept: 'application/json',
      ...(auth && {
        Authorization: `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString('base64')}`,
      }),
      ...headers,
    };
    this.transport = transport ?? new AxiosTransport({ timeout });
    this.customLogger = logger;
    this.logger = this.loggerFor(SolrHttpClient.name);
  }

  /**
   * Logger for a component: the one configured on the client, or a Nest logger
   * named after the component
   */
  loggerFor(context: string): LoggerService {
    return this.customLogger ?? new Logger(context);
  }

  /**
   * Absolute URL of an endpoint
   * @param path Path relative to the base path, e.g. `users/select`
   * @param params Query string parameters
   */
  url(path: string, params?: URLSearchParams): string {
    const prefix = this.basePath ? `/${this.basePath}` : '';
    const query = params && params.toString();
    return `${this.scheme}://${this.host}:${this.port}${prefix}/${path}${query ? `?${query}` : ''}`;
  }

  /**
   * Send a request and return the response body without its `responseHeader`
   */
  async execute(request: SolrRequest): Promise<JsonObject> {
    return stripHeader(await this.executeRaw(request));
  }

  /**
   * Send a request and return the whole response envelope
   */
  async executeRaw(request: SolrRequest): Promise<JsonObject> {
    const url = this.url(request.path, request.params);
    const headers = { ...this.headers };
    if (request.body !== undefined) {
      headers['Content-Type'] = request.contentType ?? 'application/json';
    }

    this.logger.debug?.(`${request.method} ${url}`);

    let response: TransportResponse;
    try {
      response = await this.transport.send({
        method: request.method,
        url,
        headers,
        body: request.body,
      });
    } catch (error) {
      const transportError =
        error instanceof TransportError
          ? error
          : new TransportError(error instanceof Error ? error.message : String(error), undefined, error);
      this.logger.error(`${request.method} ${url} failed: ${transportError.message}`);
      throw transportError;
    }

    return this.interpret(response, request.method, url);
  }

  private interpret(response: TransportResponse, method: HttpMethod, url: string): JsonObject {
    const { status, body } = response;

    if (!body.trim()) {
      throw new DecodeError(`Empty response body (HTTP ${status})`, body);
    }

    let parsed: JsonValue;
    try {
      parsed = parseJson(body);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DecodeError(`Response is not valid JSON (HTTP ${status}): ${reason}`, body);
    }

    if (!isJsonObject(parsed)) {
      throw new DecodeError(`Response is not a JSON object (HTTP ${status})`, body);
    }

    const header = readHeader(parsed);
    const headerStatus = header?.status ?? 0;
    const error = parsed.error;

    if (error !== undefined || headerStatus !== 0 || status >= 400) {
      const serverError = toServerError(error, headerStatus, status);
      this.logger.warn(`${method} ${url} rejected (${serverError.code}): ${serverError.message}`);
      throw serverError;
    }

    return parsed;
  }
}

/**
 * Copy of an envelope without its `responseHeader`
 */
export function stripHeader(envelope: JsonObject): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(envelope)) {
    if (key !== 'responseHeader') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Read the `responseHeader` of an envelope, if present and well formed
 */
export function readHeader(envelope: JsonObject): ResponseHeader | undefined {
  const header = envelope.responseHeader;
  if (!isJsonObject(header) || typeof header.status !== 'number') {
    return undefined;
  }
  return {
    status: header.status,
    ...(typeof header.QTime === 'number' && { QTime: header.QTime }),
    ...(isJsonObject(header.params) && { params: header.params }),
  };
}

function toServerError(
  error: JsonValue | undefined,
  headerStatus: number,
  httpStatus: number,
): ServerError {
  const fallbackCode = headerStatus !== 0 ? headerStatus : httpStatus;

  if (isJsonObject(error)) {
    const code = typeof error.code === 'number' ? error.code : fallbackCode;
    const message =
      typeof error.msg === 'string' ? error.msg : `Solr request failed with code ${code}`;
    return new ServerError(message, code, httpStatus, error.details);
  }

  if (typeof error === 'string') {
    return new ServerError(error, fallbackCode, httpStatus);
  }

  return new ServerError(`Solr request failed with code ${fallbackCode}`, fallbackCode, httpStatus);
}
