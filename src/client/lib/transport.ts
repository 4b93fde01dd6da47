import axios, { AxiosInstance } from 'axios';
import { TransportError } from './errors';

export type HttpMethod = 'GET' | 'POST';

/**
 * A single HTTP exchange as seen by the transport
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface TransportResponse {
  status: number;
  body: string;
}

/**
 * Sends one request and hands back the raw response.
 *
 * Implementations must resolve for every response the server sends, whatever its status,
 * and reject with a TransportError only when no response was received.
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * Transport options
 */
export interface AxiosTransportOptions {
  timeout?: number;
  headers?: Record<string, string>;
}

/**
 * Default transport backed by an axios instance
 */
export class AxiosTransport implements Transport {
  private client: AxiosInstance;

  /**
   * Create a new axios transport
   * @param options Transport configuration options
   */
  constructor(options: AxiosTransportOptions = {}) {
    const { timeout = 10000, headers = {} } = options;

    this.client = axios.create({
      timeout,
      headers,
      // Solr reports failures inside the body, so every status is handed back
      validateStatus: () => true,
      responseType: 'text',
      transformResponse: [data => data],
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    try {
      const response = await this.client.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
      });
      return {
        status: response.status,
        body: typeof response.data === 'string' ? response.data : '',
      };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new TransportError(
          error.message || 'No response received from server',
          error.code,
          error,
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(message, undefined, error);
    }
  }
}
