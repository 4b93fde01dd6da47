import { LoggerService } from '@nestjs/common';
import { SolrClientOptions, SolrHttpClient } from './lib/client';
import { Collection } from './lib/collection';
import { CollectionsBuilder } from './lib/collections';
import { DecodeError, ServerError } from './lib/errors';
import { isJsonArray, JsonObject } from './lib/json';

const ADMIN_COLLECTIONS = 'admin/collections';

/**
 * Entry point of the Solr client.
 *
 * Holds the connection details and hands out builders; it performs no I/O until a
 * builder is committed or one of the admin calls below is made.
 *
 * @example
 * ```typescript
 * const solr = SolrClient.client('http', 'localhost', 8983);
 *
 * const users = await solr.collections('users').numShards(2).commit();
 * await users.schema().addField(FieldBuilder.string('name')).commit();
 * await users.add({ id: '1', name: 'Some' }).commit();
 * const { docs } = await users.search().query('name:Some').commit();
 * ```
 */
export class SolrClient {
  /**
   * Commit executor shared by every builder
   */
  readonly http: SolrHttpClient;

  private readonly logger: LoggerService;

  /**
   * Create a new Solr client
   * @param options Client configuration options
   */
  constructor(options: SolrClientOptions) {
    this.http = new SolrHttpClient(options);
    this.logger = this.http.loggerFor(SolrClient.name);
  }

  /**
   * Shorthand for a client with default options
   */
  static client(scheme: 'http' | 'https', host: string, port: number): SolrClient {
    return new SolrClient({ scheme, host, port });
  }

  get scheme(): 'http' | 'https' {
    return this.http.scheme;
  }

  get host(): string {
    return this.http.host;
  }

  get port(): number {
    return this.http.port;
  }

  /**
   * Builder for a new collection
   * @param name Collection name; may also be set on the builder
   */
  collections(name?: string): CollectionsBuilder {
    return new CollectionsBuilder(this.http, name);
  }

  /**
   * Handle on a collection that already exists. No request is made.
   */
  collection(name: string): Collection {
    return new Collection(this.http, name);
  }

  /**
   * List every collection of the cluster
   */
  async listCollections(): Promise<Collection[]> {
    const result = await this.http.execute({
      method: 'GET',
      path: ADMIN_COLLECTIONS,
      params: new URLSearchParams({ action: 'LIST', wt: 'json' }),
    });

    const names = result.collections;
    if (!isJsonArray(names)) {
      throw new DecodeError('LIST response has no "collections" array');
    }
    return names.map(name => {
      if (typeof name !== 'string') {
        throw new DecodeError('LIST response contains a collection name that is not a string');
      }
      return this.collection(name);
    });
  }

  /**
   * Handle on an existing collection, verified against the cluster
   */
  async getCollection(name: string): Promise<Collection> {
    const collections = await this.listCollections();
    const found = collections.find(collection => collection.name === name);
    if (!found) {
      throw new ServerError(`Collection ${name} does not exist`, 404, 200);
    }
    return found;
  }

  /**
   * Delete a collection and all of its data
   */
  async deleteCollection(name: string): Promise<void> {
    await this.http.execute({
      method: 'POST',
      path: ADMIN_COLLECTIONS,
      params: new URLSearchParams({ action: 'DELETE', name, wt: 'json' }),
    });
    this.logger.log(`Deleted collection ${name}`);
  }

  /**
   * Node information: versions, JVM and system details
   */
  async systemInfo(): Promise<JsonObject> {
    return this.http.execute({
      method: 'GET',
      path: 'admin/info/system',
      params: new URLSearchParams({ wt: 'json' }),
    });
  }
}

export { SolrHttpClient, SolrClientOptions, SolrRequest, ResponseHeader } from './lib/client';
export { AxiosTransport, AxiosTransportOptions, Transport, TransportRequest, TransportResponse, HttpMethod } from './lib/transport';
export { CommitBuilder } from './lib/builder';

export * from './lib/errors';
export * from './lib/json';
export * from './lib/field';
export * from './lib/collection';
export * from './lib/collections';
export * from './lib/schema';
export * from './lib/document';
export * from './lib/search';
