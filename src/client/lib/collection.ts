import { SolrHttpClient } from './client';
import { DocumentsBuilder, SolrDocument } from './document';
import { DecodeError, UsageError } from './errors';
import { isJsonObject, JsonArray, JsonObject } from './json';
import { SchemaBuilder } from './schema';
import { SearchBuilder } from './search';

/**
 * Handle on an existing collection.
 *
 * The handle itself never changes; each call below returns a new single-use builder.
 */
export class Collection {
  constructor(private readonly http: SolrHttpClient, readonly name: string) {
    if (!name) {
      throw new UsageError('Collection name must not be empty');
    }
  }

  /**
   * Builder for schema changes
   */
  schema(): SchemaBuilder {
    return new SchemaBuilder(this.http, this.name);
  }

  /**
   * Builder for document additions and deletions
   */
  documents(): DocumentsBuilder {
    return new DocumentsBuilder(this.http, this.name);
  }

  /**
   * Start a documents builder with an initial payload
   * @param payload A document object, or an array of document objects
   */
  add(payload: SolrDocument | JsonArray): DocumentsBuilder {
    return this.documents().add(payload);
  }

  /**
   * Builder for a select request
   */
  search(): SearchBuilder {
    return new SearchBuilder(this.http, this.name);
  }

  /**
   * Retrieve the collection's current schema
   */
  async getSchema(): Promise<JsonObject> {
    const result = await this.http.execute({
      method: 'GET',
      path: `${encodeURIComponent(this.name)}/schema`,
      params: new URLSearchParams({ wt: 'json' }),
    });
    if (!isJsonObject(result.schema)) {
      throw new DecodeError(`Schema response for ${this.name} has no "schema" section`);
    }
    return result.schema;
  }
}
