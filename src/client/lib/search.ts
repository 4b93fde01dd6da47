import { CommitBuilder } from './builder';
import { readHeader, ResponseHeader, SolrHttpClient, SolrRequest } from './client';
import { SolrDocument } from './document';
import { DecodeError, UsageError } from './errors';
import { isJsonArray, isJsonObject, JsonObject } from './json';

/**
 * Decoded result set of a select request
 */
export interface SearchResult {
  numFound: number;
  start: number;
  numFoundExact?: boolean;
  maxScore?: number;
  docs: SolrDocument[];
  facetCounts?: JsonObject;
  highlighting?: JsonObject;
  debug?: JsonObject;
  /** Absent when the query was sent with `omitHeader` */
  responseHeader?: ResponseHeader;
}

/**
 * Builds a select request against one collection.
 *
 * Parameters are sent in the order they were first set, followed by `wt=json`.
 * The query string is passed through untouched apart from form encoding.
 *
 * @example
 * ```typescript
 * const { docs, numFound } = await users
 *   .search()
 *   .query('age:[18 TO *]')
 *   .fl('name,age')
 *   .sort('name asc')
 *   .rows(10)
 *   .commit();
 * ```
 */
export class SearchBuilder extends CommitBuilder<SearchResult> {
  private readonly params: Array<[string, string]> = [];

  constructor(http: SolrHttpClient, private readonly collection: string) {
    super(http, SearchBuilder.name);
  }

  /** Main query, `q` */
  query(q: string): this {
    return this.set('q', q);
  }

  /** Field list, `fl` */
  fl(fields: string | string[]): this {
    return this.set('fl', Array.isArray(fields) ? fields.join(',') : fields);
  }

  sort(spec: string): this {
    return this.set('sort', spec);
  }

  rows(rows: number): this {
    return this.set('rows', nonNegative('rows', rows));
  }

  start(start: number): this {
    return this.set('start', nonNegative('start', start));
  }

  defType(parser: string): this {
    return this.set('defType', parser);
  }

  /** Filter query, `fq`; may be called repeatedly */
  filterQuery(fq: string): this {
    return this.append('fq', fq);
  }

  debug(debug: 'query' | 'timing' | 'results' | 'all' | 'true'): this {
    return this.set('debug', debug);
  }

  explainOther(query: string): this {
    return this.set('explainOther', query);
  }

  timeAllowed(ms: number): this {
    return this.set('timeAllowed', nonNegative('timeAllowed', ms));
  }

  segmentTerminateEarly(enabled: boolean): this {
    return this.set('segmentTerminateEarly', String(enabled));
  }

  omitHeader(omit: boolean): this {
    return this.set('omitHeader', String(omit));
  }

  cache(enabled: boolean): this {
    return this.set('cache', String(enabled));
  }

  logParamsList(names: string | string[]): this {
    return this.set('logParamsList', Array.isArray(names) ? names.join(',') : names);
  }

  echoParams(mode: 'explicit' | 'all' | 'none'): this {
    return this.set('echoParams', mode);
  }

  /** Turn faceting on */
  facet(enabled = true): this {
    return this.set('facet', String(enabled));
  }

  /** Facet on a field; enables faceting */
  facetField(field: string): this {
    return this.facet().append('facet.field', field);
  }

  /** Facet on an arbitrary query; enables faceting */
  facetQuery(query: string): this {
    return this.facet().append('facet.query', query);
  }

  facetLimit(limit: number): this {
    return this.set('facet.limit', String(limit));
  }

  facetMinCount(count: number): this {
    return this.set('facet.mincount', nonNegative('facet.mincount', count));
  }

  /**
   * Any other request parameter. Repeated keys are sent repeatedly.
   */
  param(key: string, value: string | number | boolean): this {
    if (!key) {
      throw new UsageError('Parameter name must not be empty');
    }
    if (key === 'wt') {
      throw new UsageError('The response writer is fixed to json');
    }
    return this.append(key, String(value));
  }

  /**
   * Parameters as they will be sent
   */
  buildParams(): URLSearchParams {
    const params = new URLSearchParams();
    for (const [key, value] of this.params) {
      params.append(key, value);
    }
    params.append('wt', 'json');
    return params;
  }

  protected async execute(): Promise<SearchResult> {
    if (!this.params.some(([key]) => key === 'q')) {
      throw new UsageError('A query must be set before committing a search');
    }

    const envelope = await this.http.executeRaw(this.buildRequest());
    return decodeSearchResult(envelope);
  }

  private buildRequest(): SolrRequest {
    const path = `${encodeURIComponent(this.collection)}/select`;
    const params = this.buildParams();

    if (this.http.url(path, params).length <= this.http.maxUrlLength) {
      return { method: 'GET', path, params };
    }

    this.logger.debug?.(`Query for ${this.collection} exceeds ${this.http.maxUrlLength} characters, sending as form`);
    return {
      method: 'POST',
      path,
      body: params.toString(),
      contentType: 'application/x-www-form-urlencoded',
    };
  }

  private set(key: string, value: string): this {
    this.ensureOpen();
    const index = this.params.findIndex(([name]) => name === key);
    if (index < 0) {
      this.params.push([key, value]);
    } else {
      this.params[index] = [key, value];
    }
    return this;
  }

  private append(key: string, value: string): this {
    this.ensureOpen();
    this.params.push([key, value]);
    return this;
  }
}

function nonNegative(name: string, value: number): string {
  if (!Number.isInteger(value) || value < 0) {
    throw new UsageError(`${name} must be a non-negative integer, got ${value}`);
  }
  return String(value);
}

/**
 * Decode the envelope of a select response
 */
export function decodeSearchResult(envelope: JsonObject): SearchResult {
  const response = envelope.response;
  if (!isJsonObject(response)) {
    throw new DecodeError('Search response has no "response" section');
  }

  const { numFound, start, numFoundExact, maxScore, docs } = response;
  if (typeof numFound !== 'number' || !isJsonArray(docs)) {
    throw new DecodeError('Search response lacks "numFound" or "docs"');
  }

  const documents: SolrDocument[] = [];
  for (const doc of docs) {
    if (!isJsonObject(doc)) {
      throw new DecodeError('Search response contains a document that is not an object');
    }
    documents.push(doc);
  }

  const header = readHeader(envelope);
  const facetCounts = envelope.facet_counts;
  const highlighting = envelope.highlighting;
  const debug = envelope.debug;

  return {
    numFound,
    start: typeof start === 'number' ? start : 0,
    ...(typeof numFoundExact === 'boolean' && { numFoundExact }),
    ...(typeof maxScore === 'number' && { maxScore }),
    docs: documents,
    ...(isJsonObject(facetCounts) && { facetCounts }),
    ...(isJsonObject(highlighting) && { highlighting }),
    ...(isJsonObject(debug) && { debug }),
    ...(header && { responseHeader: header }),
  };
}
