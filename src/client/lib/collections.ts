import { CommitBuilder } from './builder';
import { SolrHttpClient } from './client';
import { ServerError, UsageError } from './errors';
import { isJsonObject } from './json';
import { Collection } from './collection';

const ADMIN_PATH = 'admin/collections';

/**
 * Builds a Collections API CREATE request.
 *
 * Only parameters that were set are sent. See
 * https://solr.apache.org/guide/solr/latest/deployment-guide/collection-management.html#create
 *
 * @example
 * ```typescript
 * const users = await solr
 *   .collections('users')
 *   .routerField('id')
 *   .numShards(16)
 *   .maxShardsPerNode(16)
 *   .commit();
 * ```
 */
export class CollectionsBuilder extends CommitBuilder<Collection> {
  private collectionName?: string;
  private routerNameValue?: string;
  private routerFieldValue?: string;
  private numShardsValue?: number;
  private maxShardsPerNodeValue?: number;
  private replicationFactorValue?: number;
  private nrtReplicasValue?: number;
  private tlogReplicasValue?: number;
  private pullReplicasValue?: number;
  private shardNames?: string[];
  private configNameValue?: string;
  private createNodeSetValue?: string[];
  private readonly properties: Array<[string, string]> = [];
  private readonly extra: Array<[string, string]> = [];

  constructor(http: SolrHttpClient, name?: string) {
    super(http, CollectionsBuilder.name);
    this.collectionName = name;
  }

  name(name: string): this {
    this.ensureOpen();
    this.collectionName = name;
    return this;
  }

  /** Router implementation, `compositeId` or `implicit` */
  routerName(routerName: 'compositeId' | 'implicit'): this {
    this.ensureOpen();
    this.routerNameValue = routerName;
    return this;
  }

  /** Field whose value is hashed to pick a shard */
  routerField(field: string): this {
    this.ensureOpen();
    this.routerFieldValue = field;
    return this;
  }

  numShards(count: number): this {
    this.ensureOpen();
    this.numShardsValue = count;
    return this;
  }

  maxShardsPerNode(count: number): this {
    this.ensureOpen();
    this.maxShardsPerNodeValue = count;
    return this;
  }

  replicationFactor(count: number): this {
    this.ensureOpen();
    this.replicationFactorValue = count;
    return this;
  }

  nrtReplicas(count: number): this {
    this.ensureOpen();
    this.nrtReplicasValue = count;
    return this;
  }

  tlogReplicas(count: number): this {
    this.ensureOpen();
    this.tlogReplicasValue = count;
    return this;
  }

  pullReplicas(count: number): this {
    this.ensureOpen();
    this.pullReplicasValue = count;
    return this;
  }

  /** Shard names, for the implicit router */
  shards(names: string[]): this {
    this.ensureOpen();
    this.shardNames = [...names];
    return this;
  }

  /** Configset the collection is created from */
  configName(configName: string): this {
    this.ensureOpen();
    this.configNameValue = configName;
    return this;
  }

  createNodeSet(nodes: string[]): this {
    this.ensureOpen();
    this.createNodeSetValue = [...nodes];
    return this;
  }

  /** Core property, sent as `property.<key>` */
  property(key: string, value: string): this {
    this.ensureOpen();
    this.properties.push([`property.${key}`, value]);
    return this;
  }

  /** Any other CREATE parameter */
  param(key: string, value: string | number | boolean): this {
    this.ensureOpen();
    if (key === 'action' || key === 'name' || key === 'wt') {
      throw new UsageError(`Parameter "${key}" is managed by the builder`);
    }
    this.extra.push([key, String(value)]);
    return this;
  }

  /**
   * Query string parameters of the CREATE request
   */
  buildParams(): URLSearchParams {
    if (!this.collectionName) {
      throw new UsageError('A collection name is required');
    }

    const params = new URLSearchParams({ action: 'CREATE', name: this.collectionName });
    const optional: Array<[string, string | number | undefined]> = [
      ['router.name', this.routerNameValue],
      ['router.field', this.routerFieldValue],
      ['numShards', this.numShardsValue],
      ['maxShardsPerNode', this.maxShardsPerNodeValue],
      ['replicationFactor', this.replicationFactorValue],
      ['nrtReplicas', this.nrtReplicasValue],
      ['tlogReplicas', this.tlogReplicasValue],
      ['pullReplicas', this.pullReplicasValue],
      ['shards', this.shardNames?.join(',')],
      ['collection.configName', this.configNameValue],
      ['createNodeSet', this.createNodeSetValue?.join(',')],
    ];
    for (const [key, value] of optional) {
      if (value !== undefined) {
        params.append(key, String(value));
      }
    }
    for (const [key, value] of [...this.properties, ...this.extra]) {
      params.append(key, value);
    }
    params.append('wt', 'json');
    return params;
  }

  protected async execute(): Promise<Collection> {
    const params = this.buildParams();
    const name = params.get('name') ?? '';

    const result = await this.http.execute({ method: 'POST', path: ADMIN_PATH, params });

    // Nodes that could not create their replicas are reported beside a zero status
    if (isJsonObject(result.failure)) {
      const reasons = Object.entries(result.failure).map(
        ([node, reason]) => `${node}: ${typeof reason === 'string' ? reason : JSON.stringify(reason)}`,
      );
      this.logger.warn(`Collection ${name} was not fully created`);
      throw new ServerError(
        `Failed to create collection ${name}: ${reasons.join('; ')}`,
        500,
        200,
        result.failure,
      );
    }

    this.logger.log(`Created collection ${name}`);
    return new Collection(this.http, name);
  }
}
