import { SolrClient } from '../../../src/client';
import { Collection } from '../../../src/client/lib/collection';
import { DecodeError, ServerError, UsageError } from '../../../src/client/lib/errors';
import { createTestClient, envelope, FakeTransport, queryOf } from '../../utils/fake-transport';

describe('CollectionsBuilder', () => {
  let client: SolrClient;
  let transport: FakeTransport;

  beforeEach(() => {
    ({ client, transport } = createTestClient());
  });

  it('should create a collection with only the parameters that were set', async () => {
    transport.ok({ success: { 'solr1:8983_solr': { responseHeader: { status: 0, QTime: 900 } } } });

    const users = await client.collections().name('users').numShards(16).maxShardsPerNode(16).commit();

    expect(transport.requests).toHaveLength(1);
    expect(transport.lastRequest.method).toBe('POST');
    expect(transport.lastRequest.url).toBe(
      'http://localhost:8983/solr/admin/collections?action=CREATE&name=users&numShards=16&maxShardsPerNode=16&wt=json',
    );
    expect(users).toBeInstanceOf(Collection);
    expect(users.name).toBe('users');
  });

  it('should send every supported parameter in a fixed order', () => {
    const params = client
      .collections('orders')
      .param('waitForFinalState', true)
      .property('dataDir', '/var/solr/orders')
      .createNodeSet(['node1:8983_solr', 'node2:8983_solr'])
      .configName('_default')
      .shards(['a', 'b'])
      .pullReplicas(0)
      .tlogReplicas(1)
      .nrtReplicas(1)
      .replicationFactor(2)
      .maxShardsPerNode(4)
      .numShards(2)
      .routerField('customer_id')
      .routerName('implicit')
      .buildParams();

    expect([...params.keys()]).toEqual([
      'action',
      'name',
      'router.name',
      'router.field',
      'numShards',
      'maxShardsPerNode',
      'replicationFactor',
      'nrtReplicas',
      'tlogReplicas',
      'pullReplicas',
      'shards',
      'collection.configName',
      'createNodeSet',
      'property.dataDir',
      'waitForFinalState',
      'wt',
    ]);
    expect(params.get('shards')).toBe('a,b');
    expect(params.get('createNodeSet')).toBe('node1:8983_solr,node2:8983_solr');
    expect(params.get('pullReplicas')).toBe('0');
  });

  it('should encode the router field', () => {
    const params = client.collections('users').routerField('id').buildParams();

    expect(params.toString()).toBe('action=CREATE&name=users&router.field=id&wt=json');
  });

  it('should require a name before any request is made', async () => {
    await expect(client.collections().numShards(1).commit()).rejects.toThrow(
      'A collection name is required',
    );
    expect(transport.requests).toHaveLength(0);
  });

  it('should not let managed parameters be overridden', () => {
    expect(() => client.collections('users').param('action', 'DELETE')).toThrow(UsageError);
  });

  it('should surface the server error when the collection exists', async () => {
    transport.reply(envelope({ error: { msg: 'collection already exists: users', code: 400 } }, 400), 400);

    await expect(client.collections('users').commit()).rejects.toMatchObject({
      name: 'ServerError',
      message: 'collection already exists: users',
      code: 400,
    });
  });

  it('should fail when some nodes could not create their replicas', async () => {
    transport.ok({
      failure: {
        'solr2:8983_solr': 'org.apache.solr.client.solrj.SolrServerException:Disk full',
      },
    });

    const error = await client
      .collections('users')
      .numShards(2)
      .commit()
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServerError);
    expect(error).toMatchObject({
      message:
        'Failed to create collection users: solr2:8983_solr: org.apache.solr.client.solrj.SolrServerException:Disk full',
      code: 500,
    });
  });

  it('should be single use', async () => {
    transport.ok();
    const builder = client.collections('users');

    await builder.commit();

    await expect(builder.commit()).rejects.toThrow(UsageError);
    expect(() => builder.numShards(2)).toThrow('CollectionsBuilder has already been committed');
    expect(transport.requests).toHaveLength(1);
  });
});

describe('SolrClient admin operations', () => {
  let client: SolrClient;
  let transport: FakeTransport;

  beforeEach(() => {
    ({ client, transport } = createTestClient());
  });

  it('should reference an existing collection without a request', () => {
    const users = client.collection('users');

    expect(users.name).toBe('users');
    expect(transport.requests).toHaveLength(0);
    expect(() => client.collection('')).toThrow(UsageError);
  });

  it('should list collections', async () => {
    transport.ok({ collections: ['users', 'orders'] });

    const collections = await client.listCollections();

    expect(collections.map(collection => collection.name)).toEqual(['users', 'orders']);
    expect(transport.lastRequest.method).toBe('GET');
    expect(queryOf(transport.lastRequest)).toBe('action=LIST&wt=json');
  });

  it('should reject a LIST response without collections', async () => {
    transport.ok({ cluster: {} });

    await expect(client.listCollections()).rejects.toThrow(DecodeError);
  });

  it('should find a collection by name', async () => {
    transport.ok({ collections: ['users', 'orders'] });

    const orders = await client.getCollection('orders');

    expect(orders.name).toBe('orders');
  });

  it('should report a missing collection', async () => {
    transport.ok({ collections: ['users'] });

    await expect(client.getCollection('ghost')).rejects.toMatchObject({
      name: 'ServerError',
      message: 'Collection ghost does not exist',
      code: 404,
    });
  });

  it('should delete a collection', async () => {
    transport.ok({ success: {} });

    await client.deleteCollection('users');

    expect(transport.lastRequest.method).toBe('POST');
    expect(queryOf(transport.lastRequest)).toBe('action=DELETE&name=users&wt=json');
  });

  it('should fetch system information', async () => {
    transport.ok({ mode: 'solrcloud', lucene: { 'solr-spec-version': '9.4.0' } });

    await expect(client.systemInfo()).resolves.toEqual({
      mode: 'solrcloud',
      lucene: { 'solr-spec-version': '9.4.0' },
    });
    expect(transport.lastRequest.url).toBe('http://localhost:8983/solr/admin/info/system?wt=json');
  });

  it('should fetch the schema of a collection', async () => {
    transport.ok({ schema: { name: 'default-config', fields: [{ name: 'id', type: 'string' }] } });

    const schema = await client.collection('users').getSchema();

    expect(schema).toEqual({ name: 'default-config', fields: [{ name: 'id', type: 'string' }] });
    expect(transport.lastRequest.url).toBe('http://localhost:8983/solr/users/schema?wt=json');
  });

  it('should give each builder its own state', () => {
    const users = client.collection('users');

    const first = users.search().query('a:1');
    const second = users.search().query('b:2');

    expect(first).not.toBe(second);
    expect(first.buildParams().get('q')).toBe('a:1');
    expect(second.buildParams().get('q')).toBe('b:2');
  });
});
