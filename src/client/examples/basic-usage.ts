import { config } from 'dotenv';
import { FieldBuilder, isSolrError, SolrClient } from '../index';
import { toClientOptions } from '../../solr/solr.module';
import solrConfig from '../../config/solr.config';

/**
 * Example of basic Solr client usage
 */
async function main() {
  // Pick up SOLR_* variables from a local .env file
  config();

  const client = new SolrClient(toClientOptions(solrConfig()));

  try {
    // Create a new collection
    const users = await client
      .collections('users')
      .routerField('id')
      .numShards(2)
      .replicationFactor(1)
      .commit();

    console.log('Collection created:', users.name);

    // Declare its fields
    const schema = await users
      .schema()
      .addField(FieldBuilder.string('name'))
      .addField(FieldBuilder.int('age'))
      .addField(FieldBuilder.multiString('tags'))
      .addField(FieldBuilder.fulltext('bio').stored(false))
      .commit();

    console.log('Schema updated:', schema.operations.length, 'operations');

    // Index some documents
    await users
      .add({ id: '1', name: 'Some', age: 19, tags: ['new'] })
      .add([
        { id: '2', name: 'Dude', age: 21, tags: ['admin', 'new'] },
        { id: '3', name: 'Other', age: 34 },
      ])
      .commit();

    // Search for documents
    const result = await users
      .search()
      .query('age:[18 TO 30]')
      .fl(['id', 'name', 'age'])
      .sort('age asc')
      .facetField('tags')
      .rows(10)
      .commit();

    console.log(`Found ${result.numFound} users:`, result.docs);
    console.log('Tag facets:', result.facetCounts);

    // Remove a document
    await users.documents().deleteById('3').commit();

    // List all collections
    const collections = await client.listCollections();
    console.log(
      'All collections:',
      collections.map(collection => collection.name),
    );
  } catch (error) {
    if (isSolrError(error)) {
      console.error(`${error.name}:`, error.message);
    } else {
      throw error;
    }
  }
}

// Run the example
main().catch(error => {
  console.error('Unhandled error:', error);
});
