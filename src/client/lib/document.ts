import { CommitBuilder } from './builder';
import { SolrHttpClient, stripHeader } from './client';
import { UsageError } from './errors';
import { isJsonArray, isJsonObject, JsonArray, JsonObject } from './json';

/**
 * A document as sent to Solr
 */
export type SolrDocument = JsonObject;

/**
 * One pending update command
 */
export type UpdateCommand =
  | { kind: 'add'; doc: SolrDocument }
  | { kind: 'delete-by-id'; id: string }
  | { kind: 'delete-by-query'; query: string };

/**
 * Body of a successful update response, without its header.
 *
 * Documents rejected by a tolerant update chain are reported by Solr in the header;
 * they are copied to `errors` as received.
 */
export type UpdateResult = JsonObject;

/**
 * Serialize pending commands into an update request body.
 *
 * A batch made only of additions is sent as a plain array of documents. Any delete
 * switches to the command object form, where the `add` and `delete` keys repeat
 * once per command, in order.
 */
export function encodeUpdateCommands(commands: UpdateCommand[]): string {
  if (commands.every(command => command.kind === 'add')) {
    const docs: JsonArray = [];
    for (const command of commands) {
      if (command.kind === 'add') docs.push(command.doc);
    }
    return JSON.stringify(docs);
  }

  const entries = commands.map(command => {
    switch (command.kind) {
      case 'add':
        return `"add":${JSON.stringify({ doc: command.doc })}`;
      case 'delete-by-id':
        return `"delete":${JSON.stringify({ id: command.id })}`;
      case 'delete-by-query':
        return `"delete":${JSON.stringify({ query: command.query })}`;
    }
  });
  return `{${entries.join(',')}}`;
}

/**
 * Accumulates documents to add, and ids or queries to delete, for one collection.
 *
 * Repeated `add` calls accumulate: a single object is appended, an array is appended
 * element by element.
 *
 * @example
 * ```typescript
 * await users
 *   .add({ name: 'Some', age: 19 })
 *   .add([{ name: 'Dude', age: 21 }])
 *   .commit();
 * ```
 */
export class DocumentsBuilder extends CommitBuilder<UpdateResult> {
  private readonly commands: UpdateCommand[] = [];
  private commitWithinMs?: number;
  private soft = false;
  private overwriteFlag?: boolean;

  constructor(http: SolrHttpClient, private readonly collection: string) {
    super(http, DocumentsBuilder.name);
  }

  /**
   * Queue one document or an array of documents
   * @param payload A document object, or an array of document objects
   */
  add(payload: SolrDocument | JsonArray): this {
    this.ensureOpen();
    if (isJsonArray(payload)) {
      const docs: SolrDocument[] = [];
      payload.forEach((doc, index) => {
        if (!isJsonObject(doc)) {
          throw new UsageError(`Document at index ${index} is not a JSON object`);
        }
        docs.push(doc);
      });
      docs.forEach(doc => this.commands.push({ kind: 'add', doc }));
    } else if (isJsonObject(payload)) {
      this.commands.push({ kind: 'add', doc: payload });
    } else {
      throw new UsageError('Document payload must be an object or an array of objects');
    }
    return this;
  }

  /**
   * Queue deletion of documents by unique key
   */
  deleteById(ids: string | string[]): this {
    this.ensureOpen();
    for (const id of Array.isArray(ids) ? ids : [ids]) {
      if (!id) {
        throw new UsageError('Document id must not be empty');
      }
      this.commands.push({ kind: 'delete-by-id', id });
    }
    return this;
  }

  /**
   * Queue deletion of every document matching a query
   */
  deleteByQuery(query: string): this {
    this.ensureOpen();
    if (!query) {
      throw new UsageError('Delete query must not be empty');
    }
    this.commands.push({ kind: 'delete-by-query', query });
    return this;
  }

  /**
   * Ask Solr to commit within the given number of milliseconds instead of immediately
   */
  commitWithin(ms: number): this {
    this.ensureOpen();
    if (!Number.isInteger(ms) || ms < 0) {
      throw new UsageError(`Invalid commitWithin value ${ms}`);
    }
    this.commitWithinMs = ms;
    return this;
  }

  /**
   * Make the changes visible with a soft commit rather than a hard one
   */
  softCommit(): this {
    this.ensureOpen();
    this.soft = true;
    return this;
  }

  /**
   * Whether added documents replace existing ones with the same unique key
   */
  overwrite(overwrite: boolean): this {
    this.ensureOpen();
    this.overwriteFlag = overwrite;
    return this;
  }

  /**
   * Number of documents queued for addition
   */
  get commitSize(): number {
    return this.commands.filter(command => command.kind === 'add').length;
  }

  /**
   * Query string parameters of the update request
   */
  buildParams(): URLSearchParams {
    const params = new URLSearchParams();
    if (this.commitWithinMs !== undefined) {
      params.append('commitWithin', String(this.commitWithinMs));
    } else if (this.soft) {
      params.append('softCommit', 'true');
    } else {
      params.append('commit', 'true');
    }
    if (this.overwriteFlag !== undefined) {
      params.append('overwrite', String(this.overwriteFlag));
    }
    params.append('wt', 'json');
    return params;
  }

  protected async execute(): Promise<UpdateResult> {
    if (this.commands.length === 0) {
      this.logger.log(`No documents to commit for ${this.collection}, skipping`);
      return {};
    }

    const envelope = await this.http.executeRaw({
      method: 'POST',
      path: `${encodeURIComponent(this.collection)}/update`,
      params: this.buildParams(),
      body: encodeUpdateCommands(this.commands),
    });

    const result = stripHeader(envelope);
    const header = envelope.responseHeader;
    if (isJsonObject(header) && isJsonArray(header.errors)) {
      this.logger.warn(`${header.errors.length} documents were rejected by ${this.collection}`);
      result.errors = header.errors;
    }
    return result;
  }
}
