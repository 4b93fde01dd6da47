import { CommitBuilder } from './builder';
import { SolrHttpClient } from './client';
import { SchemaOperationFailure, SchemaUpdateError, ServerError, UsageError } from './errors';
import { FieldDescriptor } from './field';
import { isJsonArray, isJsonObject, jsonEquals, JsonObject, JsonValue } from './json';

export type SchemaAction = 'add-field' | 'replace-field' | 'delete-field';

/**
 * One pending schema command
 */
export type SchemaOperation =
  | { action: 'add-field'; field: FieldDescriptor }
  | { action: 'replace-field'; field: FieldDescriptor }
  | { action: 'delete-field'; name: string };

/**
 * Result of a schema commit: the commands as they were sent
 */
export interface SchemaUpdateResult {
  operations: JsonObject[];
}

export function encodeSchemaOperation(operation: SchemaOperation): JsonObject {
  switch (operation.action) {
    case 'add-field':
    case 'replace-field':
      return { [operation.action]: operation.field.toJSON() };
    case 'delete-field':
      return { 'delete-field': { name: operation.name } };
  }
}

/**
 * Batches field changes for the Schema API of one collection.
 *
 * Operations are sent in the order they were queued; Solr applies them in that order.
 */
export class SchemaBuilder extends CommitBuilder<SchemaUpdateResult> {
  private readonly operations: SchemaOperation[] = [];

  constructor(http: SolrHttpClient, private readonly collection: string) {
    super(http, SchemaBuilder.name);
  }

  /**
   * Queue an `add-field` command
   */
  addField(field: FieldDescriptor): this {
    return this.push({ action: 'add-field', field });
  }

  /**
   * Queue a `replace-field` command for an existing field
   */
  replaceField(field: FieldDescriptor): this {
    return this.push({ action: 'replace-field', field });
  }

  /**
   * Queue a `delete-field` command
   */
  deleteField(name: string): this {
    if (!name) {
      throw new UsageError('Field name must not be empty');
    }
    return this.push({ action: 'delete-field', name });
  }

  /**
   * Number of queued commands
   */
  get size(): number {
    return this.operations.length;
  }

  protected async execute(): Promise<SchemaUpdateResult> {
    if (this.operations.length === 0) {
      this.logger.log(`No schema changes to commit for ${this.collection}, skipping`);
      return { operations: [] };
    }

    const body = this.operations.map(encodeSchemaOperation);
    try {
      await this.http.execute({
        method: 'POST',
        path: `${encodeURIComponent(this.collection)}/schema`,
        params: new URLSearchParams({ wt: 'json' }),
        body: JSON.stringify(body),
      });
    } catch (error) {
      if (error instanceof ServerError) {
        throw new SchemaUpdateError(error, matchFailures(error.details, body));
      }
      throw error;
    }
    return { operations: body };
  }

  private push(operation: SchemaOperation): this {
    this.ensureOpen();
    this.operations.push(operation);
    return this;
  }
}

/**
 * Map `error.details` of a rejected batch back onto the submitted commands.
 *
 * Each detail echoes the command it refers to next to its `errorMessages`.
 */
export function matchFailures(
  details: JsonValue | undefined,
  submitted: JsonObject[],
): SchemaOperationFailure[] {
  if (!isJsonArray(details)) {
    return [];
  }

  const failures: SchemaOperationFailure[] = [];
  for (const detail of details) {
    if (!isJsonObject(detail)) continue;

    const errorMessages = toMessages(detail.errorMessages);
    const operation: JsonObject = {};
    for (const [key, value] of Object.entries(detail)) {
      if (key !== 'errorMessages') {
        operation[key] = value;
      }
    }

    const index = submitted.findIndex(candidate => jsonEquals(candidate, operation));
    failures.push({
      ...(index >= 0 && { index }),
      ...(Object.keys(operation).length > 0 && { operation }),
      errorMessages,
    });
  }
  return failures;
}

function toMessages(value: JsonValue | undefined): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (isJsonArray(value)) {
    return value.map(message => (typeof message === 'string' ? message : JSON.stringify(message)));
  }
  return [];
}
