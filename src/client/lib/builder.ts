import { LoggerService } from '@nestjs/common';
import { SolrHttpClient } from './client';
import { UsageError } from './errors';

/**
 * Base class of every deferred-execution builder.
 *
 * A builder accumulates state through chained calls until `commit` is called once.
 * After that it is consumed: further mutators throw and a second commit rejects,
 * without issuing a request.
 */
export abstract class CommitBuilder<TResult> {
  protected readonly logger: LoggerService;
  private consumed = false;

  protected constructor(protected readonly http: SolrHttpClient, context: string) {
    this.logger = http.loggerFor(context);
  }

  /**
   * Whether `commit` has already been called on this builder
   */
  get isConsumed(): boolean {
    return this.consumed;
  }

  /**
   * Execute the accumulated request
   */
  async commit(): Promise<TResult> {
    this.ensureOpen();
    this.consumed = true;
    return this.execute();
  }

  protected abstract execute(): Promise<TResult>;

  /**
   * Guard for mutators
   */
  protected ensureOpen(): void {
    if (this.consumed) {
      throw new UsageError(`${this.constructor.name} has already been committed`);
    }
  }
}
