import { AsyncLocalStorage } from 'node:async_hooks';
import type { Pool } from 'pg';
import type { Logger } from '../../utils/logging';
import { toError } from '../../utils/errors';
import { createPgRepositories } from './repositories';
import type { Repositories } from './repositories/types';

export type CommitCallback = () => Promise<void> | void;

export interface TransactionContext extends Repositories {
  /** Queue work that must only happen once the outermost transaction commits. */
  onCommit(callback: CommitCallback): void;
}

export interface UnitOfWork {
  run<T>(work: (tx: TransactionContext) => Promise<T>): Promise<T>;
}

/**
 * One database transaction per outermost `run`. A `run` started while another
 * is active on the same async call chain joins it, so a manager calling
 * another manager commits or rolls back as one.
 */
export abstract class BaseUnitOfWork implements UnitOfWork {
  private readonly storage = new AsyncLocalStorage<TransactionContext>();

  protected constructor(protected readonly logger: Logger) {}

  async run<T>(work: (tx: TransactionContext) => Promise<T>): Promise<T> {
    const current = this.storage.getStore();
    if (current) {
      return work(current);
    }

    const callbacks: CommitCallback[] = [];
    const result = await this.transaction((repositories) => {
      const context: TransactionContext = {
        ...repositories,
        onCommit: (callback) => {
          callbacks.push(callback);
        },
      };
      return this.storage.run(context, () => work(context));
    });

    await this.flush(callbacks);
    return result;
  }

  protected abstract transaction<T>(work: (repositories: Repositories) => Promise<T>): Promise<T>;

  // The transaction is already durable here; a failing callback is logged only
  private async flush(callbacks: CommitCallback[]): Promise<void> {
    for (const callback of callbacks) {
      try {
        await callback();
      } catch (error) {
        const err = toError(error);
        this.logger.error('Post-commit callback failed', { error: err.message, stack: err.stack });
      }
    }
  }
}

export type ConnectionPool = Pick<Pool, 'connect'>;

export class PgUnitOfWork extends BaseUnitOfWork {
  constructor(private readonly pool: ConnectionPool, logger: Logger) {
    super(logger);
  }

  protected async transaction<T>(work: (repositories: Repositories) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    // Set when ROLLBACK fails; pg then destroys the client instead of pooling it
    let brokenBy: Error | undefined;
    try {
      await client.query('BEGIN');
      const result = await work(createPgRepositories(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        brokenBy = toError(rollbackError);
        this.logger.error('Rollback failed', { error: brokenBy.message });
      }
      throw error;
    } finally {
      client.release(brokenBy);
    }
  }
}
