import type { Pool, PoolClient } from "pg";
import type { LedgerSession, LedgerStore } from "../../modules/ledger/store";
import { lockOrder } from "../../modules/ledger/store";
import type { LoggerLike } from "../../common/logger";
import { PostgresAccountsRepository } from "./postgresAccountsRepo";
import { PostgresTransactionsRepository } from "./postgresTransactionsRepo";
import { isRetryablePgError, mapPgError, pgErrorCode } from "./errors";
import { clientExecutor, poolExecutor } from "./pool";

export type PostgresLedgerStoreOptions = {
  maxRetries: number;
  retryBaseDelayMs: number;
  logger?: LoggerLike;
  onClose?: () => Promise<void>;
};

export class PostgresLedgerStore implements LedgerStore {
  readonly accounts: PostgresAccountsRepository;
  readonly transactions: PostgresTransactionsRepository;

  constructor(
    private readonly pool: Pool,
    private readonly options: PostgresLedgerStoreOptions
  ) {
    const run = poolExecutor(pool);
    this.accounts = new PostgresAccountsRepository(run);
    this.transactions = new PostgresTransactionsRepository(run);
  }

  async runAtomic<T>(
    accountNumbers: readonly string[],
    work: (session: LedgerSession) => Promise<T>
  ): Promise<T> {
    return this.withRetry(() => this.attempt(accountNumbers, work));
  }

  async close(): Promise<void> {
    await this.options.onClose?.();
  }

  private async attempt<T>(
    accountNumbers: readonly string[],
    work: (session: LedgerSession) => Promise<T>
  ): Promise<T> {
    let client: PoolClient | undefined;
    let discardClient = false;

    try {
      client = await this.pool.connect();
      const run = clientExecutor(client);
      await run("BEGIN");

      // Row locks in ascending account-number order so opposite-direction
      // transfers cannot deadlock. Missing rows lock nothing.
      for (const accountNumber of lockOrder(accountNumbers)) {
        await run(
          `
          SELECT account_number
          FROM accounts
          WHERE account_number = $1
          FOR UPDATE;
          `,
          [accountNumber]
        );
      }

      const result = await work({
        accounts: new PostgresAccountsRepository(run),
        transactions: new PostgresTransactionsRepository(run)
      });

      await run("COMMIT");
      return result;
    } catch (error) {
      if (client) {
        try {
          await client.query("ROLLBACK");
        } catch (rollbackError) {
          discardClient = true;
          this.options.logger?.error(
            {
              accountNumbers,
              originalError: error instanceof Error ? error.message : String(error),
              rollbackError:
                rollbackError instanceof Error ? rollbackError.message : String(rollbackError)
            },
            "Failed to roll back ledger transaction"
          );
        }
      }
      throw mapPgError(error);
    } finally {
      client?.release(discardClient);
    }
  }

  private async withRetry<T>(operation: () => Promise<T>, attemptNum = 0): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (attemptNum < this.options.maxRetries && isRetryablePgError(error)) {
        this.options.logger?.warn(
          { retry: attemptNum + 1, maxRetries: this.options.maxRetries, code: pgErrorCode(error) },
          "Retrying ledger transaction"
        );
        // Exponential backoff with jitter: base * 2^attempt + random(0-base)
        const exponentialDelay = this.options.retryBaseDelayMs * Math.pow(2, attemptNum);
        const jitter = Math.random() * this.options.retryBaseDelayMs;
        await delay(exponentialDelay + jitter);
        return this.withRetry(operation, attemptNum + 1);
      }
      throw error;
    }
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
