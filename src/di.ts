import { AccountsController } from "./modules/accounts/controller";
import { AccountsService, type AccountNumberGenerator } from "./modules/accounts/service";
import { LedgerController } from "./modules/ledger/controller";
import { LedgerService } from "./modules/ledger/service";
import type { LedgerStore } from "./modules/ledger/store";
import { MemoryLedgerStore } from "./infra/memory/memoryLedgerStore";
import { MutexMap } from "./infra/memory/mutex";
import { PostgresLedgerStore } from "./infra/postgres/postgresLedgerStore";
import { closePool, getPool } from "./infra/postgres/pool";
import type { LoggerLike } from "./common/logger";
import { config } from "./config";

export type ContainerOptions = {
  now?: () => Date;
  logger?: LoggerLike;
  store?: LedgerStore;
  generateAccountNumber?: AccountNumberGenerator;
};

function createStore(logger?: LoggerLike): LedgerStore {
  if (config.REPO_PROVIDER === "postgres") {
    return new PostgresLedgerStore(getPool(), {
      maxRetries: config.RETRY_MAX_ATTEMPTS,
      retryBaseDelayMs: config.RETRY_BASE_DELAY_MS,
      logger,
      onClose: closePool
    });
  }

  // Memory mode keeps nothing across restarts; for development and tests.
  return new MemoryLedgerStore(new MutexMap(), config.LOCK_TIMEOUT_MS);
}

export function createContainer(options: ContainerOptions = {}) {
  const store = options.store ?? createStore(options.logger);

  const accountsService = new AccountsService(store, {
    welcomeBonusCents: config.WELCOME_BONUS_CENTS,
    maxAccountNumberAttempts: config.ACCOUNT_NUMBER_MAX_ATTEMPTS,
    generateAccountNumber: options.generateAccountNumber,
    now: options.now,
    logger: options.logger
  });
  const ledgerService = new LedgerService(store, options.now, options.logger);

  return {
    store,
    accountsService,
    ledgerService,
    accountsController: new AccountsController(accountsService),
    ledgerController: new LedgerController(ledgerService)
  };
}

export type Container = ReturnType<typeof createContainer>;
