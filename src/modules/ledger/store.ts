import type { AccountsRepository } from "../accounts/repository";
import type { TransactionsRepository } from "../transactions/transactions.repository";

export type LedgerSession = {
  accounts: AccountsRepository;
  transactions: TransactionsRepository;
};

/**
 * Durable home of accounts and transactions.
 *
 * `accounts` and `transactions` read committed state without taking locks.
 * `runAtomic` locks the named accounts in ascending account-number order, runs
 * `work` against a session whose writes stay invisible to other readers until
 * it commits, and discards every write if `work` throws. Balance checks and
 * the debits they guard must both happen inside the same `runAtomic` call.
 */
export interface LedgerStore extends LedgerSession {
  runAtomic<T>(
    accountNumbers: readonly string[],
    work: (session: LedgerSession) => Promise<T>
  ): Promise<T>;
  close(): Promise<void>;
}

export function lockOrder(accountNumbers: readonly string[]): string[] {
  return [...new Set(accountNumbers)].sort();
}
