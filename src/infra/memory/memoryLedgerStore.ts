import type { LedgerSession, LedgerStore } from "../../modules/ledger/store";
import { lockOrder } from "../../modules/ledger/store";
import { MemoryAccountsRepository } from "./memoryAccountsRepo";
import { MemoryTransactionsRepository } from "./memoryTransactionsRepo";
import { MemoryLedgerState, StagedTables } from "./memoryLedgerState";
import { MutexMap, type Release } from "./mutex";

export class MemoryLedgerStore implements LedgerStore {
  readonly accounts: MemoryAccountsRepository;
  readonly transactions: MemoryTransactionsRepository;

  constructor(
    private readonly mutexMap: MutexMap = new MutexMap(),
    private readonly lockTimeoutMs: number = 5_000,
    private readonly state: MemoryLedgerState = new MemoryLedgerState()
  ) {
    this.accounts = new MemoryAccountsRepository(state);
    this.transactions = new MemoryTransactionsRepository(state);
  }

  async runAtomic<T>(
    accountNumbers: readonly string[],
    work: (session: LedgerSession) => Promise<T>
  ): Promise<T> {
    const releases: Release[] = [];
    try {
      for (const accountNumber of lockOrder(accountNumbers)) {
        releases.push(await this.mutexMap.get(accountNumber).lock(this.lockTimeoutMs));
      }

      const staged = new StagedTables(this.state);
      const result = await work({
        accounts: new MemoryAccountsRepository(staged),
        transactions: new MemoryTransactionsRepository(staged)
      });
      staged.commit();
      return result;
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  async close(): Promise<void> {
    this.mutexMap.destroy();
  }
}
