import type { Account } from "../../modules/accounts/repository";
import type { Transaction } from "../../modules/transactions/transactions.repository";
import { ConstraintViolationError, DuplicateAccountNumberError } from "../../common/errors";

export interface MemoryTables {
  getAccount(accountNumber: string): Account | undefined;
  findAccount(predicate: (account: Account) => boolean): Account | undefined;
  insertAccount(account: Account): void;
  replaceAccount(account: Account): void;
  accountTransactions(accountNumber: string): Transaction[];
  insertTransactions(transactions: Transaction[]): void;
  nextTransactionId(): number;
}

/** Committed state shared by every session of a MemoryLedgerStore. */
export class MemoryLedgerState implements MemoryTables {
  private readonly accounts = new Map<string, Account>();
  private readonly transactions = new Map<string, Transaction[]>();
  private sequence = 0;

  getAccount(accountNumber: string): Account | undefined {
    return this.accounts.get(accountNumber);
  }

  findAccount(predicate: (account: Account) => boolean): Account | undefined {
    for (const account of this.accounts.values()) {
      if (predicate(account)) {
        return account;
      }
    }
    return undefined;
  }

  insertAccount(account: Account): void {
    if (this.accounts.has(account.accountNumber)) {
      throw new DuplicateAccountNumberError();
    }
    this.replaceAccount(account);
  }

  replaceAccount(account: Account): void {
    if (account.username !== undefined) {
      const holder = this.findAccount((other) => other.username === account.username);
      if (holder && holder.accountNumber !== account.accountNumber) {
        throw new ConstraintViolationError("Username already taken");
      }
    }
    this.accounts.set(account.accountNumber, account);
  }

  accountTransactions(accountNumber: string): Transaction[] {
    return [...(this.transactions.get(accountNumber) ?? [])];
  }

  insertTransactions(transactions: Transaction[]): void {
    for (const tx of transactions) {
      const rows = this.transactions.get(tx.accountNumber);
      if (rows) {
        rows.push(tx);
      } else {
        this.transactions.set(tx.accountNumber, [tx]);
      }
    }
  }

  nextTransactionId(): number {
    this.sequence += 1;
    return this.sequence;
  }
}

/**
 * Buffers the writes of one atomic unit on top of the committed state. Reads
 * see committed rows plus this unit's own pending rows; nothing reaches the
 * committed state until `commit`.
 */
export class StagedTables implements MemoryTables {
  private readonly created = new Map<string, Account>();
  private readonly replaced = new Map<string, Account>();
  private readonly pending: Transaction[] = [];

  constructor(private readonly base: MemoryLedgerState) {}

  getAccount(accountNumber: string): Account | undefined {
    return (
      this.created.get(accountNumber) ??
      this.replaced.get(accountNumber) ??
      this.base.getAccount(accountNumber)
    );
  }

  findAccount(predicate: (account: Account) => boolean): Account | undefined {
    for (const account of [...this.created.values(), ...this.replaced.values()]) {
      if (predicate(account)) {
        return account;
      }
    }
    return this.base.findAccount(
      (account) => !this.replaced.has(account.accountNumber) && predicate(account)
    );
  }

  insertAccount(account: Account): void {
    if (this.getAccount(account.accountNumber)) {
      throw new DuplicateAccountNumberError();
    }
    this.created.set(account.accountNumber, account);
  }

  replaceAccount(account: Account): void {
    if (this.created.has(account.accountNumber)) {
      this.created.set(account.accountNumber, account);
    } else {
      this.replaced.set(account.accountNumber, account);
    }
  }

  accountTransactions(accountNumber: string): Transaction[] {
    return [
      ...this.base.accountTransactions(accountNumber),
      ...this.pending.filter((tx) => tx.accountNumber === accountNumber)
    ];
  }

  insertTransactions(transactions: Transaction[]): void {
    this.pending.push(...transactions);
  }

  nextTransactionId(): number {
    return this.base.nextTransactionId();
  }

  /**
   * Applies the unit to the committed state. Uniqueness is checked again
   * because other units may have committed since the rows were staged; the
   * checks run before any write, and the whole method is synchronous.
   */
  commit(): void {
    for (const account of this.created.values()) {
      if (this.base.getAccount(account.accountNumber)) {
        throw new DuplicateAccountNumberError();
      }
    }
    for (const account of [...this.created.values(), ...this.replaced.values()]) {
      if (account.username === undefined) {
        continue;
      }
      const holder = this.base.findAccount((other) => other.username === account.username);
      if (holder && holder.accountNumber !== account.accountNumber) {
        throw new ConstraintViolationError("Username already taken");
      }
    }

    for (const account of this.created.values()) {
      this.base.insertAccount(account);
    }
    for (const account of this.replaced.values()) {
      this.base.replaceAccount(account);
    }
    this.base.insertTransactions(this.pending);
  }
}
