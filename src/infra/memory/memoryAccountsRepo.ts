import type { Account, AccountsRepository, CreateAccountInput } from "../../modules/accounts/repository";
import {
  AccountNotFoundError,
  ConstraintViolationError,
  DuplicateAccountNumberError
} from "../../common/errors";
import type { MemoryTables } from "./memoryLedgerState";

export class MemoryAccountsRepository implements AccountsRepository {
  constructor(private readonly tables: MemoryTables) {}

  async getByNumber(accountNumber: string): Promise<Account | null> {
    return this.tables.getAccount(accountNumber) ?? null;
  }

  async findByUsername(username: string): Promise<Account | null> {
    return this.tables.findAccount((account) => account.username === username) ?? null;
  }

  async create(input: CreateAccountInput): Promise<Account> {
    if (this.tables.getAccount(input.accountNumber)) {
      throw new DuplicateAccountNumberError();
    }
    this.assertUsernameFree(input);
    this.tables.insertAccount(input);
    return input;
  }

  async update(account: Account): Promise<Account> {
    const existing = this.tables.getAccount(account.accountNumber);
    if (!existing) {
      throw new AccountNotFoundError();
    }
    if (
      existing.kind !== account.kind ||
      existing.ownerRef !== account.ownerRef ||
      existing.createDate !== account.createDate
    ) {
      throw new ConstraintViolationError("Account identity fields are immutable");
    }
    this.assertUsernameFree(account);
    this.tables.replaceAccount(account);
    return account;
  }

  private assertUsernameFree(account: Account) {
    if (account.username === undefined) {
      return;
    }
    const holder = this.tables.findAccount((other) => other.username === account.username);
    if (holder && holder.accountNumber !== account.accountNumber) {
      throw new ConstraintViolationError("Username already taken");
    }
  }
}
