import type {
  CreateTransactionInput,
  ListTransactionsOptions,
  Transaction,
  TransactionsRepository
} from "../../modules/transactions/transactions.repository";
import { AccountNotFoundError, ConstraintViolationError } from "../../common/errors";
import type { MemoryTables } from "./memoryLedgerState";

export class MemoryTransactionsRepository implements TransactionsRepository {
  constructor(private readonly tables: MemoryTables) {}

  async listByAccount(
    accountNumber: string,
    options: ListTransactionsOptions = {}
  ): Promise<Transaction[]> {
    const rows = this.tables
      .accountTransactions(accountNumber)
      .sort((a, b) => a.transactionId - b.transactionId);

    const recent =
      options.limit === undefined
        ? rows
        : rows.slice(Math.max(rows.length - options.limit, 0));
    return options.order === "desc" ? recent.reverse() : recent;
  }

  async append(inputs: CreateTransactionInput[]): Promise<Transaction[]> {
    // Validate the whole batch before writing any of it.
    for (const input of inputs) {
      if (!this.tables.getAccount(input.accountNumber)) {
        throw new AccountNotFoundError(`Account ${input.accountNumber} not found`);
      }
      if (!Number.isSafeInteger(input.amountCents) || input.amountCents <= 0) {
        throw new ConstraintViolationError("Transaction amount must be a positive integer");
      }
    }

    const created = inputs.map((input) =>
      Object.freeze({
        ...input,
        kind: Object.freeze({ ...input.kind }),
        transactionId: this.tables.nextTransactionId()
      })
    );
    this.tables.insertTransactions(created);
    return created;
  }
}
