import type { TransactionKind } from "./kinds";

export type Transaction = {
  transactionId: number;
  accountNumber: string;
  kind: TransactionKind;
  amountCents: number;
  description: string;
  transactionDate: string;
};

export type CreateTransactionInput = Omit<Transaction, "transactionId">;

export type SortOrder = "asc" | "desc";

export type ListTransactionsOptions = {
  order?: SortOrder;
  // keeps only the most recent rows, whichever order they come back in
  limit?: number;
};

export interface TransactionsRepository {
  listByAccount(
    accountNumber: string,
    options?: ListTransactionsOptions
  ): Promise<Transaction[]>;
  // All rows are persisted or none are.
  append(inputs: CreateTransactionInput[]): Promise<Transaction[]>;
}
