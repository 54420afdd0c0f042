import {
  AccountNotFoundError,
  InsufficientFundsError,
  InvalidAmountError,
  RecipientNotFoundError
} from "../../common/errors";
import type { LoggerLike } from "../../common/logger";
import type { AccountKind } from "../accounts/repository";
import { computeBalance, summarizeTransactions } from "../transactions/balance";
import {
  DEPOSIT,
  TRANSFER,
  WITHDRAWAL,
  categoryFunding,
  labelOf,
  type TransactionKind
} from "../transactions/kinds";
import type {
  ListTransactionsOptions,
  Transaction
} from "../transactions/transactions.repository";
import type { LedgerSession, LedgerStore } from "./store";

export const MAX_AMOUNT_CENTS = 2_000_000_000;
export const RECENT_TRANSACTIONS_LIMIT = 5;

export type TransferResult = {
  debit: Transaction;
  credit: Transaction;
};

export type AccountSummary = {
  accountNumber: string;
  kind: AccountKind;
  balanceCents: number;
  totalInCents: number;
  totalOutCents: number;
  transactionsCount: number;
  recentTransactions: Transaction[];
};

export class LedgerService {
  constructor(
    private readonly store: LedgerStore,
    private readonly now: () => Date = () => new Date(),
    private readonly logger?: LoggerLike
  ) {}

  async computeBalance(accountNumber: string): Promise<number> {
    await this.requireAccount(this.store, accountNumber);
    return computeBalance(await this.store.transactions.listByAccount(accountNumber));
  }

  async listTransactions(
    accountNumber: string,
    options: ListTransactionsOptions = {}
  ): Promise<Transaction[]> {
    await this.requireAccount(this.store, accountNumber);
    return this.store.transactions.listByAccount(accountNumber, options);
  }

  // Every figure comes from the same read, so they always agree.
  async accountSummary(accountNumber: string): Promise<AccountSummary> {
    const account = await this.requireAccount(this.store, accountNumber);
    const transactions = await this.store.transactions.listByAccount(accountNumber);
    const totals = summarizeTransactions(transactions);

    return {
      accountNumber,
      kind: account.kind,
      ...totals,
      transactionsCount: transactions.length,
      recentTransactions: transactions.slice(-RECENT_TRANSACTIONS_LIMIT)
    };
  }

  async deposit(
    accountNumber: string,
    amountCents: number,
    description = "Manual deposit"
  ): Promise<Transaction> {
    this.validateAmount(amountCents);

    return this.store.runAtomic([accountNumber], async (session) => {
      await this.requireAccount(session, accountNumber);
      const [transaction] = await session.transactions.append([
        this.row(accountNumber, DEPOSIT, amountCents, description)
      ]);
      return transaction;
    });
  }

  async withdraw(
    accountNumber: string,
    amountCents: number,
    description = "Cash withdrawal"
  ): Promise<Transaction> {
    return this.debit(accountNumber, WITHDRAWAL, amountCents, description);
  }

  async fundCategory(
    accountNumber: string,
    category: string,
    amountCents: number,
    description: string
  ): Promise<Transaction> {
    return this.debit(accountNumber, categoryFunding(category), amountCents, description);
  }

  /**
   * Moves funds between two accounts as one atomic batch: a TRANSFER row on
   * the sender and a DEPOSIT row on the recipient. Both accounts stay locked
   * from the balance check until the batch is committed.
   */
  async transfer(
    senderAccountNumber: string,
    recipientAccountNumber: string,
    amountCents: number,
    description?: string
  ): Promise<TransferResult> {
    this.validateAmount(amountCents);

    return this.store.runAtomic(
      [senderAccountNumber, recipientAccountNumber],
      async (session) => {
        await this.requireAccount(session, senderAccountNumber);
        const recipient = await session.accounts.getByNumber(recipientAccountNumber);
        if (!recipient) {
          throw new RecipientNotFoundError();
        }

        await this.assertFunds(session, senderAccountNumber, amountCents, TRANSFER);

        const suffix = description ? `: ${description}` : "";
        const [debit, credit] = await session.transactions.append([
          this.row(
            senderAccountNumber,
            TRANSFER,
            amountCents,
            `Transfer to ${recipientAccountNumber}${suffix}`
          ),
          this.row(
            recipientAccountNumber,
            DEPOSIT,
            amountCents,
            `Transfer from ${senderAccountNumber}${suffix}`
          )
        ]);

        this.logger?.info(
          { senderAccountNumber, recipientAccountNumber, amountCents },
          "Transfer committed"
        );
        return { debit, credit };
      }
    );
  }

  private async debit(
    accountNumber: string,
    kind: TransactionKind,
    amountCents: number,
    description: string
  ): Promise<Transaction> {
    this.validateAmount(amountCents);

    return this.store.runAtomic([accountNumber], async (session) => {
      await this.requireAccount(session, accountNumber);
      await this.assertFunds(session, accountNumber, amountCents, kind);
      const [transaction] = await session.transactions.append([
        this.row(accountNumber, kind, amountCents, description)
      ]);
      return transaction;
    });
  }

  // Must run inside runAtomic holding the account's lock.
  private async assertFunds(
    session: LedgerSession,
    accountNumber: string,
    amountCents: number,
    kind: TransactionKind
  ) {
    const balanceCents = computeBalance(
      await session.transactions.listByAccount(accountNumber)
    );
    if (amountCents > balanceCents) {
      this.logger?.info(
        { accountNumber, amountCents, kind: labelOf(kind) },
        "Debit rejected for insufficient funds"
      );
      throw new InsufficientFundsError();
    }
  }

  private async requireAccount(session: LedgerSession, accountNumber: string) {
    const account = await session.accounts.getByNumber(accountNumber);
    if (!account) {
      throw new AccountNotFoundError();
    }
    return account;
  }

  private row(
    accountNumber: string,
    kind: TransactionKind,
    amountCents: number,
    description: string
  ) {
    return {
      accountNumber,
      kind,
      amountCents,
      description,
      transactionDate: this.now().toISOString()
    };
  }

  private validateAmount(amountCents: number) {
    if (!Number.isFinite(amountCents) || amountCents <= 0) {
      throw new InvalidAmountError();
    }
    if (!Number.isSafeInteger(amountCents) || amountCents > MAX_AMOUNT_CENTS) {
      throw new InvalidAmountError("Amount must be a whole number of cents within allowed limits");
    }
  }
}
