import { BETTING_FUNDING, DATA_PURCHASE, directionOf, labelOf, type Direction } from "../transactions/kinds";
import type { Transaction } from "../transactions/transactions.repository";
import type {
  BettingFundingBody,
  DataPurchaseBody,
  TransactionsQuery
} from "./schemas";
import type { LedgerService } from "./service";

export type TransactionView = Transaction & {
  label: string;
  direction: Direction;
};

export function toTransactionView(transaction: Transaction): TransactionView {
  return {
    ...transaction,
    label: labelOf(transaction.kind),
    direction: directionOf(transaction.kind)
  };
}

export class LedgerController {
  constructor(private readonly service: LedgerService) {}

  async getBalance(accountNumber: string) {
    return { balanceCents: await this.service.computeBalance(accountNumber) };
  }

  async summary(accountNumber: string) {
    const summary = await this.service.accountSummary(accountNumber);
    return {
      ...summary,
      recentTransactions: summary.recentTransactions.map(toTransactionView)
    };
  }

  async listTransactions(accountNumber: string, query: TransactionsQuery) {
    const transactions = await this.service.listTransactions(accountNumber, query);
    return { transactions: transactions.map(toTransactionView) };
  }

  async deposit(accountNumber: string, amountCents: number, description?: string) {
    return toTransactionView(await this.service.deposit(accountNumber, amountCents, description));
  }

  async withdraw(accountNumber: string, amountCents: number, description?: string) {
    return toTransactionView(await this.service.withdraw(accountNumber, amountCents, description));
  }

  async transfer(
    accountNumber: string,
    recipientAccountNumber: string,
    amountCents: number,
    description?: string
  ) {
    const { debit, credit } = await this.service.transfer(
      accountNumber,
      recipientAccountNumber,
      amountCents,
      description
    );
    return { debit: toTransactionView(debit), credit: toTransactionView(credit) };
  }

  async fundCategory(
    accountNumber: string,
    category: string,
    amountCents: number,
    description: string
  ) {
    return toTransactionView(
      await this.service.fundCategory(accountNumber, category, amountCents, description)
    );
  }

  async fundBetting(accountNumber: string, body: BettingFundingBody) {
    return this.fundCategory(
      accountNumber,
      BETTING_FUNDING,
      body.amountCents,
      `Funded ${body.company} account (${body.bettingAccountId})`
    );
  }

  async purchaseData(accountNumber: string, body: DataPurchaseBody) {
    return this.fundCategory(
      accountNumber,
      DATA_PURCHASE,
      body.amountCents,
      `Bought ${body.bundle} for ${body.phoneNumber} on ${body.paymentMethod}`
    );
  }
}
