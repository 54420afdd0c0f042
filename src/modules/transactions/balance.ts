import { directionOf } from "./kinds";
import type { Transaction } from "./transactions.repository";

export type LedgerTotals = {
  totalInCents: number;
  totalOutCents: number;
  balanceCents: number;
};

export function summarizeTransactions(
  transactions: readonly Transaction[]
): LedgerTotals {
  const totals = transactions.reduce(
    (acc, tx) => {
      if (directionOf(tx.kind) === "INFLOW") {
        acc.totalInCents += tx.amountCents;
      } else {
        acc.totalOutCents += tx.amountCents;
      }
      return acc;
    },
    { totalInCents: 0, totalOutCents: 0 }
  );

  return {
    ...totals,
    balanceCents: totals.totalInCents - totals.totalOutCents
  };
}

export function computeBalance(transactions: readonly Transaction[]): number {
  return summarizeTransactions(transactions).balanceCents;
}
