import { InvalidCategoryError } from "../../common/errors";

export type TransactionKind =
  | { type: "DEPOSIT" }
  | { type: "WITHDRAWAL" }
  | { type: "TRANSFER" }
  | { type: "CATEGORY_FUNDING"; category: string };

export type TransactionKindType = TransactionKind["type"];

export type Direction = "INFLOW" | "OUTFLOW";

export const DEPOSIT: TransactionKind = { type: "DEPOSIT" };
export const WITHDRAWAL: TransactionKind = { type: "WITHDRAWAL" };
export const TRANSFER: TransactionKind = { type: "TRANSFER" };

export const BETTING_FUNDING = "Betting Funding";
export const DATA_PURCHASE = "Data Purchase";

const MAX_CATEGORY_LENGTH = 50;
const BUILT_IN_LABELS = new Set(["deposit", "withdrawal", "transfer"]);

function assertNever(value: never): never {
  throw new Error(`Unhandled transaction kind: ${JSON.stringify(value)}`);
}

/**
 * Deposits are the only inflow. Every other kind, including every funding
 * category, reduces the derived balance.
 */
export function directionOf(kind: TransactionKind): Direction {
  switch (kind.type) {
    case "DEPOSIT":
      return "INFLOW";
    case "WITHDRAWAL":
    case "TRANSFER":
    case "CATEGORY_FUNDING":
      return "OUTFLOW";
    default:
      return assertNever(kind);
  }
}

export function labelOf(kind: TransactionKind): string {
  switch (kind.type) {
    case "DEPOSIT":
      return "Deposit";
    case "WITHDRAWAL":
      return "Withdrawal";
    case "TRANSFER":
      return "Transfer";
    case "CATEGORY_FUNDING":
      return kind.category;
    default:
      return assertNever(kind);
  }
}

export function categoryFunding(category: string): TransactionKind {
  const label = category.trim();
  if (label.length === 0 || label.length > MAX_CATEGORY_LENGTH) {
    throw new InvalidCategoryError(
      `Category must be between 1 and ${MAX_CATEGORY_LENGTH} characters`
    );
  }
  if (BUILT_IN_LABELS.has(label.toLowerCase())) {
    throw new InvalidCategoryError(`Category "${label}" is reserved`);
  }
  return { type: "CATEGORY_FUNDING", category: label };
}

/** Rebuilds a kind from its stored columns. */
export function kindFromColumns(type: string, category: string | null): TransactionKind {
  switch (type) {
    case "DEPOSIT":
      return DEPOSIT;
    case "WITHDRAWAL":
      return WITHDRAWAL;
    case "TRANSFER":
      return TRANSFER;
    case "CATEGORY_FUNDING":
      if (category === null) {
        throw new Error("Category funding row is missing its category");
      }
      return { type: "CATEGORY_FUNDING", category };
    default:
      throw new Error(`Unknown transaction kind: ${type}`);
  }
}
