import {
  AccountNotFoundError,
  AppError,
  ConstraintViolationError,
  DuplicateAccountNumberError,
  StorageUnavailableError
} from "../../common/errors";

// serialization_failure, deadlock_detected, lock_not_available
const RETRYABLE_CODES = new Set(["40001", "40P01", "55P03"]);

const UNAVAILABLE_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "08000",
  "08001",
  "08003",
  "08004",
  "08006",
  "53300",
  "57014",
  "57P01",
  "57P02",
  "57P03"
]);

const CONSTRAINT_CODES = new Set(["23001", "23502", "23514"]);

function stringField(error: unknown, field: "code" | "constraint"): string | undefined {
  if (typeof error !== "object" || error === null || !(field in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}

export function pgErrorCode(error: unknown): string | undefined {
  return stringField(error, "code");
}

export function isRetryablePgError(error: unknown): boolean {
  const code = pgErrorCode(error);
  return code !== undefined && RETRYABLE_CODES.has(code);
}

/**
 * Translates driver errors into the ledger's error taxonomy. Retryable
 * conflicts and anything unrecognised come back unchanged.
 */
export function mapPgError(error: unknown): unknown {
  if (error instanceof AppError) {
    return error;
  }

  const code = pgErrorCode(error);
  const message = error instanceof Error ? error.message : String(error);

  if (code === "23505") {
    return stringField(error, "constraint") === "accounts_pkey"
      ? new DuplicateAccountNumberError()
      : new ConstraintViolationError(message);
  }
  if (code === "23503") {
    return new AccountNotFoundError();
  }
  if (code !== undefined && CONSTRAINT_CODES.has(code)) {
    return new ConstraintViolationError(message);
  }
  if (code !== undefined && UNAVAILABLE_CODES.has(code)) {
    return new StorageUnavailableError();
  }
  // pg-pool reports connect timeouts and dropped connections without a code
  if (code === undefined && /timeout|connection terminated/i.test(message)) {
    return new StorageUnavailableError();
  }
  return error;
}
