export class AppError extends Error {
  constructor(
    public readonly code: string,
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class AccountNotFoundError extends AppError {
  constructor(message = "Account not found") {
    super("ACCOUNT_NOT_FOUND", 404, message);
  }
}

export class RecipientNotFoundError extends AppError {
  constructor(message = "Recipient account not found") {
    super("RECIPIENT_NOT_FOUND", 404, message);
  }
}

export class InvalidAmountError extends AppError {
  constructor(message = "Amount must be greater than zero") {
    super("INVALID_AMOUNT", 400, message);
  }
}

export class InvalidCategoryError extends AppError {
  constructor(message = "Invalid funding category") {
    super("INVALID_CATEGORY", 400, message);
  }
}

export class InsufficientFundsError extends AppError {
  constructor(message = "Insufficient funds") {
    super("INSUFFICIENT_FUNDS", 409, message);
  }
}

export class DuplicateAccountNumberError extends AppError {
  constructor(message = "Account number already exists") {
    super("DUPLICATE_ACCOUNT_NUMBER", 409, message);
  }
}

export class ConstraintViolationError extends AppError {
  constructor(message = "Constraint violation") {
    super("CONSTRAINT_VIOLATION", 409, message);
  }
}

export class StorageUnavailableError extends AppError {
  constructor(message = "Ledger storage is unavailable") {
    super("STORAGE_UNAVAILABLE", 503, message);
  }
}
