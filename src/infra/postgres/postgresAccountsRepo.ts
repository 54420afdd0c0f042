import type { Account, AccountsRepository, CreateAccountInput } from "../../modules/accounts/repository";
import { individualProfileSchema, merchantProfileSchema } from "../../modules/accounts/schemas";
import { AccountNotFoundError, ConstraintViolationError } from "../../common/errors";
import type { SqlExecutor } from "./pool";

type AccountRow = {
  account_number: string;
  kind: string;
  owner_ref: string;
  username: string | null;
  profile: unknown;
  create_date: Date | string;
};

const ACCOUNT_COLUMNS = `
  account_number,
  kind,
  owner_ref,
  username,
  profile,
  create_date
`;

function toAccount(row: AccountRow): Account {
  const base = {
    accountNumber: row.account_number,
    ownerRef: row.owner_ref,
    username: row.username ?? undefined,
    createDate: new Date(row.create_date).toISOString()
  };

  switch (row.kind) {
    case "individual":
      return { ...base, kind: "individual", profile: individualProfileSchema.parse(row.profile) };
    case "merchant":
      return { ...base, kind: "merchant", profile: merchantProfileSchema.parse(row.profile) };
    default:
      throw new Error(`Unknown account kind: ${row.kind}`);
  }
}

export class PostgresAccountsRepository implements AccountsRepository {
  constructor(private readonly run: SqlExecutor) {}

  async getByNumber(accountNumber: string): Promise<Account | null> {
    const result = await this.run<AccountRow>(
      `
      SELECT ${ACCOUNT_COLUMNS}
      FROM accounts
      WHERE account_number = $1;
      `,
      [accountNumber]
    );

    const row = result.rows[0];
    return row ? toAccount(row) : null;
  }

  async findByUsername(username: string): Promise<Account | null> {
    const result = await this.run<AccountRow>(
      `
      SELECT ${ACCOUNT_COLUMNS}
      FROM accounts
      WHERE username = $1;
      `,
      [username]
    );

    const row = result.rows[0];
    return row ? toAccount(row) : null;
  }

  async create(input: CreateAccountInput): Promise<Account> {
    const result = await this.run<AccountRow>(
      `
      INSERT INTO accounts (
        account_number,
        kind,
        owner_ref,
        username,
        profile,
        create_date
      )
      VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING ${ACCOUNT_COLUMNS};
      `,
      [
        input.accountNumber,
        input.kind,
        input.ownerRef,
        input.username ?? null,
        JSON.stringify(input.profile),
        input.createDate
      ]
    );

    return toAccount(result.rows[0]);
  }

  async update(account: Account): Promise<Account> {
    const existing = await this.getByNumber(account.accountNumber);
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

    const result = await this.run<AccountRow>(
      `
      UPDATE accounts
      SET username = $2,
          profile = $3
      WHERE account_number = $1
      RETURNING ${ACCOUNT_COLUMNS};
      `,
      [account.accountNumber, account.username ?? null, JSON.stringify(account.profile)]
    );

    return toAccount(result.rows[0]);
  }
}
