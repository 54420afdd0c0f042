import { randomUUID } from "crypto";
import { readFileSync } from "fs";
import { join } from "path";
import { Pool } from "pg";
import {
  ConstraintViolationError,
  InsufficientFundsError,
  RecipientNotFoundError
} from "../src/common/errors";
import { PostgresLedgerStore } from "../src/infra/postgres/postgresLedgerStore";
import { AccountsService } from "../src/modules/accounts/service";
import { LedgerService } from "../src/modules/ledger/service";

const databaseUrl = process.env.DATABASE_URL;
const shouldRun = Boolean(databaseUrl);

const describeMaybe = shouldRun ? describe : describe.skip;

describeMaybe("postgres ledger store", () => {
  let pool: Pool;
  let store: PostgresLedgerStore;
  let accounts: AccountsService;
  let ledger: LedgerService;

  // Transactions are append-only, so rows written here are left in place.
  async function open() {
    const account = await accounts.openAccount({
      kind: "individual",
      ownerRef: `test-owner-${randomUUID()}`,
      profile: {}
    });
    return account.accountNumber;
  }

  beforeAll(async () => {
    pool = new Pool({ connectionString: databaseUrl, max: 10 });
    await pool.query(readFileSync(join(__dirname, "../scripts/schema.sql"), "utf8"));

    store = new PostgresLedgerStore(pool, { maxRetries: 5, retryBaseDelayMs: 10 });
    accounts = new AccountsService(store, {
      welcomeBonusCents: 100_000,
      maxAccountNumberAttempts: 5
    });
    ledger = new LedgerService(store);
  }, 20000);

  afterAll(async () => {
    await pool.end();
  });

  test("deposit, rejected withdrawal and transfer", async () => {
    const a = await open();
    const b = await open();

    await ledger.deposit(a, 50_000);
    expect(await ledger.computeBalance(a)).toBe(150_000);

    await expect(ledger.withdraw(a, 200_000)).rejects.toThrow(InsufficientFundsError);

    await ledger.transfer(a, b, 150_000, "rent");
    expect(await ledger.computeBalance(a)).toBe(0);
    expect(await ledger.computeBalance(b)).toBe(250_000);

    const [latest] = await ledger.listTransactions(b, { order: "desc", limit: 1 });
    expect(latest).toMatchObject({
      kind: { type: "DEPOSIT" },
      amountCents: 150_000,
      description: `Transfer from ${a}: rent`
    });
  });

  test("missing recipient rolls back", async () => {
    const a = await open();

    await expect(ledger.transfer(a, "000000000000", 100)).rejects.toThrow(
      RecipientNotFoundError
    );
    expect(await ledger.listTransactions(a)).toHaveLength(1);
  });

  test("only one of several withdrawals of the full balance succeeds", async () => {
    const a = await open();

    const results = await Promise.allSettled(
      Array.from({ length: 5 }, () => ledger.withdraw(a, 100_000))
    );

    expect(results.filter((result) => result.status === "fulfilled")).toHaveLength(1);
    expect(await ledger.computeBalance(a)).toBe(0);
  });

  test("category funding round-trips its label", async () => {
    const a = await open();

    await ledger.fundCategory(a, "Data Purchase", 1_000, "Bought 1GB");
    const [latest] = await ledger.listTransactions(a, { order: "desc", limit: 1 });
    expect(latest.kind).toEqual({ type: "CATEGORY_FUNDING", category: "Data Purchase" });
  });

  test("rows are append-only and amounts must be positive", async () => {
    const a = await open();

    await expect(
      pool.query("UPDATE transactions SET amount_cents = 1 WHERE account_number = $1", [a])
    ).rejects.toThrow("transactions are append-only");

    await expect(
      store.runAtomic([a], (session) =>
        session.transactions.append([
          {
            accountNumber: a,
            kind: { type: "DEPOSIT" },
            amountCents: 0,
            description: "",
            transactionDate: new Date().toISOString()
          }
        ])
      )
    ).rejects.toThrow(ConstraintViolationError);
  });
});
