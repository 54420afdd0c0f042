import {
  AccountNotFoundError,
  InsufficientFundsError,
  InvalidAmountError,
  InvalidCategoryError,
  RecipientNotFoundError
} from "../src/common/errors";
import { MemoryLedgerStore } from "../src/infra/memory/memoryLedgerStore";
import { MutexMap } from "../src/infra/memory/mutex";
import { AccountsService } from "../src/modules/accounts/service";
import { LedgerService, MAX_AMOUNT_CENTS } from "../src/modules/ledger/service";

const now = () => new Date("2024-01-01T00:00:00Z");

let store: MemoryLedgerStore;
let accounts: AccountsService;
let ledger: LedgerService;
let sequence = 0;

function sequentialNumbers() {
  return () => String(100_000_000_000 + ++sequence);
}

async function openIndividual(ownerRef = "owner-1") {
  const account = await accounts.openAccount({ kind: "individual", ownerRef, profile: {} });
  return account.accountNumber;
}

beforeEach(() => {
  store = new MemoryLedgerStore(new MutexMap(), 1_000);
  accounts = new AccountsService(store, {
    welcomeBonusCents: 100_000,
    maxAccountNumberAttempts: 5,
    generateAccountNumber: sequentialNumbers(),
    now
  });
  ledger = new LedgerService(store, now);
});

afterEach(async () => {
  await store.close();
});

describe("LedgerService", () => {
  test("new accounts start with the welcome bonus", async () => {
    const a = await openIndividual();

    expect(await ledger.computeBalance(a)).toBe(100_000);
    const [seed] = await ledger.listTransactions(a);
    expect(seed).toMatchObject({
      accountNumber: a,
      kind: { type: "DEPOSIT" },
      amountCents: 100_000,
      description: "Welcome bonus",
      transactionDate: "2024-01-01T00:00:00.000Z"
    });
  });

  test("deposit, rejected withdrawal and full transfer", async () => {
    const a = await openIndividual("owner-a");
    const b = await openIndividual("owner-b");

    await ledger.deposit(a, 50_000);
    expect(await ledger.computeBalance(a)).toBe(150_000);

    await expect(ledger.withdraw(a, 200_000)).rejects.toThrow(InsufficientFundsError);
    expect(await ledger.computeBalance(a)).toBe(150_000);

    const { debit, credit } = await ledger.transfer(a, b, 150_000);
    expect(debit).toMatchObject({
      accountNumber: a,
      kind: { type: "TRANSFER" },
      amountCents: 150_000,
      description: `Transfer to ${b}`
    });
    expect(credit).toMatchObject({
      accountNumber: b,
      kind: { type: "DEPOSIT" },
      amountCents: 150_000,
      description: `Transfer from ${a}`
    });
    expect(await ledger.computeBalance(a)).toBe(0);
    expect(await ledger.computeBalance(b)).toBe(250_000);
  });

  test("default and custom descriptions", async () => {
    const a = await openIndividual("owner-a");
    const b = await openIndividual("owner-b");

    expect((await ledger.deposit(a, 100)).description).toBe("Manual deposit");
    expect((await ledger.withdraw(a, 100)).description).toBe("Cash withdrawal");
    expect((await ledger.deposit(a, 100, "Salary")).description).toBe("Salary");

    const { debit, credit } = await ledger.transfer(a, b, 100, "rent");
    expect(debit.description).toBe(`Transfer to ${b}: rent`);
    expect(credit.description).toBe(`Transfer from ${a}: rent`);
  });

  test("withdrawing the exact balance leaves zero", async () => {
    const a = await openIndividual();

    await ledger.withdraw(a, 100_000);
    expect(await ledger.computeBalance(a)).toBe(0);
    await expect(ledger.withdraw(a, 1)).rejects.toThrow(InsufficientFundsError);
  });

  test("rejects non-positive and fractional amounts without writing", async () => {
    const a = await openIndividual();

    await expect(ledger.deposit(a, 0)).rejects.toThrow(
      new InvalidAmountError("Amount must be greater than zero")
    );
    await expect(ledger.withdraw(a, -5)).rejects.toThrow(InvalidAmountError);
    await expect(ledger.deposit(a, 10.5)).rejects.toThrow(
      "Amount must be a whole number of cents within allowed limits"
    );
    await expect(ledger.deposit(a, MAX_AMOUNT_CENTS + 1)).rejects.toThrow(InvalidAmountError);
    await expect(ledger.deposit(a, Number.NaN)).rejects.toThrow(InvalidAmountError);

    expect(await ledger.listTransactions(a)).toHaveLength(1);
  });

  test("unknown accounts", async () => {
    const a = await openIndividual();

    await expect(ledger.computeBalance("999999999999")).rejects.toThrow(AccountNotFoundError);
    await expect(ledger.deposit("999999999999", 100)).rejects.toThrow(AccountNotFoundError);
    await expect(ledger.transfer("999999999999", a, 100)).rejects.toThrow(AccountNotFoundError);
  });

  test("transfer to a missing recipient changes nothing", async () => {
    const a = await openIndividual();

    await expect(ledger.transfer(a, "999999999999", 10_000)).rejects.toThrow(
      RecipientNotFoundError
    );
    expect(await ledger.computeBalance(a)).toBe(100_000);
    expect(await ledger.listTransactions(a)).toHaveLength(1);
  });

  test("insufficient funds on transfer writes neither row", async () => {
    const a = await openIndividual("owner-a");
    const b = await openIndividual("owner-b");

    await expect(ledger.transfer(a, b, 100_001)).rejects.toThrow(InsufficientFundsError);
    expect(await ledger.listTransactions(a)).toHaveLength(1);
    expect(await ledger.listTransactions(b)).toHaveLength(1);
  });

  test("self-transfer records both rows and keeps the balance", async () => {
    const a = await openIndividual();

    const { debit, credit } = await ledger.transfer(a, a, 40_000);
    expect(debit.transactionId).toBeLessThan(credit.transactionId);
    expect(await ledger.computeBalance(a)).toBe(100_000);
    expect(await ledger.listTransactions(a)).toHaveLength(3);
  });

  test("category funding debits under the category label", async () => {
    const a = await openIndividual();

    const row = await ledger.fundCategory(a, " Groceries ", 2_500, "weekly shop");
    expect(row).toMatchObject({
      kind: { type: "CATEGORY_FUNDING", category: "Groceries" },
      amountCents: 2_500,
      description: "weekly shop"
    });
    expect(await ledger.computeBalance(a)).toBe(97_500);

    await expect(ledger.fundCategory(a, "Withdrawal", 100, "")).rejects.toThrow(
      InvalidCategoryError
    );
    await expect(ledger.fundCategory(a, "Savings", 97_501, "")).rejects.toThrow(
      InsufficientFundsError
    );
  });

  test("summary agrees with the full history", async () => {
    const a = await openIndividual();
    for (let i = 1; i <= 6; i++) {
      await ledger.deposit(a, i * 100);
    }
    await ledger.withdraw(a, 300);

    const summary = await ledger.accountSummary(a);
    expect(summary).toMatchObject({
      accountNumber: a,
      kind: "individual",
      totalInCents: 102_100,
      totalOutCents: 300,
      balanceCents: 101_800,
      transactionsCount: 8
    });
    expect(summary.recentTransactions.map((tx) => tx.amountCents)).toEqual([
      300, 400, 500, 600, 300
    ]);
  });

  test("listing honours order and limit", async () => {
    const a = await openIndividual();
    await ledger.deposit(a, 1);
    await ledger.deposit(a, 2);

    const desc = await ledger.listTransactions(a, { order: "desc", limit: 2 });
    expect(desc.map((tx) => tx.amountCents)).toEqual([2, 1]);
  });
});
