import { InsufficientFundsError } from "../src/common/errors";
import { MemoryLedgerStore } from "../src/infra/memory/memoryLedgerStore";
import { MutexMap } from "../src/infra/memory/mutex";
import { AccountsService } from "../src/modules/accounts/service";
import { LedgerService } from "../src/modules/ledger/service";

let store: MemoryLedgerStore;
let accounts: AccountsService;
let ledger: LedgerService;

beforeEach(() => {
  let sequence = 0;
  store = new MemoryLedgerStore(new MutexMap(), 5_000);
  accounts = new AccountsService(store, {
    welcomeBonusCents: 100_000,
    maxAccountNumberAttempts: 5,
    generateAccountNumber: () => String(300_000_000_000 + ++sequence)
  });
  ledger = new LedgerService(store);
});

afterEach(async () => {
  await store.close();
});

async function open(ownerRef: string) {
  const account = await accounts.openAccount({ kind: "individual", ownerRef, profile: {} });
  return account.accountNumber;
}

describe("concurrent ledger operations", () => {
  test("only one of several withdrawals of the full balance succeeds", async () => {
    const a = await open("a");

    const results = await Promise.allSettled(
      Array.from({ length: 10 }, () => ledger.withdraw(a, 100_000))
    );

    const fulfilled = results.filter((result) => result.status === "fulfilled");
    const rejected = results.filter(
      (result): result is PromiseRejectedResult => result.status === "rejected"
    );
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(9);
    for (const result of rejected) {
      expect(result.reason).toBeInstanceOf(InsufficientFundsError);
    }
    expect(await ledger.computeBalance(a)).toBe(0);
  });

  test("only one of several category fundings of the full balance succeeds", async () => {
    const a = await open("a");

    const results = await Promise.allSettled(
      Array.from({ length: 10 }, (_, i) =>
        ledger.fundCategory(a, "Betting Funding", 100_000, `Funded AcmeBet account (bet-${i})`)
      )
    );

    const rejected = results.filter(
      (result): result is PromiseRejectedResult => result.status === "rejected"
    );
    expect(results.filter((result) => result.status === "fulfilled")).toHaveLength(1);
    expect(rejected).toHaveLength(9);
    for (const result of rejected) {
      expect(result.reason).toBeInstanceOf(InsufficientFundsError);
    }
    expect(await ledger.computeBalance(a)).toBe(0);
  });

  test("concurrent deposits are all recorded", async () => {
    const a = await open("a");

    await Promise.all(Array.from({ length: 20 }, () => ledger.deposit(a, 100)));

    expect(await ledger.computeBalance(a)).toBe(102_000);
    expect(await ledger.listTransactions(a)).toHaveLength(21);
  });

  test("opposing transfers neither deadlock nor create money", async () => {
    const a = await open("a");
    const b = await open("b");

    const transfers = Array.from({ length: 20 }, (_, i) =>
      i % 2 === 0 ? ledger.transfer(a, b, 7_000) : ledger.transfer(b, a, 3_000)
    );
    await Promise.all(transfers);

    const balanceA = await ledger.computeBalance(a);
    const balanceB = await ledger.computeBalance(b);
    expect(balanceA).toBe(100_000 - 10 * 7_000 + 10 * 3_000);
    expect(balanceB).toBe(100_000 + 10 * 7_000 - 10 * 3_000);
    expect(balanceA + balanceB).toBe(200_000);
  });

  test("no balance goes negative under mixed contention", async () => {
    const numbers = await Promise.all(["a", "b", "c"].map(open));

    // Park-Miller generator so every run issues the same operations.
    let seed = 7;
    const random = () => {
      seed = (seed * 16_807) % 2_147_483_647;
      return seed / 2_147_483_647;
    };
    const pick = () => numbers[Math.floor(random() * numbers.length)];

    const operations = Array.from({ length: 60 }, () => {
      const amount = 1 + Math.floor(random() * 60_000);
      const roll = random();
      if (roll < 0.3) {
        return ledger.deposit(pick(), amount);
      }
      if (roll < 0.6) {
        return ledger.withdraw(pick(), amount);
      }
      return ledger.transfer(pick(), pick(), amount);
    });
    const results = await Promise.allSettled(operations);

    for (const result of results) {
      if (result.status === "rejected") {
        expect(result.reason).toBeInstanceOf(InsufficientFundsError);
      }
    }
    for (const accountNumber of numbers) {
      expect(await ledger.computeBalance(accountNumber)).toBeGreaterThanOrEqual(0);
    }
  });
});
