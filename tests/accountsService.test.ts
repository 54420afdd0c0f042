import { ZodError } from "zod";
import {
  AccountNotFoundError,
  ConstraintViolationError,
  DuplicateAccountNumberError
} from "../src/common/errors";
import type { LoggerLike } from "../src/common/logger";
import { MemoryLedgerStore } from "../src/infra/memory/memoryLedgerStore";
import { MutexMap } from "../src/infra/memory/mutex";
import {
  AccountsService,
  randomAccountNumber,
  type AccountsServiceOptions
} from "../src/modules/accounts/service";

const now = () => new Date("2024-01-01T00:00:00Z");

let store: MemoryLedgerStore;

function service(overrides: Partial<AccountsServiceOptions> = {}) {
  return new AccountsService(store, {
    welcomeBonusCents: 100_000,
    maxAccountNumberAttempts: 5,
    now,
    ...overrides
  });
}

function fromList(numbers: string[]) {
  let index = 0;
  return () => numbers[Math.min(index++, numbers.length - 1)];
}

function recordingLogger() {
  const warnings: string[] = [];
  const logger: LoggerLike = {
    debug: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
    warn: (_obj: unknown, message?: string) => {
      warnings.push(message ?? "");
    }
  };
  return { logger, warnings };
}

beforeEach(() => {
  store = new MemoryLedgerStore(new MutexMap(), 1_000);
});

afterEach(async () => {
  await store.close();
});

describe("AccountsService", () => {
  test("random account numbers have twelve digits", () => {
    for (let i = 0; i < 100; i++) {
      expect(randomAccountNumber()).toMatch(/^[1-9]\d{11}$/);
    }
  });

  test("opens accounts with identity, profile and creation date", async () => {
    const accounts = service({ generateAccountNumber: fromList(["200000000001"]) });

    const account = await accounts.openAccount({
      kind: "merchant",
      ownerRef: "merchant-1",
      username: "corner-shop",
      profile: { companyName: "Corner Shop" }
    });

    expect(account).toEqual({
      accountNumber: "200000000001",
      kind: "merchant",
      ownerRef: "merchant-1",
      username: "corner-shop",
      profile: { companyName: "Corner Shop" },
      createDate: "2024-01-01T00:00:00.000Z"
    });
    expect(await accounts.getAccount("200000000001")).toEqual(account);
  });

  test("redraws an account number that is already taken", async () => {
    const { logger, warnings } = recordingLogger();
    const accounts = service({
      generateAccountNumber: fromList(["200000000001", "200000000001", "200000000002"]),
      logger
    });

    const first = await accounts.openAccount({ kind: "individual", ownerRef: "a", profile: {} });
    const second = await accounts.openAccount({ kind: "individual", ownerRef: "b", profile: {} });

    expect(first.accountNumber).toBe("200000000001");
    expect(second.accountNumber).toBe("200000000002");
    expect(warnings).toEqual(["Account number collision, drawing another"]);
    expect(await store.transactions.listByAccount("200000000002")).toHaveLength(1);
  });

  test("gives up after the configured number of draws", async () => {
    const accounts = service({
      generateAccountNumber: () => "200000000001",
      maxAccountNumberAttempts: 3
    });
    await accounts.openAccount({ kind: "individual", ownerRef: "a", profile: {} });

    await expect(
      accounts.openAccount({ kind: "individual", ownerRef: "b", profile: {} })
    ).rejects.toThrow(
      new DuplicateAccountNumberError(
        "Could not allocate a unique account number after 3 attempts"
      )
    );
  });

  test("concurrent opens that draw the same number both succeed", async () => {
    const accounts = service({
      generateAccountNumber: fromList(["200000000001", "200000000001", "200000000002"])
    });

    const opened = await Promise.all([
      accounts.openAccount({ kind: "individual", ownerRef: "a", profile: {} }),
      accounts.openAccount({ kind: "individual", ownerRef: "b", profile: {} })
    ]);

    expect(opened.map((account) => account.accountNumber).sort()).toEqual([
      "200000000001",
      "200000000002"
    ]);
  });

  test("a taken username leaves no account or bonus behind", async () => {
    const accounts = service({
      generateAccountNumber: fromList(["200000000001", "200000000002"])
    });
    await accounts.openAccount({
      kind: "individual",
      ownerRef: "a",
      username: "alice",
      profile: {}
    });

    await expect(
      accounts.openAccount({ kind: "individual", ownerRef: "b", username: "alice", profile: {} })
    ).rejects.toThrow(ConstraintViolationError);

    expect(await store.accounts.getByNumber("200000000002")).toBeNull();
    expect(await store.transactions.listByAccount("200000000002")).toEqual([]);
  });

  test("updates merge profile fields and keep identity", async () => {
    const accounts = service({ generateAccountNumber: fromList(["200000000001"]) });
    await accounts.openAccount({
      kind: "individual",
      ownerRef: "a",
      username: "alice",
      profile: { firstName: "Ada" }
    });

    const updated = await accounts.updateProfile("200000000001", {
      profile: { lastName: "Lovelace" }
    });

    expect(updated).toEqual({
      accountNumber: "200000000001",
      kind: "individual",
      ownerRef: "a",
      username: "alice",
      profile: { firstName: "Ada", lastName: "Lovelace" },
      createDate: "2024-01-01T00:00:00.000Z"
    });
  });

  test("profile fields must belong to the account kind", async () => {
    const accounts = service({ generateAccountNumber: fromList(["200000000001"]) });
    await accounts.openAccount({ kind: "individual", ownerRef: "a", profile: {} });

    await expect(
      accounts.updateProfile("200000000001", { profile: { companyName: "Shop" } })
    ).rejects.toThrow(ZodError);
    await expect(accounts.updateProfile("999999999999", {})).rejects.toThrow(
      AccountNotFoundError
    );
  });
});
