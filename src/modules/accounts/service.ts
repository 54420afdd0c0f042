import { randomInt } from "crypto";
import {
  AccountNotFoundError,
  DuplicateAccountNumberError
} from "../../common/errors";
import type { LoggerLike } from "../../common/logger";
import type { LedgerStore } from "../ledger/store";
import { DEPOSIT } from "../transactions/kinds";
import type { Account, AccountIdentity } from "./repository";
import { individualProfileSchema, merchantProfileSchema } from "./schemas";

export const WELCOME_BONUS_DESCRIPTION = "Welcome bonus";

export type AccountNumberGenerator = () => string;

export const randomAccountNumber: AccountNumberGenerator = () =>
  String(randomInt(100_000_000_000, 1_000_000_000_000));

export type AccountsServiceOptions = {
  welcomeBonusCents: number;
  maxAccountNumberAttempts: number;
  generateAccountNumber?: AccountNumberGenerator;
  now?: () => Date;
  logger?: LoggerLike;
};

export type ProfileUpdate = {
  username?: string;
  profile?: Record<string, unknown>;
};

export class AccountsService {
  private readonly generateAccountNumber: AccountNumberGenerator;
  private readonly now: () => Date;

  constructor(
    private readonly store: LedgerStore,
    private readonly options: AccountsServiceOptions
  ) {
    this.generateAccountNumber = options.generateAccountNumber ?? randomAccountNumber;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Opens an account and credits its welcome bonus in the same atomic unit:
   * either both rows exist afterwards or neither does. Account numbers that
   * are already taken are redrawn up to `maxAccountNumberAttempts` times.
   */
  async openAccount(identity: AccountIdentity): Promise<Account> {
    for (let attempt = 1; attempt <= this.options.maxAccountNumberAttempts; attempt++) {
      const accountNumber = this.generateAccountNumber();

      if (await this.store.accounts.getByNumber(accountNumber)) {
        this.options.logger?.warn({ attempt }, "Account number collision, drawing another");
        continue;
      }

      const createDate = this.now().toISOString();
      try {
        const account = await this.store.runAtomic([accountNumber], async (session) => {
          const created = await session.accounts.create({
            ...identity,
            accountNumber,
            createDate
          });
          await session.transactions.append([
            {
              accountNumber,
              kind: DEPOSIT,
              amountCents: this.options.welcomeBonusCents,
              description: WELCOME_BONUS_DESCRIPTION,
              transactionDate: createDate
            }
          ]);
          return created;
        });

        this.options.logger?.info(
          { accountNumber, kind: account.kind },
          "Account opened"
        );
        return account;
      } catch (error) {
        if (error instanceof DuplicateAccountNumberError) {
          this.options.logger?.warn({ attempt }, "Account number taken concurrently, drawing another");
          continue;
        }
        throw error;
      }
    }

    throw new DuplicateAccountNumberError(
      `Could not allocate a unique account number after ${this.options.maxAccountNumberAttempts} attempts`
    );
  }

  async getAccount(accountNumber: string): Promise<Account> {
    const account = await this.store.accounts.getByNumber(accountNumber);
    if (!account) {
      throw new AccountNotFoundError();
    }
    return account;
  }

  /**
   * Changes the non-ledger fields of an account. Profile fields are merged
   * into the existing profile and must belong to the account's kind.
   */
  async updateProfile(accountNumber: string, update: ProfileUpdate): Promise<Account> {
    return this.store.runAtomic([accountNumber], async (session) => {
      const account = await session.accounts.getByNumber(accountNumber);
      if (!account) {
        throw new AccountNotFoundError();
      }

      const username = update.username ?? account.username;
      const updated: Account =
        account.kind === "individual"
          ? {
              ...account,
              username,
              profile: individualProfileSchema.parse({ ...account.profile, ...update.profile })
            }
          : {
              ...account,
              username,
              profile: merchantProfileSchema.parse({ ...account.profile, ...update.profile })
            };

      return session.accounts.update(updated);
    });
  }
}
