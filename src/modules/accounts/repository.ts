export type AccountKind = "individual" | "merchant";

export type IndividualProfile = {
  firstName?: string;
  lastName?: string;
  dateOfBirth?: string;
  bvn?: string;
};

export type MerchantProfile = {
  companyName?: string;
};

// Profile fields are KYC metadata: stored and returned, never interpreted.
export type AccountIdentity =
  | {
      kind: "individual";
      ownerRef: string;
      username?: string;
      profile: IndividualProfile;
    }
  | {
      kind: "merchant";
      ownerRef: string;
      username?: string;
      profile: MerchantProfile;
    };

export type Account = AccountIdentity & {
  accountNumber: string;
  createDate: string;
};

export type CreateAccountInput = Account;

export interface AccountsRepository {
  getByNumber(accountNumber: string): Promise<Account | null>;
  findByUsername(username: string): Promise<Account | null>;
  create(input: CreateAccountInput): Promise<Account>;
  // Replaces username and profile only; identity fields never change.
  update(account: Account): Promise<Account>;
}
