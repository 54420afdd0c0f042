import type { AccountsService } from "./service";
import type { OpenAccountBody, UpdateProfileBody } from "./schemas";

export class AccountsController {
  constructor(private readonly service: AccountsService) {}

  openAccount(input: OpenAccountBody) {
    return this.service.openAccount(input);
  }

  getAccount(accountNumber: string) {
    return this.service.getAccount(accountNumber);
  }

  updateProfile(accountNumber: string, input: UpdateProfileBody) {
    return this.service.updateProfile(accountNumber, input);
  }
}
