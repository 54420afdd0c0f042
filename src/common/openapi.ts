import type { OpenAPIV3 } from "openapi-types";

const json = (ref: string) => ({
  "application/json": { schema: { $ref: `#/components/schemas/${ref}` } }
});

const errorResponses: OpenAPIV3.ResponsesObject = {
  "400": { description: "Invalid request or amount", content: json("Error") },
  "404": { description: "Account not found", content: json("Error") },
  "503": { description: "Ledger storage unavailable", content: json("Error") }
};

const debitResponses: OpenAPIV3.ResponsesObject = {
  "200": { description: "OK", content: json("Transaction") },
  "409": { description: "Insufficient funds", content: json("Error") },
  ...errorResponses
};

const accountParameter: OpenAPIV3.ReferenceObject = {
  $ref: "#/components/parameters/AccountNumber"
};

const body = (ref: string): OpenAPIV3.RequestBodyObject => ({
  required: true,
  content: json(ref)
});

export const openapiDocument: OpenAPIV3.Document = {
  openapi: "3.0.3",
  info: {
    title: "Retail Ledger API",
    description: "Accounts and append-only transactions with derived balances",
    version: "1.0.0"
  },
  paths: {
    "/health": {
      get: {
        summary: "Health check",
        responses: { "200": { description: "OK", content: json("Health") } }
      }
    },
    "/accounts": {
      post: {
        summary: "Open account with its welcome bonus",
        requestBody: body("OpenAccountBody"),
        responses: {
          "201": { description: "Created", content: json("Account") },
          "409": { description: "Username taken or no free account number", content: json("Error") },
          ...errorResponses
        }
      }
    },
    "/accounts/{accountNumber}": {
      get: {
        summary: "Get account",
        parameters: [accountParameter],
        responses: { "200": { description: "OK", content: json("Account") }, ...errorResponses }
      }
    },
    "/accounts/{accountNumber}/profile": {
      patch: {
        summary: "Update username and profile fields",
        parameters: [accountParameter],
        requestBody: body("UpdateProfileBody"),
        responses: {
          "200": { description: "OK", content: json("Account") },
          "409": { description: "Username taken", content: json("Error") },
          ...errorResponses
        }
      }
    },
    "/accounts/{accountNumber}/balance": {
      get: {
        summary: "Get derived balance",
        parameters: [accountParameter],
        responses: { "200": { description: "OK", content: json("Balance") }, ...errorResponses }
      }
    },
    "/accounts/{accountNumber}/summary": {
      get: {
        summary: "Balance, totals and most recent transactions",
        parameters: [accountParameter],
        responses: { "200": { description: "OK", content: json("Summary") }, ...errorResponses }
      }
    },
    "/accounts/{accountNumber}/transactions": {
      get: {
        summary: "List transactions",
        parameters: [
          accountParameter,
          { $ref: "#/components/parameters/Order" },
          { $ref: "#/components/parameters/Limit" }
        ],
        responses: {
          "200": { description: "OK", content: json("TransactionList") },
          ...errorResponses
        }
      }
    },
    "/accounts/{accountNumber}/deposit": {
      post: {
        summary: "Deposit funds",
        parameters: [accountParameter],
        requestBody: body("AmountBody"),
        responses: { "200": { description: "OK", content: json("Transaction") }, ...errorResponses }
      }
    },
    "/accounts/{accountNumber}/withdraw": {
      post: {
        summary: "Withdraw funds",
        parameters: [accountParameter],
        requestBody: body("AmountBody"),
        responses: debitResponses
      }
    },
    "/accounts/{accountNumber}/transfer": {
      post: {
        summary: "Transfer funds to another account",
        parameters: [accountParameter],
        requestBody: body("TransferBody"),
        responses: {
          "200": { description: "OK", content: json("TransferResult") },
          "409": { description: "Insufficient funds", content: json("Error") },
          ...errorResponses
        }
      }
    },
    "/accounts/{accountNumber}/fund": {
      post: {
        summary: "Fund an outflow category",
        parameters: [accountParameter],
        requestBody: body("FundCategoryBody"),
        responses: debitResponses
      }
    },
    "/accounts/{accountNumber}/betting-funding": {
      post: {
        summary: "Fund a betting account",
        parameters: [accountParameter],
        requestBody: body("BettingFundingBody"),
        responses: debitResponses
      }
    },
    "/accounts/{accountNumber}/data-purchase": {
      post: {
        summary: "Buy a data bundle",
        parameters: [accountParameter],
        requestBody: body("DataPurchaseBody"),
        responses: debitResponses
      }
    }
  },
  components: {
    parameters: {
      AccountNumber: {
        name: "accountNumber",
        in: "path",
        required: true,
        schema: { type: "string", pattern: "^\\d{12}$" }
      },
      Order: {
        name: "order",
        in: "query",
        required: false,
        schema: { type: "string", enum: ["asc", "desc"] }
      },
      Limit: {
        name: "limit",
        in: "query",
        required: false,
        schema: { type: "integer", minimum: 1, maximum: 1000 }
      }
    },
    schemas: {
      Health: {
        type: "object",
        properties: { status: { type: "string", enum: ["ok"] } },
        required: ["status"]
      },
      Error: {
        type: "object",
        properties: {
          error: { type: "string" },
          message: { type: "string" }
        },
        required: ["error", "message"]
      },
      Account: {
        type: "object",
        properties: {
          accountNumber: { type: "string" },
          kind: { type: "string", enum: ["individual", "merchant"] },
          ownerRef: { type: "string" },
          username: { type: "string" },
          profile: { type: "object", additionalProperties: true },
          createDate: { type: "string", format: "date-time" }
        },
        required: ["accountNumber", "kind", "ownerRef", "profile", "createDate"]
      },
      Balance: {
        type: "object",
        properties: { balanceCents: { type: "integer" } },
        required: ["balanceCents"]
      },
      Transaction: {
        type: "object",
        properties: {
          transactionId: { type: "integer" },
          accountNumber: { type: "string" },
          kind: {
            type: "object",
            properties: {
              type: {
                type: "string",
                enum: ["DEPOSIT", "WITHDRAWAL", "TRANSFER", "CATEGORY_FUNDING"]
              },
              category: { type: "string" }
            },
            required: ["type"]
          },
          label: { type: "string" },
          direction: { type: "string", enum: ["INFLOW", "OUTFLOW"] },
          amountCents: { type: "integer", minimum: 1 },
          description: { type: "string" },
          transactionDate: { type: "string", format: "date-time" }
        },
        required: [
          "transactionId",
          "accountNumber",
          "kind",
          "label",
          "direction",
          "amountCents",
          "description",
          "transactionDate"
        ]
      },
      TransactionList: {
        type: "object",
        properties: {
          transactions: { type: "array", items: { $ref: "#/components/schemas/Transaction" } }
        },
        required: ["transactions"]
      },
      TransferResult: {
        type: "object",
        properties: {
          debit: { $ref: "#/components/schemas/Transaction" },
          credit: { $ref: "#/components/schemas/Transaction" }
        },
        required: ["debit", "credit"]
      },
      Summary: {
        type: "object",
        properties: {
          accountNumber: { type: "string" },
          kind: { type: "string" },
          balanceCents: { type: "integer" },
          totalInCents: { type: "integer" },
          totalOutCents: { type: "integer" },
          transactionsCount: { type: "integer" },
          recentTransactions: {
            type: "array",
            items: { $ref: "#/components/schemas/Transaction" }
          }
        },
        required: [
          "accountNumber",
          "kind",
          "balanceCents",
          "totalInCents",
          "totalOutCents",
          "transactionsCount",
          "recentTransactions"
        ]
      },
      OpenAccountBody: {
        type: "object",
        properties: {
          kind: { type: "string", enum: ["individual", "merchant"] },
          ownerRef: { type: "string" },
          username: { type: "string" },
          profile: {
            type: "object",
            description:
              "individual: firstName, lastName, dateOfBirth, bvn; merchant: companyName"
          }
        },
        required: ["kind", "ownerRef"]
      },
      UpdateProfileBody: {
        type: "object",
        properties: {
          username: { type: "string" },
          profile: { type: "object" }
        }
      },
      AmountBody: {
        type: "object",
        properties: {
          amountCents: { type: "integer", minimum: 1 },
          description: { type: "string" }
        },
        required: ["amountCents"]
      },
      TransferBody: {
        type: "object",
        properties: {
          recipientAccountNumber: { type: "string", pattern: "^\\d{12}$" },
          amountCents: { type: "integer", minimum: 1 },
          description: { type: "string" }
        },
        required: ["recipientAccountNumber", "amountCents"]
      },
      FundCategoryBody: {
        type: "object",
        properties: {
          category: { type: "string" },
          amountCents: { type: "integer", minimum: 1 },
          description: { type: "string" }
        },
        required: ["category", "amountCents"]
      },
      BettingFundingBody: {
        type: "object",
        properties: {
          company: { type: "string" },
          bettingAccountId: { type: "string" },
          amountCents: { type: "integer", minimum: 1 }
        },
        required: ["company", "bettingAccountId", "amountCents"]
      },
      DataPurchaseBody: {
        type: "object",
        properties: {
          phoneNumber: { type: "string" },
          bundle: { type: "string" },
          paymentMethod: { type: "string" },
          amountCents: { type: "integer", minimum: 1 }
        },
        required: ["phoneNumber", "bundle", "paymentMethod", "amountCents"]
      }
    }
  }
};
