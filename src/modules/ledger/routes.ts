import type { FastifyInstance } from "fastify";
import { accountParamsSchema } from "../accounts/schemas";
import type { LedgerController } from "./controller";
import {
  amountBodySchema,
  bettingFundingBodySchema,
  dataPurchaseBodySchema,
  fundCategoryBodySchema,
  transactionsQuerySchema,
  transferBodySchema
} from "./schemas";

const accountParams = {
  type: "object",
  properties: { accountNumber: { type: "string" } },
  required: ["accountNumber"]
};

const transactionSchema = {
  type: "object",
  properties: {
    transactionId: { type: "integer" },
    accountNumber: { type: "string" },
    kind: {
      type: "object",
      properties: {
        type: { type: "string" },
        category: { type: "string" }
      },
      required: ["type"]
    },
    label: { type: "string" },
    direction: { type: "string" },
    amountCents: { type: "integer" },
    description: { type: "string" },
    transactionDate: { type: "string" }
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
};

const amountBody = {
  type: "object",
  properties: {
    amountCents: { type: "integer" },
    description: { type: "string" }
  },
  required: ["amountCents"]
};

export function registerLedgerRoutes(app: FastifyInstance, controller: LedgerController) {
  app.get(
    "/accounts/:accountNumber/balance",
    {
      schema: {
        tags: ["ledger"],
        summary: "Get derived balance",
        params: accountParams,
        response: {
          200: {
            type: "object",
            properties: { balanceCents: { type: "integer" } },
            required: ["balanceCents"]
          }
        }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      return controller.getBalance(params.accountNumber);
    }
  );

  app.get(
    "/accounts/:accountNumber/summary",
    {
      schema: {
        tags: ["ledger"],
        summary: "Get account summary",
        params: accountParams,
        response: {
          200: {
            type: "object",
            properties: {
              accountNumber: { type: "string" },
              kind: { type: "string" },
              balanceCents: { type: "integer" },
              totalInCents: { type: "integer" },
              totalOutCents: { type: "integer" },
              transactionsCount: { type: "integer" },
              recentTransactions: { type: "array", items: transactionSchema }
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
          }
        }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      return controller.summary(params.accountNumber);
    }
  );

  app.get(
    "/accounts/:accountNumber/transactions",
    {
      schema: {
        tags: ["ledger"],
        summary: "List transactions",
        params: accountParams,
        querystring: {
          type: "object",
          properties: {
            order: { type: "string", enum: ["asc", "desc"] },
            limit: { type: "string" }
          }
        },
        response: {
          200: {
            type: "object",
            properties: {
              transactions: { type: "array", items: transactionSchema }
            },
            required: ["transactions"]
          }
        }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      const query = transactionsQuerySchema.parse(request.query);
      return controller.listTransactions(params.accountNumber, query);
    }
  );

  app.post(
    "/accounts/:accountNumber/deposit",
    {
      schema: {
        tags: ["ledger"],
        summary: "Deposit funds",
        params: accountParams,
        body: amountBody,
        response: { 200: transactionSchema }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      const body = amountBodySchema.parse(request.body);
      return controller.deposit(params.accountNumber, body.amountCents, body.description);
    }
  );

  app.post(
    "/accounts/:accountNumber/withdraw",
    {
      schema: {
        tags: ["ledger"],
        summary: "Withdraw funds",
        params: accountParams,
        body: amountBody,
        response: { 200: transactionSchema }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      const body = amountBodySchema.parse(request.body);
      return controller.withdraw(params.accountNumber, body.amountCents, body.description);
    }
  );

  app.post(
    "/accounts/:accountNumber/transfer",
    {
      schema: {
        tags: ["ledger"],
        summary: "Transfer funds to another account",
        params: accountParams,
        body: {
          type: "object",
          properties: {
            recipientAccountNumber: { type: "string" },
            amountCents: { type: "integer" },
            description: { type: "string" }
          },
          required: ["recipientAccountNumber", "amountCents"]
        },
        response: {
          200: {
            type: "object",
            properties: {
              debit: transactionSchema,
              credit: transactionSchema
            },
            required: ["debit", "credit"]
          }
        }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      const body = transferBodySchema.parse(request.body);
      return controller.transfer(
        params.accountNumber,
        body.recipientAccountNumber,
        body.amountCents,
        body.description
      );
    }
  );

  app.post(
    "/accounts/:accountNumber/fund",
    {
      schema: {
        tags: ["ledger"],
        summary: "Fund an outflow category",
        params: accountParams,
        body: {
          type: "object",
          properties: {
            category: { type: "string" },
            amountCents: { type: "integer" },
            description: { type: "string" }
          },
          required: ["category", "amountCents"]
        },
        response: { 200: transactionSchema }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      const body = fundCategoryBodySchema.parse(request.body);
      return controller.fundCategory(
        params.accountNumber,
        body.category,
        body.amountCents,
        body.description
      );
    }
  );

  app.post(
    "/accounts/:accountNumber/betting-funding",
    {
      schema: {
        tags: ["ledger"],
        summary: "Fund a betting account",
        params: accountParams,
        body: {
          type: "object",
          properties: {
            company: { type: "string" },
            bettingAccountId: { type: "string" },
            amountCents: { type: "integer" }
          },
          required: ["company", "bettingAccountId", "amountCents"]
        },
        response: { 200: transactionSchema }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      const body = bettingFundingBodySchema.parse(request.body);
      return controller.fundBetting(params.accountNumber, body);
    }
  );

  app.post(
    "/accounts/:accountNumber/data-purchase",
    {
      schema: {
        tags: ["ledger"],
        summary: "Buy a data bundle",
        params: accountParams,
        body: {
          type: "object",
          properties: {
            phoneNumber: { type: "string" },
            bundle: { type: "string" },
            paymentMethod: { type: "string" },
            amountCents: { type: "integer" }
          },
          required: ["phoneNumber", "bundle", "paymentMethod", "amountCents"]
        },
        response: { 200: transactionSchema }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      const body = dataPurchaseBodySchema.parse(request.body);
      return controller.purchaseData(params.accountNumber, body);
    }
  );
}
