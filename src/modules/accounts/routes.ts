import type { FastifyInstance } from "fastify";
import type { AccountsController } from "./controller";
import {
  accountParamsSchema,
  openAccountBodySchema,
  updateProfileBodySchema
} from "./schemas";

const accountSchema = {
  type: "object",
  properties: {
    accountNumber: { type: "string" },
    kind: { type: "string" },
    ownerRef: { type: "string" },
    username: { type: "string" },
    profile: { type: "object", additionalProperties: true },
    createDate: { type: "string" }
  },
  required: ["accountNumber", "kind", "ownerRef", "profile", "createDate"]
};

const accountParams = {
  type: "object",
  properties: { accountNumber: { type: "string" } },
  required: ["accountNumber"]
};

export function registerAccountsRoutes(app: FastifyInstance, controller: AccountsController) {
  app.post(
    "/accounts",
    {
      schema: {
        tags: ["accounts"],
        summary: "Open account",
        body: {
          type: "object",
          properties: {
            kind: { type: "string", enum: ["individual", "merchant"] },
            ownerRef: { type: "string" },
            username: { type: "string" },
            profile: { type: "object" }
          },
          required: ["kind", "ownerRef"]
        },
        response: { 201: accountSchema }
      }
    },
    async (request, reply) => {
      const body = openAccountBodySchema.parse(request.body);
      const account = await controller.openAccount(body);
      return reply.status(201).send(account);
    }
  );

  app.get(
    "/accounts/:accountNumber",
    {
      schema: {
        tags: ["accounts"],
        summary: "Get account",
        params: accountParams,
        response: { 200: accountSchema }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      return controller.getAccount(params.accountNumber);
    }
  );

  app.patch(
    "/accounts/:accountNumber/profile",
    {
      schema: {
        tags: ["accounts"],
        summary: "Update profile fields",
        params: accountParams,
        body: {
          type: "object",
          properties: {
            username: { type: "string" },
            profile: { type: "object" }
          }
        },
        response: { 200: accountSchema }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      const body = updateProfileBodySchema.parse(request.body);
      return controller.updateProfile(params.accountNumber, body);
    }
  );
}
