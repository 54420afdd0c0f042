import { z } from "zod";
import { accountNumberSchema } from "../accounts/schemas";
import { MAX_AMOUNT_CENTS } from "./service";

const amountCentsSchema = z
  .number()
  .int()
  .positive()
  .max(MAX_AMOUNT_CENTS)
  .refine(Number.isSafeInteger);

const descriptionSchema = z.string().trim().max(200);

const requiredText = (max: number) => z.string().trim().min(1).max(max);

export const amountBodySchema = z.object({
  amountCents: amountCentsSchema,
  description: descriptionSchema.optional()
});

export const transferBodySchema = z.object({
  recipientAccountNumber: accountNumberSchema,
  amountCents: amountCentsSchema,
  description: descriptionSchema.optional()
});

export const fundCategoryBodySchema = z.object({
  category: requiredText(50),
  amountCents: amountCentsSchema,
  description: descriptionSchema.default("")
});

export const bettingFundingBodySchema = z.object({
  company: requiredText(100),
  bettingAccountId: requiredText(100),
  amountCents: amountCentsSchema
});

export const dataPurchaseBodySchema = z.object({
  phoneNumber: z.string().trim().regex(/^\+?\d{7,15}$/, "Invalid phone number"),
  bundle: requiredText(100),
  paymentMethod: requiredText(50),
  amountCents: amountCentsSchema
});

export const transactionsQuerySchema = z.object({
  order: z.enum(["asc", "desc"]).default("asc"),
  limit: z.coerce.number().int().positive().max(1000).optional()
});

export type AmountBody = z.infer<typeof amountBodySchema>;
export type TransferBody = z.infer<typeof transferBodySchema>;
export type FundCategoryBody = z.infer<typeof fundCategoryBodySchema>;
export type BettingFundingBody = z.infer<typeof bettingFundingBodySchema>;
export type DataPurchaseBody = z.infer<typeof dataPurchaseBodySchema>;
export type TransactionsQuery = z.infer<typeof transactionsQuerySchema>;
