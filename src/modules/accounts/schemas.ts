import { z } from "zod";

const profileField = z.string().trim().max(150).optional();

export const individualProfileSchema = z
  .object({
    firstName: profileField,
    lastName: profileField,
    dateOfBirth: z.string().trim().max(50).optional(),
    bvn: z.string().trim().max(50).optional()
  })
  .strict();

export const merchantProfileSchema = z
  .object({
    companyName: profileField
  })
  .strict();

const ownerRefSchema = z.string().trim().min(1).max(150);

const usernameSchema = z
  .string()
  .trim()
  .min(1)
  .max(150)
  .regex(/^[a-zA-Z0-9_.-]+$/, "Username must contain only letters, numbers, dots, hyphens, and underscores");

export const openAccountBodySchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("individual"),
    ownerRef: ownerRefSchema,
    username: usernameSchema.optional(),
    profile: individualProfileSchema.default({})
  }),
  z.object({
    kind: z.literal("merchant"),
    ownerRef: ownerRefSchema,
    username: usernameSchema.optional(),
    profile: merchantProfileSchema.default({})
  })
]);

export const updateProfileBodySchema = z.object({
  username: usernameSchema.optional(),
  profile: z.record(z.string(), z.unknown()).optional()
});

export const accountNumberSchema = z
  .string()
  .regex(/^\d{12}$/, "Account number must be 12 digits");

export const accountParamsSchema = z.object({
  accountNumber: accountNumberSchema
});

export type OpenAccountBody = z.infer<typeof openAccountBodySchema>;
export type UpdateProfileBody = z.infer<typeof updateProfileBodySchema>;
export type AccountParams = z.infer<typeof accountParamsSchema>;
