import { z } from "zod";
import { preferenceValueSchema } from "../lib/preferences";

function emptyStringToNull(value: unknown) {
  if (typeof value !== "string") return value;
  return value.trim() === "" ? null : value;
}

// query strings carry booleans as text
const queryBoolean = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  const v = value.trim().toLowerCase();
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  return value;
}, z.boolean());

export const paymentMethodIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const paymentMethodTypeParamsSchema = z.object({
  type: z.string().trim().min(1),
});

export const displayOnSchema = z.enum(["", "both", "front_end", "back_end"]);

export const listPaymentMethodsQuerySchema = z.object({
  active: queryBoolean.optional(),
  available_to_users: queryBoolean.optional(),
  available_to_admin: queryBoolean.optional(),
  store_id: z.coerce.number().int().positive().optional(),
  display_on: displayOnSchema.optional(),
});

export type ListPaymentMethodsQueryDTO = z.infer<typeof listPaymentMethodsQuerySchema>;

export const getPaymentMethodQuerySchema = z.object({
  with_deleted: queryBoolean.optional().default(false),
});

export const reusableSourcesQuerySchema = z.object({
  user_id: z.coerce.number().int().positive().optional(),
  order_id: z.coerce.number().int().positive().optional(),
});

const preferencesSchema = z.record(preferenceValueSchema);

export const createPaymentMethodBodySchema = z.object({
  type: z.string().trim().min(1),
  name: z.string().trim().min(1).max(255),
  description: z.preprocess(emptyStringToNull, z.string().trim().max(2000)).optional().nullable(),
  active: z.boolean().optional(),
  available_to_users: z.boolean().optional(),
  available_to_admin: z.boolean().optional(),
  display_on: displayOnSchema.optional(),
  auto_capture: z.boolean().optional().nullable(),
  preferences: preferencesSchema.optional(),
  store_ids: z.array(z.coerce.number().int().positive()).optional(),
});

export type CreatePaymentMethodBodyDTO = z.infer<typeof createPaymentMethodBodySchema>;

export const updatePaymentMethodBodySchema = z.object({
  name: z.string().trim().min(1).max(255).optional(),
  description: z.preprocess(emptyStringToNull, z.string().trim().max(2000)).optional().nullable(),
  active: z.boolean().optional(),
  available_to_users: z.boolean().optional(),
  available_to_admin: z.boolean().optional(),
  display_on: displayOnSchema.optional(),
  auto_capture: z.boolean().optional().nullable(),
  preferences: preferencesSchema.optional(),
  store_ids: z.array(z.coerce.number().int().positive()).optional(),
});

export type UpdatePaymentMethodBodyDTO = z.infer<typeof updatePaymentMethodBodySchema>;

export const movePaymentMethodBodySchema = z.object({
  position: z.coerce.number().int().min(1),
});

export const creditCardSourceSchema = z.object({
  kind: z.literal("credit_card"),
  id: z.number().int().positive().optional(),
  number: z.string().trim().min(1).optional(),
  last_digits: z.string().optional().nullable(),
  month: z.coerce.number().int().min(1).max(12),
  year: z.coerce.number().int().min(2000),
  name: z.string().optional().nullable(),
  cc_type: z.string().optional().nullable(),
  gateway_customer_profile_id: z.string().optional().nullable(),
  gateway_payment_profile_id: z.string().optional().nullable(),
});

export const storeCreditSourceSchema = z.object({
  kind: z.literal("store_credit"),
  id: z.number().int().positive().optional(),
  amount_remaining: z.number().int().min(0),
  currency: z.string().trim().length(3),
});

export const paymentSourceSchema = z.discriminatedUnion("kind", [creditCardSourceSchema, storeCreditSourceSchema]);

const amountSchema = z.number().int().min(0);

const transactionOptionsSchema = z
  .object({
    order_id: z.string().optional(),
    currency: z.string().optional(),
    ip: z.string().optional(),
  })
  .passthrough()
  .optional()
  .default({});

export const sourceTransactionBodySchema = z.object({
  amount: amountSchema,
  source: paymentSourceSchema.nullable().optional().default(null),
  options: transactionOptionsSchema,
});

export const captureBodySchema = z.object({
  amount: amountSchema,
  authorization: z.string().trim().min(1),
  options: transactionOptionsSchema,
});

export const creditBodySchema = captureBodySchema;

export const voidBodySchema = z.object({
  authorization: z.string().trim().min(1),
  options: transactionOptionsSchema,
});

export const cancelBodySchema = z.object({
  authorization: z.string().trim().min(1),
});
