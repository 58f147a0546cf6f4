import { z } from "zod";
import { ValidationError } from "../../../utils/errors";
import type { Preferences } from "../types/payment-method.types";

export const preferenceValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

// jsonb column as read back from postgres
export const storedPreferencesSchema = z.record(preferenceValueSchema);

export type PreferenceSchema = z.ZodType<Preferences, z.ZodTypeDef, unknown>;

/** Keys every payment method accepts. */
export const basePreferenceShape = {
  server: z.string().default("test"),
  test_mode: z.boolean().default(true),
};

/** Keys of methods backed by a remote-style gateway account. */
export const gatewayPreferenceShape = {
  ...basePreferenceShape,
  login: z.string().nullable().default(null),
  password: z.string().nullable().default(null),
};

// unknown keys are rejected rather than silently stored
export function definePreferences<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape).strict();
}

export function parsePreferences(schema: PreferenceSchema, input: unknown): Preferences {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ValidationError("Invalid preferences", parsed.error.flatten());
  }
  return parsed.data;
}

export function preferenceDefaults(schema: PreferenceSchema): Preferences {
  return parsePreferences(schema, {});
}

export function mergePreferences(schema: PreferenceSchema, current: Preferences, patch: Preferences): Preferences {
  return parsePreferences(schema, { ...current, ...patch });
}
