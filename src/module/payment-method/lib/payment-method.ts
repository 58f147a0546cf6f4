import { ValidationError } from "../../../utils/errors";
import { getPaymentMethodVariant } from "../variants";
import { mergePreferences, parsePreferences } from "./preferences";
import type {
  PaymentMethod,
  PaymentMethodDraft,
  PaymentMethodInput,
  PaymentMethodUpdate,
  Preferences,
} from "../types/payment-method.types";

/**
 * Validates a new payment method and fills its preferences with the
 * defaults its variant declares.
 */
export function buildPaymentMethodDraft(input: PaymentMethodInput): PaymentMethodDraft {
  const name = input.name?.trim() ?? "";
  const type = input.type?.trim() ?? "";

  const missing = [!name && "name", !type && "type"].filter((f): f is string => typeof f === "string");
  if (missing.length > 0) {
    throw new ValidationError(`Payment method ${missing.join(" and ")} can't be blank`, { missing });
  }

  const variant = getPaymentMethodVariant(type);
  if (!variant) {
    throw new ValidationError(`Unknown payment method type: ${type}`, { type });
  }

  return {
    type,
    name,
    description: input.description ?? null,
    active: input.active ?? true,
    available_to_users: input.available_to_users ?? true,
    available_to_admin: input.available_to_admin ?? true,
    auto_capture: input.auto_capture ?? null,
    preferences: parsePreferences(variant.preferences, input.preferences ?? {}),
  };
}

/**
 * Applies an update on top of the stored record. Preferences are merged
 * into the current ones and re-validated against the variant.
 */
export function applyPaymentMethodUpdate(current: PaymentMethod, patch: PaymentMethodUpdate): PaymentMethodUpdate {
  const out: PaymentMethodUpdate = { ...patch };

  if (patch.name !== undefined) {
    const name = patch.name.trim();
    if (!name) throw new ValidationError("Payment method name can't be blank", { missing: ["name"] });
    out.name = name;
  }

  if (patch.preferences !== undefined) {
    const variant = getPaymentMethodVariant(current.type);
    if (!variant) throw new ValidationError(`Unknown payment method type: ${current.type}`, { type: current.type });
    out.preferences = mergePreferences(variant.preferences, current.preferences, patch.preferences);
  }

  return out;
}

/**
 * Preference snapshot handed to the gateway. A `login` set to null means
 * "no account configured" and is left out.
 */
export function paymentMethodOptions(method: Pick<PaymentMethod, "preferences">): Preferences {
  const options: Preferences = { ...method.preferences };
  if ("login" in options && options.login === null) {
    delete options.login;
  }
  return options;
}
