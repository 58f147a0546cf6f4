/*
 * Legacy entry points kept for older callers. Each one logs a deprecation
 * warning and delegates to the current API.
 */
import logger from "../../../utils/logger";
import { listPaymentMethodVariants } from "../variants";
import { resolveGateway } from "./gateway-factory";
import type { PaymentGateway } from "../gateways/gateway.types";
import type {
  DisplayFlags,
  PaymentMethod,
  PaymentMethodScope,
  StoreRef,
} from "../types/payment-method.types";

export type LegacyDisplayOn = "" | "front_end" | "back_end" | "none";

/** @deprecated list the registered variants instead */
export function providers(): string[] {
  logger.deprecation("PaymentMethod.providers is deprecated, use the registered payment method variants instead");
  return listPaymentMethodVariants().map((v) => v.type);
}

/** @deprecated use `available_to_users` / `available_to_admin` */
export function displayOn(method: DisplayFlags): LegacyDisplayOn {
  logger.deprecation("PaymentMethod#display_on is deprecated, use available_to_users and available_to_admin instead");
  if (method.available_to_users && method.available_to_admin) return "";
  if (method.available_to_users) return "front_end";
  if (method.available_to_admin) return "back_end";
  return "none";
}

/** @deprecated set `available_to_users` / `available_to_admin` */
export function flagsFromDisplayOn(value: string | null | undefined): DisplayFlags {
  logger.deprecation("PaymentMethod#display_on= is deprecated, use available_to_users= and available_to_admin= instead");
  const v = (value ?? "").trim();
  const both = v === "" || v === "both";
  return {
    available_to_users: both || v === "front_end",
    available_to_admin: both || v === "back_end",
  };
}

/** @deprecated use `resolveGateway` */
export function provider(method: Pick<PaymentMethod, "id" | "type" | "preferences">): PaymentGateway {
  logger.deprecation("PaymentMethod#provider is deprecated, use gateway instead");
  return resolveGateway(method);
}

export function displayOnScope(value: string | null | undefined): PaymentMethodScope {
  switch ((value ?? "").trim()) {
    case "front_end":
      return { active: true, available_to_users: true };
    case "back_end":
      return { active: true, available_to_admin: true };
    default:
      return { active: true, available_to_users: true, available_to_admin: true };
  }
}

// No store, or a store that never picked its methods, accepts them all.
export function filterByStore<T extends Pick<PaymentMethod, "id">>(methods: T[], store: StoreRef | null | undefined): T[] {
  if (!store || store.payment_method_ids.length === 0) return methods;
  const allowed = new Set(store.payment_method_ids);
  return methods.filter((m) => allowed.has(m.id));
}
