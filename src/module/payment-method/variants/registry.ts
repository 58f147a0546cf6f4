import logger from "../../../utils/logger";
import { NotImplementedError } from "../../../utils/errors";
import type { PaymentMethodVariant } from "./variant.types";

const variants = new Map<string, PaymentMethodVariant>();

export function registerPaymentMethodVariant(variant: PaymentMethodVariant): void {
  if (variants.has(variant.type)) {
    logger.warn(`[PaymentMethod] Replacing registered variant ${variant.type}`);
  }
  variants.set(variant.type, variant);
}

export function unregisterPaymentMethodVariant(type: string): boolean {
  return variants.delete(type);
}

export function getPaymentMethodVariant(type: string): PaymentMethodVariant | null {
  return variants.get(type) ?? null;
}

export function isRegisteredPaymentMethodType(type: string): boolean {
  return variants.has(type);
}

/**
 * A stored record whose type has no registered variant is a deployment
 * defect, not bad input.
 */
export function requirePaymentMethodVariant(type: string): PaymentMethodVariant {
  const variant = variants.get(type);
  if (!variant) {
    throw new NotImplementedError(
      `No payment method variant registered for ${type}. Registered: ${[...variants.keys()].join(", ")}`
    );
  }
  return variant;
}

export function listPaymentMethodVariants(): PaymentMethodVariant[] {
  return [...variants.values()];
}
