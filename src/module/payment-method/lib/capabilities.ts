import logger from "../../../utils/logger";
import { NotImplementedError } from "../../../utils/errors";
import { paymentsConfig, type PaymentsConfig } from "../../../config/payments";
import { requirePaymentMethodVariant, STORE_CREDIT_TYPE } from "../variants";
import type { GatewayClass } from "../gateways/gateway.types";
import type {
  OrderRef,
  PaymentMethod,
  PaymentSource,
  PaymentSourceKind,
} from "../types/payment-method.types";

type MethodRef = Pick<PaymentMethod, "type">;

export function gatewayClass(method: MethodRef): GatewayClass {
  const variant = requirePaymentMethodVariant(method.type);
  if (variant.gatewayClass) return variant.gatewayClass();

  if (variant.providerClass) {
    logger.deprecation(
      `${method.type}: providerClass is deprecated and will be removed, define gatewayClass instead`
    );
    return variant.providerClass();
  }

  throw new NotImplementedError(`You must implement gatewayClass for ${method.type}`);
}

/** `null` when the method stores no reusable source. */
export function paymentSourceClass(method: MethodRef): PaymentSourceKind | null {
  const variant = requirePaymentMethodVariant(method.type);
  if (!variant.paymentSourceClass) {
    throw new NotImplementedError(`You must implement paymentSourceClass for ${method.type}`);
  }
  return variant.paymentSourceClass();
}

/**
 * Name of the checkout / admin partials for this method,
 * e.g. `BogusCreditCard` → `boguscreditcard`, `Acme::Stripe` → `stripe`.
 */
export function methodType(method: MethodRef): string {
  const segments = method.type.split("::");
  return (segments[segments.length - 1] ?? method.type).toLowerCase();
}

export function paymentProfilesSupported(method: MethodRef): boolean {
  return requirePaymentMethodVariant(method.type).paymentProfilesSupported ?? false;
}

export function sourceRequired(method: MethodRef): boolean {
  return requirePaymentMethodVariant(method.type).sourceRequired ?? true;
}

export async function reusableSources(method: PaymentMethod, order: OrderRef): Promise<PaymentSource[]> {
  const variant = requirePaymentMethodVariant(method.type);
  if (!variant.reusableSources) return [];
  return variant.reusableSources(method, order);
}

export function autoCapture(method: Pick<PaymentMethod, "auto_capture">, config: PaymentsConfig = paymentsConfig): boolean {
  return method.auto_capture ?? config.autoCapture;
}

export function supports(method: PaymentMethod, source: PaymentSource): boolean {
  const variant = requirePaymentMethodVariant(method.type);
  if (!variant.supports) return true;
  return variant.supports(method, source);
}

export function isStoreCredit(method: MethodRef): boolean {
  return method.type === STORE_CREDIT_TYPE;
}
