import { NotImplementedError } from "../../../utils/errors";
import { requirePaymentMethodVariant } from "../variants";
import { resolveGateway } from "./gateway-factory";
import type { GatewayResponse, GatewayTransactionOptions } from "../gateways/gateway.types";
import type { PaymentMethod, PaymentSource } from "../types/payment-method.types";

type MethodRef = Pick<PaymentMethod, "id" | "type" | "preferences">;

// Straight forwards to the method's gateway: no retry, no reinterpretation of the response.

export function authorize(
  method: MethodRef,
  amount: number,
  source: PaymentSource | null,
  options?: GatewayTransactionOptions
): Promise<GatewayResponse> {
  return resolveGateway(method).authorize(amount, source, options);
}

export function purchase(
  method: MethodRef,
  amount: number,
  source: PaymentSource | null,
  options?: GatewayTransactionOptions
): Promise<GatewayResponse> {
  return resolveGateway(method).purchase(amount, source, options);
}

export function capture(
  method: MethodRef,
  amount: number,
  authorization: string,
  options?: GatewayTransactionOptions
): Promise<GatewayResponse> {
  return resolveGateway(method).capture(amount, authorization, options);
}

export function voidTransaction(
  method: MethodRef,
  authorization: string,
  options?: GatewayTransactionOptions
): Promise<GatewayResponse> {
  return resolveGateway(method).void(authorization, options);
}

export function credit(
  method: MethodRef,
  amount: number,
  authorization: string,
  options?: GatewayTransactionOptions
): Promise<GatewayResponse> {
  return resolveGateway(method).credit(amount, authorization, options);
}

export async function cancel(method: MethodRef, authorization: string): Promise<GatewayResponse> {
  const variant = requirePaymentMethodVariant(method.type);
  if (!variant.cancel) {
    throw new NotImplementedError(`You must implement cancel for ${method.type}`);
  }
  return variant.cancel(resolveGateway(method), authorization);
}
