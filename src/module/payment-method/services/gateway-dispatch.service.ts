import logger from "../../../utils/logger";
import { NotFoundError } from "../../../utils/errors";
import * as dispatch from "../lib/gateway-dispatch";
import { repoGetPaymentMethod } from "../repository/payment-methods.repository";
import type { GatewayOperation, GatewayResponse, GatewayTransactionOptions } from "../gateways/gateway.types";
import type { PaymentMethod, PaymentSource } from "../types/payment-method.types";

// New transactions need a live method; follow-ups on existing ones may target a deleted one.
async function loadPaymentMethod(id: number, withDeleted: boolean): Promise<PaymentMethod> {
  const method = await repoGetPaymentMethod(id, { withDeleted });
  if (!method) throw new NotFoundError(`Payment method ${id} not found`);
  return method;
}

function logOutcome(operation: GatewayOperation | "cancel", method: PaymentMethod, response: GatewayResponse) {
  logger.info(
    `[Gateway] ${operation} via ${method.type} #${method.id}: ${response.success ? "success" : "failure"}` +
      (response.success ? "" : ` (${response.message})`)
  );
  return response;
}

export async function svcAuthorize(
  id: number,
  amount: number,
  source: PaymentSource | null,
  options?: GatewayTransactionOptions
) {
  const method = await loadPaymentMethod(id, false);
  return logOutcome("authorize", method, await dispatch.authorize(method, amount, source, options));
}

export async function svcPurchase(
  id: number,
  amount: number,
  source: PaymentSource | null,
  options?: GatewayTransactionOptions
) {
  const method = await loadPaymentMethod(id, false);
  return logOutcome("purchase", method, await dispatch.purchase(method, amount, source, options));
}

export async function svcCapture(id: number, amount: number, authorization: string, options?: GatewayTransactionOptions) {
  const method = await loadPaymentMethod(id, true);
  return logOutcome("capture", method, await dispatch.capture(method, amount, authorization, options));
}

export async function svcVoid(id: number, authorization: string, options?: GatewayTransactionOptions) {
  const method = await loadPaymentMethod(id, true);
  return logOutcome("void", method, await dispatch.voidTransaction(method, authorization, options));
}

export async function svcCredit(id: number, amount: number, authorization: string, options?: GatewayTransactionOptions) {
  const method = await loadPaymentMethod(id, true);
  return logOutcome("credit", method, await dispatch.credit(method, amount, authorization, options));
}

export async function svcCancel(id: number, authorization: string) {
  const method = await loadPaymentMethod(id, true);
  return logOutcome("cancel", method, await dispatch.cancel(method, authorization));
}
