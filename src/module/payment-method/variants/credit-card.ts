import { repoListReusableCreditCards } from "../repository/credit-cards.repository";
import type { GatewayClass } from "../gateways/gateway.types";
import type { OrderRef, PaymentMethod, PaymentSource } from "../types/payment-method.types";

// Card-backed methods accept card sources whose brand the gateway takes; an unknown brand is let through.
export function supportsCardSource(gateway: GatewayClass) {
  return (_method: PaymentMethod, source: PaymentSource): boolean => {
    if (source.kind !== "credit_card") return false;
    if (!source.cc_type) return true;
    return gateway.supportedCardTypes?.includes(source.cc_type) ?? true;
  };
}

export async function reusableCardSources(method: PaymentMethod, order: OrderRef): Promise<PaymentSource[]> {
  if (order.user_id === null) return [];
  return repoListReusableCreditCards(method.id, order.user_id);
}
