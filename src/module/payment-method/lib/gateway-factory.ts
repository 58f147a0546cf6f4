import logger from "../../../utils/logger";
import { paymentsConfig, type GatewayMode, type PaymentsConfig } from "../../../config/payments";
import { gatewayClass } from "./capabilities";
import { GatewayCache } from "./gateway-cache";
import { paymentMethodOptions } from "./payment-method";
import type { PaymentGateway } from "../gateways/gateway.types";
import type { PaymentMethod, PreferenceValue } from "../types/payment-method.types";

const gatewayCache = new GatewayCache();

/**
 * Maps the `server` preference to the mode the gateway is built with.
 * `"test"` means test, any other non-empty value means production.
 */
export function resolveGatewayMode(
  server: PreferenceValue | undefined,
  config: PaymentsConfig = paymentsConfig
): GatewayMode {
  if (typeof server !== "string" || server.trim() === "") {
    return config.defaultGatewayMode;
  }
  return server.trim() === "test" ? "test" : "production";
}

/**
 * Gateway of a payment method: built from its preference snapshot with the
 * mode passed explicitly, then cached per method.
 */
export function resolveGateway(
  method: Pick<PaymentMethod, "id" | "type" | "preferences">,
  config: PaymentsConfig = paymentsConfig
): PaymentGateway {
  const options = paymentMethodOptions(method);
  const mode = resolveGatewayMode(options.server, config);

  return gatewayCache.fetch(method, mode, () => {
    const GatewayClass = gatewayClass(method);

    logger.info(`[Gateway] Building ${GatewayClass.displayName} gateway for payment method ${method.id} (${mode})`);
    return new GatewayClass(options, { mode });
  });
}

export function invalidateGateway(paymentMethodId: number): void {
  gatewayCache.invalidate(paymentMethodId);
}

/**
 * Reset cached gateways (useful for testing)
 */
export function resetGatewayCache(): void {
  gatewayCache.clear();
}
