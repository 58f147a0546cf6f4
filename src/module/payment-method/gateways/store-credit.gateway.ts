import { randomUUID } from "node:crypto";
import { InProcessGateway } from "./base.gateway";
import type { GatewayResponse, GatewayTransactionOptions } from "./gateway.types";
import type { PaymentSource } from "../types/payment-method.types";

export const STORE_CREDIT_AUTHORIZE_FAILURE = "Unable to authorize store credit";

/**
 * Spends customer store credit. The caller passes the credit balance as the
 * payment source; bookkeeping of the balance happens outside the gateway.
 */
export class StoreCreditGateway extends InProcessGateway {
  static readonly displayName = "Store Credit";

  async authorize(amount: number, source: PaymentSource | null, options?: GatewayTransactionOptions) {
    return this.spend("authorize", amount, source, options);
  }

  async purchase(amount: number, source: PaymentSource | null, options?: GatewayTransactionOptions) {
    return this.spend("purchase", amount, source, options);
  }

  async capture(amount: number, authorization: string, _options?: GatewayTransactionOptions) {
    return this.respond(true, `Successfully captured ${amount} of store credit`, { authorization });
  }

  async void(authorization: string, _options?: GatewayTransactionOptions) {
    return this.respond(true, "Successfully voided store credit", { authorization });
  }

  async credit(amount: number, authorization: string, _options?: GatewayTransactionOptions) {
    return this.respond(true, `Successfully credited ${amount} of store credit`, { authorization });
  }

  private spend(
    action: "authorize" | "purchase",
    amount: number,
    source: PaymentSource | null,
    options?: GatewayTransactionOptions
  ): GatewayResponse {
    if (source?.kind !== "store_credit") {
      return this.respond(false, "Store credit payments require a store credit source");
    }
    if (options?.currency !== undefined && options.currency !== source.currency) {
      return this.respond(false, `Store credit currency ${source.currency} does not match ${String(options.currency)}`);
    }
    if (amount > source.amount_remaining) {
      return this.respond(false, STORE_CREDIT_AUTHORIZE_FAILURE, {
        params: { amount, amount_remaining: source.amount_remaining },
      });
    }

    const verb = action === "authorize" ? "authorized" : "purchased";
    return this.respond(true, `Successfully ${verb} ${amount} of store credit`, {
      authorization: randomUUID(),
    });
  }
}
