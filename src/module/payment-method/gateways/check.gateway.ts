import { InProcessGateway } from "./base.gateway";
import type { GatewayTransactionOptions } from "./gateway.types";
import type { PaymentSource } from "../types/payment-method.types";

// Cheques are settled offline; the gateway only records that the step happened.
export class CheckGateway extends InProcessGateway {
  static readonly displayName = "Check";

  async authorize(_amount: number, _source: PaymentSource | null, _options?: GatewayTransactionOptions) {
    return this.respond(true, "");
  }

  async purchase(_amount: number, _source: PaymentSource | null, _options?: GatewayTransactionOptions) {
    return this.respond(true, "");
  }

  async capture(_amount: number, authorization: string, _options?: GatewayTransactionOptions) {
    return this.respond(true, "", { authorization });
  }

  async void(authorization: string, _options?: GatewayTransactionOptions) {
    return this.respond(true, "", { authorization });
  }

  async credit(_amount: number, authorization: string, _options?: GatewayTransactionOptions) {
    return this.respond(true, "", { authorization });
  }
}
