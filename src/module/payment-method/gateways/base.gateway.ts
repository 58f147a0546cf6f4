import type { GatewayMode } from "../../../config/payments";
import type {
  GatewayContext,
  GatewayOptions,
  GatewayResponse,
  GatewayTransactionOptions,
  PaymentGateway,
} from "./gateway.types";
import type { PaymentSource } from "../types/payment-method.types";

/**
 * Shared plumbing for gateways that answer in process (test gateways,
 * offline methods). The mode comes from the constructor; there is no
 * process-wide test/live switch.
 */
export abstract class InProcessGateway implements PaymentGateway {
  public readonly mode: GatewayMode;
  protected readonly options: GatewayOptions;

  constructor(options: GatewayOptions, context: GatewayContext) {
    this.options = options;
    this.mode = context.mode;
  }

  abstract authorize(amount: number, source: PaymentSource | null, options?: GatewayTransactionOptions): Promise<GatewayResponse>;
  abstract purchase(amount: number, source: PaymentSource | null, options?: GatewayTransactionOptions): Promise<GatewayResponse>;
  abstract capture(amount: number, authorization: string, options?: GatewayTransactionOptions): Promise<GatewayResponse>;
  abstract void(authorization: string, options?: GatewayTransactionOptions): Promise<GatewayResponse>;
  abstract credit(amount: number, authorization: string, options?: GatewayTransactionOptions): Promise<GatewayResponse>;

  protected respond(
    success: boolean,
    message: string,
    extras: Partial<Pick<GatewayResponse, "authorization" | "params" | "avs_result">> = {}
  ): GatewayResponse {
    return {
      success,
      message,
      authorization: extras.authorization ?? null,
      test: this.mode === "test",
      params: extras.params ?? {},
      avs_result: extras.avs_result ?? null,
    };
  }
}
