import type { GatewayMode } from "../../../config/payments";
import type { PaymentSource, Preferences } from "../types/payment-method.types";

export type GatewayOptions = Preferences;

export type GatewayContext = {
  mode: GatewayMode;
};

export type GatewayTransactionOptions = {
  order_id?: string;
  currency?: string;
  ip?: string;
  [key: string]: unknown;
};

/**
 * Outcome of a gateway call. A declined or failed transaction is a response
 * with `success: false`, not an exception.
 */
export type GatewayResponse = {
  success: boolean;
  message: string;
  authorization: string | null;
  test: boolean;
  params: Record<string, unknown>;
  avs_result: { code: string } | null;
};

export interface PaymentGateway {
  readonly mode: GatewayMode;
  authorize(amount: number, source: PaymentSource | null, options?: GatewayTransactionOptions): Promise<GatewayResponse>;
  purchase(amount: number, source: PaymentSource | null, options?: GatewayTransactionOptions): Promise<GatewayResponse>;
  capture(amount: number, authorization: string, options?: GatewayTransactionOptions): Promise<GatewayResponse>;
  void(authorization: string, options?: GatewayTransactionOptions): Promise<GatewayResponse>;
  credit(amount: number, authorization: string, options?: GatewayTransactionOptions): Promise<GatewayResponse>;
}

export interface GatewayClass {
  new (options: GatewayOptions, context: GatewayContext): PaymentGateway;
  readonly displayName: string;
  /** card brands the gateway accepts; absent means any */
  readonly supportedCardTypes?: readonly string[];
}

export type GatewayOperation = "authorize" | "purchase" | "capture" | "void" | "credit";
