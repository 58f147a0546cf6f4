import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const paymentsEnvSchema = z.object({
  PAYMENT_AUTO_CAPTURE: booleanFlag.optional().default("false"),
  PAYMENT_GATEWAY_DEFAULT_MODE: z.enum(["test", "production"]).optional().default("production"),
});

export type GatewayMode = "test" | "production";

export type PaymentsConfig = {
  /** used by payment methods whose own auto_capture is unset */
  autoCapture: boolean;
  /** mode for gateways of payment methods without a `server` preference */
  defaultGatewayMode: GatewayMode;
};

export function loadPaymentsConfig(env: NodeJS.ProcessEnv = process.env): PaymentsConfig {
  const parsed = paymentsEnvSchema.parse({
    PAYMENT_AUTO_CAPTURE: env.PAYMENT_AUTO_CAPTURE || undefined,
    PAYMENT_GATEWAY_DEFAULT_MODE: env.PAYMENT_GATEWAY_DEFAULT_MODE || undefined,
  });

  return {
    autoCapture: parsed.PAYMENT_AUTO_CAPTURE,
    defaultGatewayMode: parsed.PAYMENT_GATEWAY_DEFAULT_MODE,
  };
}

export const paymentsConfig: PaymentsConfig = loadPaymentsConfig();
