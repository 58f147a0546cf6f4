import { InProcessGateway } from "./base.gateway";
import type { GatewayResponse, GatewayTransactionOptions } from "./gateway.types";
import type { PaymentSource } from "../types/payment-method.types";

const TEST_VISA = ["4111111111111111", "4012888888881881", "4222222222222"];
const TEST_MASTER = ["5500000000000004", "5555555555554444", "5105105105105100", "2223000010309703"];
const TEST_AMEX = ["378282246310005", "371449635398431", "378734493671000", "340000000000009"];
const TEST_DISCOVER = ["6011000000000004", "6011111111111117", "6011000990139424"];

export const BOGUS_VALID_NUMBERS: readonly string[] = ["1", ...TEST_VISA, ...TEST_MASTER, ...TEST_AMEX, ...TEST_DISCOVER];

export const BOGUS_AUTHORIZATION_CODE = "12345";
export const BOGUS_SUCCESS_MESSAGE = "Bogus Gateway: Forced success";
export const BOGUS_FAILURE_MESSAGE = "Bogus Gateway: Forced failure";
export const BOGUS_PROFILE_PREFIX = "BGS-";

/**
 * Test gateway. Known test card numbers (or a `BGS-` payment profile)
 * are approved, everything else is declined.
 */
export class BogusGateway extends InProcessGateway {
  static readonly displayName = "Bogus";
  static readonly supportedCardTypes: readonly string[] = [
    "visa",
    "master",
    "american_express",
    "discover",
    "diners_club",
    "jcb",
  ];

  async authorize(_amount: number, source: PaymentSource | null, _options?: GatewayTransactionOptions) {
    return this.approveCard(source);
  }

  async purchase(_amount: number, source: PaymentSource | null, _options?: GatewayTransactionOptions) {
    return this.approveCard(source);
  }

  async capture(_amount: number, authorization: string, _options?: GatewayTransactionOptions) {
    if (authorization === BOGUS_AUTHORIZATION_CODE) {
      return this.respond(true, BOGUS_SUCCESS_MESSAGE, { authorization });
    }
    return this.respond(false, BOGUS_FAILURE_MESSAGE, { params: { error: BOGUS_FAILURE_MESSAGE } });
  }

  async void(authorization: string, _options?: GatewayTransactionOptions) {
    return this.respond(true, BOGUS_SUCCESS_MESSAGE, { authorization });
  }

  async credit(_amount: number, _authorization: string, _options?: GatewayTransactionOptions) {
    return this.respond(true, BOGUS_SUCCESS_MESSAGE, { authorization: BOGUS_AUTHORIZATION_CODE });
  }

  private approveCard(source: PaymentSource | null): GatewayResponse {
    if (source?.kind === "credit_card") {
      const profile = source.gateway_customer_profile_id ?? source.gateway_payment_profile_id ?? null;
      const knownNumber = source.number !== undefined && BOGUS_VALID_NUMBERS.includes(source.number);

      if (knownNumber || profile?.startsWith(BOGUS_PROFILE_PREFIX)) {
        return this.respond(true, BOGUS_SUCCESS_MESSAGE, {
          authorization: BOGUS_AUTHORIZATION_CODE,
          avs_result: { code: "D" },
        });
      }
    }

    return this.respond(false, BOGUS_FAILURE_MESSAGE, { params: { message: BOGUS_FAILURE_MESSAGE } });
  }
}
