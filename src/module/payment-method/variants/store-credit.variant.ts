import { StoreCreditGateway } from "../gateways/store-credit.gateway";
import { basePreferenceShape, definePreferences } from "../lib/preferences";
import type { PaymentMethodVariant } from "./variant.types";

export const STORE_CREDIT_TYPE = "StoreCredit";

export const storeCreditVariant: PaymentMethodVariant = {
  type: STORE_CREDIT_TYPE,
  label: "Store Credit",
  preferences: definePreferences(basePreferenceShape),
  gatewayClass: () => StoreCreditGateway,
  paymentSourceClass: () => "store_credit",
  supports: (_method, source) => source.kind === "store_credit",
  cancel: (gateway, authorization) => gateway.void(authorization),
};
