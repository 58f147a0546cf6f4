import { CheckGateway } from "../gateways/check.gateway";
import { basePreferenceShape, definePreferences } from "../lib/preferences";
import type { PaymentMethodVariant } from "./variant.types";

export const CHECK_TYPE = "Check";

export const checkVariant: PaymentMethodVariant = {
  type: CHECK_TYPE,
  label: "Check",
  preferences: definePreferences(basePreferenceShape),
  gatewayClass: () => CheckGateway,
  paymentSourceClass: () => null,
  sourceRequired: false,
  cancel: (gateway, authorization) => gateway.void(authorization),
};
