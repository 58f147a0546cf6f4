import { BogusGateway } from "../gateways/bogus.gateway";
import { definePreferences, gatewayPreferenceShape } from "../lib/preferences";
import { reusableCardSources, supportsCardSource } from "./credit-card";
import type { PaymentMethodVariant } from "./variant.types";

export const BOGUS_CREDIT_CARD_TYPE = "BogusCreditCard";
export const SIMPLE_BOGUS_CREDIT_CARD_TYPE = "SimpleBogusCreditCard";

export const bogusCreditCardVariant: PaymentMethodVariant = {
  type: BOGUS_CREDIT_CARD_TYPE,
  label: "Bogus Credit Card",
  preferences: definePreferences(gatewayPreferenceShape),
  gatewayClass: () => BogusGateway,
  paymentSourceClass: () => "credit_card",
  paymentProfilesSupported: true,
  reusableSources: reusableCardSources,
  supports: supportsCardSource(BogusGateway),
  cancel: (gateway, authorization) => gateway.void(authorization),
};

// Same gateway without stored payment profiles
export const simpleBogusCreditCardVariant: PaymentMethodVariant = {
  ...bogusCreditCardVariant,
  type: SIMPLE_BOGUS_CREDIT_CARD_TYPE,
  label: "Simple Bogus Credit Card",
  paymentProfilesSupported: false,
};
