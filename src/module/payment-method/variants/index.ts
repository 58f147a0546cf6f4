import { bogusCreditCardVariant, simpleBogusCreditCardVariant } from "./bogus-credit-card.variant";
import { checkVariant } from "./check.variant";
import { registerPaymentMethodVariant } from "./registry";
import { storeCreditVariant } from "./store-credit.variant";

for (const variant of [checkVariant, storeCreditVariant, bogusCreditCardVariant, simpleBogusCreditCardVariant]) {
  registerPaymentMethodVariant(variant);
}

export {
  getPaymentMethodVariant,
  isRegisteredPaymentMethodType,
  listPaymentMethodVariants,
  registerPaymentMethodVariant,
  requirePaymentMethodVariant,
  unregisterPaymentMethodVariant,
} from "./registry";
export type { PaymentMethodVariant } from "./variant.types";
export { CHECK_TYPE } from "./check.variant";
export { STORE_CREDIT_TYPE } from "./store-credit.variant";
export { BOGUS_CREDIT_CARD_TYPE, SIMPLE_BOGUS_CREDIT_CARD_TYPE } from "./bogus-credit-card.variant";
