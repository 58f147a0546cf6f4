import type { GatewayClass, GatewayResponse, PaymentGateway } from "../gateways/gateway.types";
import type { PreferenceSchema } from "../lib/preferences";
import type {
  OrderRef,
  PaymentMethod,
  PaymentSource,
  PaymentSourceKind,
} from "../types/payment-method.types";

/**
 * Behaviour of one kind of payment method, looked up by the record's `type`.
 * Optional entries fall back to the defaults in `lib/capabilities`.
 */
export type PaymentMethodVariant = {
  type: string;
  label: string;
  preferences: PreferenceSchema;
  gatewayClass?: () => GatewayClass;
  /** @deprecated use `gatewayClass` */
  providerClass?: () => GatewayClass;
  /** `null`: the method keeps no reusable source (e.g. cheques) */
  paymentSourceClass?: () => PaymentSourceKind | null;
  paymentProfilesSupported?: boolean;
  sourceRequired?: boolean;
  reusableSources?: (method: PaymentMethod, order: OrderRef) => Promise<PaymentSource[]>;
  supports?: (method: PaymentMethod, source: PaymentSource) => boolean;
  cancel?: (gateway: PaymentGateway, authorization: string) => Promise<GatewayResponse>;
};
