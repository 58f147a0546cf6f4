export type PreferenceValue = string | number | boolean | null;

export type Preferences = Record<string, PreferenceValue>;

export type PaymentMethod = {
  id: number;
  type: string;
  name: string;
  description: string | null;
  active: boolean;
  available_to_users: boolean;
  available_to_admin: boolean;
  auto_capture: boolean | null; // null → global default
  position: number;
  preferences: Preferences;
  deleted_at: string | null;
  created_at: string;
  updated_at: string;
};

export type PaymentMethodDraft = Pick<
  PaymentMethod,
  "type" | "name" | "description" | "active" | "available_to_users" | "available_to_admin" | "auto_capture" | "preferences"
>;

export type PaymentMethodUpdate = Partial<
  Pick<
    PaymentMethod,
    "name" | "description" | "active" | "available_to_users" | "available_to_admin" | "auto_capture" | "preferences"
  >
>;

/** Composable filters; every field left undefined is not filtered on. */
export type PaymentMethodScope = {
  active?: boolean;
  available_to_users?: boolean;
  available_to_admin?: boolean;
  type?: string;
  ids?: number[];
  ordered?: boolean;
};

export type StoreRef = {
  id: number;
  name: string;
  code: string;
  payment_method_ids: number[];
};

export type OrderRef = {
  id: number | null;
  user_id: number | null;
};

export type DisplayOn = "both" | "front_end" | "back_end";

export type DisplayFlags = Pick<PaymentMethod, "available_to_users" | "available_to_admin">;

export type CreditCardSource = {
  kind: "credit_card";
  id?: number;
  number?: string;
  last_digits?: string | null;
  month: number;
  year: number;
  name?: string | null;
  cc_type?: string | null;
  gateway_customer_profile_id?: string | null;
  gateway_payment_profile_id?: string | null;
};

export type StoreCreditSource = {
  kind: "store_credit";
  id?: number;
  amount_remaining: number;
  currency: string;
};

export type PaymentSource = CreditCardSource | StoreCreditSource;

export type PaymentSourceKind = PaymentSource["kind"];

export type PaymentMethodInput = {
  type: string;
  name: string;
  description?: string | null;
  active?: boolean;
  available_to_users?: boolean;
  available_to_admin?: boolean;
  auto_capture?: boolean | null;
  preferences?: Preferences;
};
