import pool from "../../../config/database";
import type { CreditCardSource } from "../types/payment-method.types";

type CreditCardRow = {
  id: string;
  month: number;
  year: number;
  name: string | null;
  cc_type: string | null;
  last_digits: string | null;
  gateway_customer_profile_id: string | null;
  gateway_payment_profile_id: string | null;
};

/** Cards the user saved with this payment method that the gateway can charge again. */
export async function repoListReusableCreditCards(paymentMethodId: number, userId: number): Promise<CreditCardSource[]> {
  const { rows } = await pool.query<CreditCardRow>(
    `
    SELECT
      cc.id::text AS id,
      cc.month,
      cc.year,
      cc.name,
      cc.cc_type,
      cc.last_digits,
      cc.gateway_customer_profile_id,
      cc.gateway_payment_profile_id
    FROM credit_cards cc
    WHERE cc.payment_method_id = $1
      AND cc.user_id = $2
      AND cc.gateway_payment_profile_id IS NOT NULL
      AND cc.deleted_at IS NULL
    ORDER BY cc.id ASC
    `,
    [paymentMethodId, userId]
  );

  return rows.map((r): CreditCardSource => ({
    kind: "credit_card",
    id: Number.parseInt(r.id, 10),
    month: r.month,
    year: r.year,
    name: r.name,
    cc_type: r.cc_type,
    last_digits: r.last_digits,
    gateway_customer_profile_id: r.gateway_customer_profile_id,
    gateway_payment_profile_id: r.gateway_payment_profile_id,
  }));
}
