import type { PoolClient } from "pg";
import pool from "../../../config/database";
import type { StoreRef } from "../types/payment-method.types";

type StoreRow = {
  id: string;
  name: string;
  code: string;
  payment_method_ids: string[];
};

/**
 * Store with the ids of its payment methods. Links to soft-deleted methods
 * are not counted, so a store whose only methods were deleted is unrestricted again.
 */
export async function repoGetStore(id: number): Promise<StoreRef | null> {
  const { rows } = await pool.query<StoreRow>(
    `
    SELECT
      s.id::text AS id,
      s.name,
      s.code,
      COALESCE(
        array_agg(pm.id::text ORDER BY pm.id) FILTER (WHERE pm.id IS NOT NULL),
        '{}'
      ) AS payment_method_ids
    FROM stores s
    LEFT JOIN store_payment_methods spm ON spm.store_id = s.id
    LEFT JOIN payment_methods pm ON pm.id = spm.payment_method_id AND pm.deleted_at IS NULL
    WHERE s.id = $1
    GROUP BY s.id, s.name, s.code
    `,
    [id]
  );

  const r = rows[0] ?? null;
  if (!r) return null;

  return {
    id: Number.parseInt(r.id, 10),
    name: r.name,
    code: r.code,
    payment_method_ids: r.payment_method_ids.map((x) => Number.parseInt(x, 10)),
  };
}

// runs inside the caller's transaction
export async function repoReplaceStoreLinks(client: PoolClient, paymentMethodId: number, storeIds: number[]) {
  await client.query(`DELETE FROM store_payment_methods WHERE payment_method_id = $1`, [paymentMethodId]);
  if (storeIds.length === 0) return;

  await client.query(
    `
    INSERT INTO store_payment_methods (store_id, payment_method_id)
    SELECT DISTINCT unnest($1::bigint[]), $2
    `,
    [storeIds, paymentMethodId]
  );
}
