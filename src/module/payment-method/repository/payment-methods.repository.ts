import pool from "../../../config/database";
import { HttpError } from "../../../utils/httpError";
import { storedPreferencesSchema } from "../lib/preferences";
import { repoReplaceStoreLinks } from "./stores.repository";
import type {
  PaymentMethod,
  PaymentMethodDraft,
  PaymentMethodScope,
  PaymentMethodUpdate,
} from "../types/payment-method.types";

const SELECT_COLUMNS = `
  pm.id::text AS id,
  pm.type,
  pm.name,
  pm.description,
  pm.active,
  pm.available_to_users,
  pm.available_to_admin,
  pm.auto_capture,
  pm.position,
  pm.preferences,
  pm.deleted_at::text AS deleted_at,
  pm.created_at::text AS created_at,
  pm.updated_at::text AS updated_at
`;

// serializes position bookkeeping (create / move / delete)
const POSITION_LOCK_SQL = `SELECT pg_advisory_xact_lock(hashtext('payment_methods.position'))`;

type PaymentMethodRow = Omit<PaymentMethod, "id" | "preferences"> & {
  id: string;
  preferences: unknown;
};

function toInt(value: unknown, label = "id"): number {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\d+$/.test(value)) return Number.parseInt(value, 10);
  throw new Error(`Invalid ${label}: ${String(value)}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

type PgErrorInfo = { code: string | null; constraint: string | null };

function getPgErrorInfo(err: unknown): PgErrorInfo {
  if (!isRecord(err)) return { code: null, constraint: null };
  const code = typeof err.code === "string" ? err.code : null;
  const constraint = typeof err.constraint === "string" ? err.constraint : null;
  return { code, constraint };
}

function toPgHttpError(err: unknown): unknown {
  const { code, constraint } = getPgErrorInfo(err);
  if (code === "23503" && constraint === "store_payment_methods_store_id_fkey") {
    return new HttpError(404, "STORE_NOT_FOUND", "Unknown store");
  }
  if (code === "23505") {
    return new HttpError(409, "CONFLICT", "Duplicate payment method data", { constraint });
  }
  return err;
}

function mapRow(r: PaymentMethodRow): PaymentMethod {
  const id = toInt(r.id, "payment_method.id");
  const preferences = storedPreferencesSchema.safeParse(r.preferences ?? {});
  if (!preferences.success) {
    throw new Error(`Invalid preferences stored for payment method ${id}`);
  }
  return { ...r, id, preferences: preferences.data };
}

type ScopeWhere = { whereSql: string; values: unknown[] };
function buildScopeWhere(scope: PaymentMethodScope): ScopeWhere {
  const where: string[] = ["pm.deleted_at IS NULL"];
  const values: unknown[] = [];
  const push = (v: unknown) => {
    values.push(v);
    return `$${values.length}`;
  };

  if (scope.active !== undefined) {
    where.push(`pm.active = ${push(scope.active)}`);
  }
  if (scope.available_to_users !== undefined) {
    where.push(`pm.available_to_users = ${push(scope.available_to_users)}`);
  }
  if (scope.available_to_admin !== undefined) {
    where.push(`pm.available_to_admin = ${push(scope.available_to_admin)}`);
  }
  if (scope.type !== undefined) {
    where.push(`pm.type = ${push(scope.type)}`);
  }
  if (scope.ids !== undefined) {
    where.push(`pm.id = ANY(${push(scope.ids)}::bigint[])`);
  }

  return { whereSql: `WHERE ${where.join(" AND ")}`, values };
}

export async function repoListPaymentMethods(scope: PaymentMethodScope = {}): Promise<PaymentMethod[]> {
  const { whereSql, values } = buildScopeWhere(scope);
  const orderSql = scope.ordered ? "ORDER BY pm.position ASC, pm.id ASC" : "ORDER BY pm.id ASC";

  const { rows } = await pool.query<PaymentMethodRow>(
    `
    SELECT ${SELECT_COLUMNS}
    FROM payment_methods pm
    ${whereSql}
    ${orderSql}
    `,
    values
  );
  return rows.map(mapRow);
}

export async function repoGetPaymentMethod(id: number, opts: { withDeleted?: boolean } = {}): Promise<PaymentMethod | null> {
  const deletedSql = opts.withDeleted ? "" : "AND pm.deleted_at IS NULL";
  const { rows } = await pool.query<PaymentMethodRow>(
    `
    SELECT ${SELECT_COLUMNS}
    FROM payment_methods pm
    WHERE pm.id = $1 ${deletedSql}
    `,
    [id]
  );
  const r = rows[0] ?? null;
  return r ? mapRow(r) : null;
}

export async function repoHasActivePaymentMethodOfType(type: string): Promise<boolean> {
  const { rows } = await pool.query<{ exists: boolean }>(
    `
    SELECT EXISTS (
      SELECT 1 FROM payment_methods
      WHERE type = $1 AND active = true AND deleted_at IS NULL
    ) AS exists
    `,
    [type]
  );
  return rows[0]?.exists ?? false;
}

export async function repoCreatePaymentMethod(draft: PaymentMethodDraft, storeIds?: number[]): Promise<PaymentMethod> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    await client.query(POSITION_LOCK_SQL);

    const posRes = await client.query<{ position: number }>(
      `SELECT COALESCE(MAX(position), 0)::int + 1 AS position FROM payment_methods WHERE deleted_at IS NULL`
    );
    const position = posRes.rows[0]?.position ?? 1;

    const ins = await client.query<PaymentMethodRow>(
      `
      INSERT INTO payment_methods AS pm (
        type,
        name,
        description,
        active,
        available_to_users,
        available_to_admin,
        auto_capture,
        position,
        preferences
      ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9::jsonb)
      RETURNING ${SELECT_COLUMNS}
      `,
      [
        draft.type,
        draft.name,
        draft.description,
        draft.active,
        draft.available_to_users,
        draft.available_to_admin,
        draft.auto_capture,
        position,
        JSON.stringify(draft.preferences),
      ]
    );
    const row = ins.rows[0];
    if (!row) throw new Error("Failed to insert payment method");
    const created = mapRow(row);

    if (storeIds !== undefined) {
      await repoReplaceStoreLinks(client, created.id, storeIds);
    }

    await client.query("COMMIT");
    return created;
  } catch (err) {
    await client.query("ROLLBACK");
    throw toPgHttpError(err);
  } finally {
    client.release();
  }
}

/**
 * Locks the row, lets `applyPatch` compute the change from the locked
 * values, then writes it in the same transaction.
 */
export async function repoUpdatePaymentMethod(
  id: number,
  applyPatch: (current: PaymentMethod) => PaymentMethodUpdate,
  storeIds?: number[]
): Promise<PaymentMethod | null> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");

    const cur = await client.query<PaymentMethodRow>(
      `
      SELECT ${SELECT_COLUMNS}
      FROM payment_methods pm
      WHERE pm.id = $1 AND pm.deleted_at IS NULL
      FOR UPDATE
      `,
      [id]
    );
    const currentRow = cur.rows[0] ?? null;
    if (!currentRow) {
      await client.query("ROLLBACK");
      return null;
    }

    const patch = applyPatch(mapRow(currentRow));

    const sets: string[] = [];
    const values: unknown[] = [id];
    const push = (v: unknown) => {
      values.push(v);
      return `$${values.length}`;
    };

    if (patch.name !== undefined) sets.push(`name = ${push(patch.name)}`);
    if (patch.description !== undefined) sets.push(`description = ${push(patch.description)}`);
    if (patch.active !== undefined) sets.push(`active = ${push(patch.active)}`);
    if (patch.available_to_users !== undefined) sets.push(`available_to_users = ${push(patch.available_to_users)}`);
    if (patch.available_to_admin !== undefined) sets.push(`available_to_admin = ${push(patch.available_to_admin)}`);
    if (patch.auto_capture !== undefined) sets.push(`auto_capture = ${push(patch.auto_capture)}`);
    if (patch.preferences !== undefined) sets.push(`preferences = ${push(JSON.stringify(patch.preferences))}::jsonb`);
    sets.push(`updated_at = now()`);

    const upd = await client.query<PaymentMethodRow>(
      `
      UPDATE payment_methods pm
      SET ${sets.join(", ")}
      WHERE pm.id = $1
      RETURNING ${SELECT_COLUMNS}
      `,
      values
    );
    const row = upd.rows[0];
    if (!row) throw new Error(`Failed to update payment method ${id}`);

    if (storeIds !== undefined) {
      await repoReplaceStoreLinks(client, id, storeIds);
    }

    await client.query("COMMIT");
    return mapRow(row);
  } catch (err) {
    await client.query("ROLLBACK");
    throw toPgHttpError(err);
  } finally {
    client.release();
  }
}

/**
 * Moves a method to `position` (1-based, clamped to the list length) and
 * shifts the methods in between so positions stay contiguous.
 */
export async function repoMovePaymentMethod(id: number, position: number): Promise<PaymentMethod | null> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    await client.query(POSITION_LOCK_SQL);

    const cur = await client.query<{ position: number }>(
      `SELECT position FROM payment_methods WHERE id = $1 AND deleted_at IS NULL`,
      [id]
    );
    const current = cur.rows[0]?.position;
    if (current === undefined) {
      await client.query("ROLLBACK");
      return null;
    }

    const countRes = await client.query<{ total: number }>(
      `SELECT COUNT(*)::int AS total FROM payment_methods WHERE deleted_at IS NULL`
    );
    const total = countRes.rows[0]?.total ?? 1;
    const target = Math.min(position, total);

    if (target < current) {
      await client.query(
        `UPDATE payment_methods SET position = position + 1
         WHERE deleted_at IS NULL AND position >= $1 AND position < $2`,
        [target, current]
      );
    } else if (target > current) {
      await client.query(
        `UPDATE payment_methods SET position = position - 1
         WHERE deleted_at IS NULL AND position > $1 AND position <= $2`,
        [current, target]
      );
    }

    const upd = await client.query<PaymentMethodRow>(
      `
      UPDATE payment_methods pm
      SET position = $2, updated_at = now()
      WHERE pm.id = $1
      RETURNING ${SELECT_COLUMNS}
      `,
      [id, target]
    );

    await client.query("COMMIT");
    const row = upd.rows[0] ?? null;
    return row ? mapRow(row) : null;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

/** Marks the method deleted and closes the gap it leaves in the ordering. */
export async function repoSoftDeletePaymentMethod(id: number): Promise<boolean> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    await client.query(POSITION_LOCK_SQL);

    const del = await client.query<{ position: number }>(
      `
      UPDATE payment_methods
      SET deleted_at = now(), updated_at = now()
      WHERE id = $1 AND deleted_at IS NULL
      RETURNING position
      `,
      [id]
    );
    const position = del.rows[0]?.position;
    if (position === undefined) {
      await client.query("ROLLBACK");
      return false;
    }

    await client.query(
      `UPDATE payment_methods SET position = position - 1 WHERE deleted_at IS NULL AND position > $1`,
      [position]
    );

    await client.query("COMMIT");
    return true;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}
