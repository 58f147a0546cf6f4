import logger from "../../../utils/logger";
import { InvalidArgumentError, NotFoundError, NotImplementedError } from "../../../utils/errors";
import {
  gatewayClass,
  methodType,
  paymentProfilesSupported,
  paymentSourceClass,
  reusableSources,
  sourceRequired,
} from "../lib/capabilities";
import { displayOnScope, filterByStore, flagsFromDisplayOn } from "../lib/deprecation";
import { invalidateGateway } from "../lib/gateway-factory";
import { applyPaymentMethodUpdate, buildPaymentMethodDraft } from "../lib/payment-method";
import { listPaymentMethodVariants } from "../variants";
import {
  repoCreatePaymentMethod,
  repoGetPaymentMethod,
  repoHasActivePaymentMethodOfType,
  repoListPaymentMethods,
  repoMovePaymentMethod,
  repoSoftDeletePaymentMethod,
  repoUpdatePaymentMethod,
} from "../repository/payment-methods.repository";
import { repoGetStore } from "../repository/stores.repository";
import type {
  CreatePaymentMethodBodyDTO,
  ListPaymentMethodsQueryDTO,
  UpdatePaymentMethodBodyDTO,
} from "../validators/payment-method.validators";
import type {
  DisplayFlags,
  OrderRef,
  PaymentMethodScope,
  StoreRef,
} from "../types/payment-method.types";

/* ------------------------------ queries ------------------------------ */

export const svcOrderedByPosition = (scope: PaymentMethodScope = {}) =>
  repoListPaymentMethods({ ...scope, ordered: true });

export const svcActive = (scope: PaymentMethodScope = {}) => repoListPaymentMethods({ ...scope, active: true });

export const svcAvailableToUsers = (scope: PaymentMethodScope = {}) =>
  repoListPaymentMethods({ ...scope, available_to_users: true });

export const svcAvailableToAdmin = (scope: PaymentMethodScope = {}) =>
  repoListPaymentMethods({ ...scope, available_to_admin: true });

/**
 * Methods a store accepts. A store that never picked any accepts every
 * method; otherwise only the ones linked to it.
 */
export async function svcAvailableToStore(store: StoreRef | null | undefined, scope: PaymentMethodScope = {}) {
  if (!store) {
    throw new InvalidArgumentError("You must provide a store");
  }
  if (store.payment_method_ids.length === 0) {
    return repoListPaymentMethods(scope);
  }
  return repoListPaymentMethods({ ...scope, ids: store.payment_method_ids });
}

/**
 * @deprecated compose `svcActive`, `svcAvailableToUsers`, `svcAvailableToAdmin`
 * and `svcAvailableToStore` instead
 */
export async function svcAvailable(displayOn?: string | null, store?: StoreRef | null, scope: PaymentMethodScope = {}) {
  logger.deprecation(
    "PaymentMethod.available is deprecated, use the active / available_to_users / available_to_admin scopes " +
      "and available_to_store(store) for store-specific methods"
  );
  const methods = await repoListPaymentMethods({ ...displayOnScope(displayOn), ...scope, ordered: true });
  return filterByStore(methods, store);
}

export const svcHasActiveVariant = (type: string) => repoHasActivePaymentMethodOfType(type);

export const svcFindIncludingDeleted = (id: number) => repoGetPaymentMethod(id, { withDeleted: true });

export const svcGetPaymentMethod = (id: number, opts: { withDeleted?: boolean } = {}) =>
  opts.withDeleted ? svcFindIncludingDeleted(id) : repoGetPaymentMethod(id);

export async function svcGetStore(id: number): Promise<StoreRef> {
  const store = await repoGetStore(id);
  if (!store) throw new NotFoundError(`Store ${id} not found`);
  return store;
}

/** Query endpoint: composes the scopes requested in the query string. */
export async function svcListPaymentMethods(query: ListPaymentMethodsQueryDTO) {
  const store = query.store_id !== undefined ? await svcGetStore(query.store_id) : null;

  // flags given explicitly narrow (or override) what display_on selects
  const scope: PaymentMethodScope = {
    ...(query.active !== undefined && { active: query.active }),
    ...(query.available_to_users !== undefined && { available_to_users: query.available_to_users }),
    ...(query.available_to_admin !== undefined && { available_to_admin: query.available_to_admin }),
  };

  if (query.display_on !== undefined) {
    return svcAvailable(query.display_on, store, scope);
  }

  const ordered: PaymentMethodScope = { ...scope, ordered: true };
  return store ? svcAvailableToStore(store, ordered) : svcOrderedByPosition(ordered);
}

type Capability<T> = { implemented: true; value: T } | { implemented: false };

function readCapability<T>(read: () => T): Capability<T> {
  try {
    return { implemented: true, value: read() };
  } catch (err) {
    if (err instanceof NotImplementedError) return { implemented: false };
    throw err;
  }
}

/**
 * Registered variants as seen through the capability lookups. A capability
 * the variant does not implement is listed under `not_implemented`, and
 * `payment_source_class` is left out when it is one of them.
 */
export function svcListVariants() {
  return listPaymentMethodVariants().map((v) => {
    const gateway = readCapability(() => gatewayClass(v));
    const source = readCapability(() => paymentSourceClass(v));
    const notImplemented = [!gateway.implemented && "gatewayClass", !source.implemented && "paymentSourceClass"].filter(
      (c): c is string => typeof c === "string"
    );

    return {
      type: v.type,
      label: v.label,
      method_type: methodType(v),
      gateway: gateway.implemented ? gateway.value.displayName : null,
      ...(source.implemented && { payment_source_class: source.value }),
      payment_profiles_supported: paymentProfilesSupported(v),
      source_required: sourceRequired(v),
      not_implemented: notImplemented,
    };
  });
}

export async function svcReusableSources(id: number, order: OrderRef) {
  const method = await repoGetPaymentMethod(id);
  if (!method) return null;
  return reusableSources(method, order);
}

/* ------------------------------ administration ------------------------------ */

// explicit flags win over the legacy display_on
function displayFlags(dto: {
  display_on?: string;
  available_to_users?: boolean;
  available_to_admin?: boolean;
}): Partial<DisplayFlags> {
  const legacy = dto.display_on !== undefined ? flagsFromDisplayOn(dto.display_on) : {};
  return {
    ...legacy,
    ...(dto.available_to_users !== undefined && { available_to_users: dto.available_to_users }),
    ...(dto.available_to_admin !== undefined && { available_to_admin: dto.available_to_admin }),
  };
}

export async function svcCreatePaymentMethod(dto: CreatePaymentMethodBodyDTO) {
  const draft = buildPaymentMethodDraft({
    type: dto.type,
    name: dto.name,
    description: dto.description,
    active: dto.active,
    auto_capture: dto.auto_capture,
    preferences: dto.preferences,
    ...displayFlags(dto),
  });

  const created = await repoCreatePaymentMethod(draft, dto.store_ids);
  logger.info(`[PaymentMethod] Created ${created.type} #${created.id} "${created.name}" at position ${created.position}`);
  return created;
}

// preferences are merged into the row as locked by the update transaction
export async function svcUpdatePaymentMethod(id: number, dto: UpdatePaymentMethodBodyDTO) {
  const updated = await repoUpdatePaymentMethod(
    id,
    (current) =>
      applyPaymentMethodUpdate(current, {
        name: dto.name,
        description: dto.description,
        active: dto.active,
        auto_capture: dto.auto_capture,
        preferences: dto.preferences,
        ...displayFlags(dto),
      }),
    dto.store_ids
  );
  if (updated) invalidateGateway(id);
  return updated;
}

export const svcMovePaymentMethod = (id: number, position: number) => repoMovePaymentMethod(id, position);

export async function svcDeletePaymentMethod(id: number) {
  const ok = await repoSoftDeletePaymentMethod(id);
  if (ok) {
    invalidateGateway(id);
    logger.info(`[PaymentMethod] Soft-deleted payment method #${id}`);
  }
  return ok;
}
