import type { RequestHandler } from "express";
import { asyncHandler } from "../../../utils/asyncHandler";
import {
  createPaymentMethodBodySchema,
  getPaymentMethodQuerySchema,
  listPaymentMethodsQuerySchema,
  movePaymentMethodBodySchema,
  paymentMethodIdParamsSchema,
  paymentMethodTypeParamsSchema,
  reusableSourcesQuerySchema,
  updatePaymentMethodBodySchema,
} from "../validators/payment-method.validators";
import {
  svcCreatePaymentMethod,
  svcDeletePaymentMethod,
  svcGetPaymentMethod,
  svcHasActiveVariant,
  svcListPaymentMethods,
  svcListVariants,
  svcMovePaymentMethod,
  svcReusableSources,
  svcUpdatePaymentMethod,
} from "../services/payment-methods.service";

export const listPaymentMethods: RequestHandler = asyncHandler(async (req, res) => {
  const query = listPaymentMethodsQuerySchema.parse(req.query);
  const items = await svcListPaymentMethods(query);
  res.json({ items, total: items.length });
});

export const listVariants: RequestHandler = (_req, res) => {
  res.json({ items: svcListVariants() });
};

export const hasActiveVariant: RequestHandler = asyncHandler(async (req, res) => {
  const { type } = paymentMethodTypeParamsSchema.parse(req.params);
  const active = await svcHasActiveVariant(type);
  res.json({ type, active });
});

export const getPaymentMethod: RequestHandler = asyncHandler(async (req, res) => {
  const { id } = paymentMethodIdParamsSchema.parse(req.params);
  const { with_deleted } = getPaymentMethodQuerySchema.parse(req.query);

  const paymentMethod = await svcGetPaymentMethod(id, { withDeleted: with_deleted });
  if (!paymentMethod) {
    res.status(404).json({ error: "Not found" });
    return;
  }
  res.json({ paymentMethod });
});

export const getReusableSources: RequestHandler = asyncHandler(async (req, res) => {
  const { id } = paymentMethodIdParamsSchema.parse(req.params);
  const { user_id, order_id } = reusableSourcesQuerySchema.parse(req.query);

  const items = await svcReusableSources(id, { id: order_id ?? null, user_id: user_id ?? null });
  if (!items) {
    res.status(404).json({ error: "Not found" });
    return;
  }
  res.json({ items });
});

export const createPaymentMethod: RequestHandler = asyncHandler(async (req, res) => {
  const dto = createPaymentMethodBodySchema.parse(req.body);
  const paymentMethod = await svcCreatePaymentMethod(dto);
  res.status(201).json({ paymentMethod });
});

export const updatePaymentMethod: RequestHandler = asyncHandler(async (req, res) => {
  const { id } = paymentMethodIdParamsSchema.parse(req.params);
  const dto = updatePaymentMethodBodySchema.parse(req.body);
  if (Object.keys(dto).length === 0) {
    res.status(400).json({ error: "No fields to update" });
    return;
  }

  const paymentMethod = await svcUpdatePaymentMethod(id, dto);
  if (!paymentMethod) {
    res.status(404).json({ error: "Not found" });
    return;
  }
  res.json({ paymentMethod });
});

export const movePaymentMethod: RequestHandler = asyncHandler(async (req, res) => {
  const { id } = paymentMethodIdParamsSchema.parse(req.params);
  const { position } = movePaymentMethodBodySchema.parse(req.body);

  const paymentMethod = await svcMovePaymentMethod(id, position);
  if (!paymentMethod) {
    res.status(404).json({ error: "Not found" });
    return;
  }
  res.json({ paymentMethod });
});

export const deletePaymentMethod: RequestHandler = asyncHandler(async (req, res) => {
  const { id } = paymentMethodIdParamsSchema.parse(req.params);
  const ok = await svcDeletePaymentMethod(id);
  if (!ok) {
    res.status(404).json({ error: "Not found" });
    return;
  }
  res.status(204).send();
});
