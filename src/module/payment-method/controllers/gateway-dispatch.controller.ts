import type { RequestHandler } from "express";
import { asyncHandler } from "../../../utils/asyncHandler";
import {
  cancelBodySchema,
  captureBodySchema,
  creditBodySchema,
  paymentMethodIdParamsSchema,
  sourceTransactionBodySchema,
  voidBodySchema,
} from "../validators/payment-method.validators";
import {
  svcAuthorize,
  svcCancel,
  svcCapture,
  svcCredit,
  svcPurchase,
  svcVoid,
} from "../services/gateway-dispatch.service";

// The gateway response is returned as is; a declined transaction is still a 200.

export const authorizePayment: RequestHandler = asyncHandler(async (req, res) => {
  const { id } = paymentMethodIdParamsSchema.parse(req.params);
  const { amount, source, options } = sourceTransactionBodySchema.parse(req.body);
  res.json(await svcAuthorize(id, amount, source, options));
});

export const purchasePayment: RequestHandler = asyncHandler(async (req, res) => {
  const { id } = paymentMethodIdParamsSchema.parse(req.params);
  const { amount, source, options } = sourceTransactionBodySchema.parse(req.body);
  res.json(await svcPurchase(id, amount, source, options));
});

export const capturePayment: RequestHandler = asyncHandler(async (req, res) => {
  const { id } = paymentMethodIdParamsSchema.parse(req.params);
  const { amount, authorization, options } = captureBodySchema.parse(req.body);
  res.json(await svcCapture(id, amount, authorization, options));
});

export const voidPayment: RequestHandler = asyncHandler(async (req, res) => {
  const { id } = paymentMethodIdParamsSchema.parse(req.params);
  const { authorization, options } = voidBodySchema.parse(req.body);
  res.json(await svcVoid(id, authorization, options));
});

export const creditPayment: RequestHandler = asyncHandler(async (req, res) => {
  const { id } = paymentMethodIdParamsSchema.parse(req.params);
  const { amount, authorization, options } = creditBodySchema.parse(req.body);
  res.json(await svcCredit(id, amount, authorization, options));
});

export const cancelPayment: RequestHandler = asyncHandler(async (req, res) => {
  const { id } = paymentMethodIdParamsSchema.parse(req.params);
  const { authorization } = cancelBodySchema.parse(req.body);
  res.json(await svcCancel(id, authorization));
});
