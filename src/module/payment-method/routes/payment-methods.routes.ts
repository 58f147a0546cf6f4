import { Router } from "express";
import { authenticateToken, authorizeRole } from "../../auth/middlewares/auth.middleware";
import {
  createPaymentMethod,
  deletePaymentMethod,
  getPaymentMethod,
  getReusableSources,
  hasActiveVariant,
  listPaymentMethods,
  listVariants,
  movePaymentMethod,
  updatePaymentMethod,
} from "../controllers/payment-methods.controller";
import {
  authorizePayment,
  cancelPayment,
  capturePayment,
  creditPayment,
  purchasePayment,
  voidPayment,
} from "../controllers/gateway-dispatch.controller";

const router = Router();
const adminOnly = authorizeRole("admin");

router.use(authenticateToken);

router.get("/", listPaymentMethods);
router.get("/variants", listVariants);
router.get("/variants/:type/active", hasActiveVariant);
router.get("/:id", getPaymentMethod);
router.get("/:id/reusable-sources", getReusableSources);

router.post("/", adminOnly, createPaymentMethod);
router.patch("/:id", adminOnly, updatePaymentMethod);
router.patch("/:id/position", adminOnly, movePaymentMethod);
router.delete("/:id", adminOnly, deletePaymentMethod);

router.post("/:id/authorize", adminOnly, authorizePayment);
router.post("/:id/purchase", adminOnly, purchasePayment);
router.post("/:id/capture", adminOnly, capturePayment);
router.post("/:id/void", adminOnly, voidPayment);
router.post("/:id/credit", adminOnly, creditPayment);
router.post("/:id/cancel", adminOnly, cancelPayment);

export default router;
