// src/routes/v1.routes.ts
import { Router } from "express"
import paymentMethodRoutes from "../module/payment-method/routes/payment-methods.routes"

const router = Router()

router.use("/payment-methods", paymentMethodRoutes)

export default router
