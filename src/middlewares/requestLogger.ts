import type { RequestHandler } from "express";
import logger from "../utils/logger";

export const requestLogger: RequestHandler = (req, res, next) => {
  if (process.env.NODE_ENV === "test") {
    next();
    return;
  }

  const startedAt = Date.now();

  res.on("finish", () => {
    const payload = {
      type: "http_request",
      requestId: req.requestId ?? null,
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
      userId: req.user?.id ?? null,
    };

    // one JSON line per request, no bodies (they carry card data)
    if (res.statusCode >= 500) logger.error(JSON.stringify(payload));
    else logger.log(JSON.stringify(payload));
  });

  next();
};
