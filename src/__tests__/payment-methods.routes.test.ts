import request from "supertest";
import { describe, it, expect, vi, beforeEach, beforeAll, afterAll } from "vitest";
import { EventEmitter } from "events";

const mocks = vi.hoisted(() => ({
  poolQuery: vi.fn(),
  poolConnect: vi.fn(),
  clientQuery: vi.fn(),
  clientRelease: vi.fn(),
}));

vi.mock("pg", () => {
  const emitter = new EventEmitter();

  const pool = {
    on: emitter.on.bind(emitter),
    query: mocks.poolQuery,
    connect: mocks.poolConnect,
  };

  return {
    Pool: vi.fn(function () {
      return pool;
    }),
  };
});

vi.mock("../module/auth/middlewares/auth.middleware", () => ({
  authenticateToken: (req: { user?: { id: number; username: string; role: string } }, _res: unknown, next: () => void) => {
    req.user = { id: 1, username: "admin", role: "admin" };
    next();
  },
  authorizeRole:
    (...roles: string[]) =>
    (req: { user?: { role: string } }, res: { status: (n: number) => { json: (b: unknown) => unknown } }, next: () => void) => {
      if (req.user && roles.includes(req.user.role)) {
        next();
        return;
      }
      res.status(403).json({ error: "Forbidden" });
    },
}));

import app from "../config/app";
import { resetGatewayCache } from "../module/payment-method/lib/gateway-factory";
import { basePreferenceShape, definePreferences } from "../module/payment-method/lib/preferences";
import { CheckGateway } from "../module/payment-method/gateways/check.gateway";
import { registerPaymentMethodVariant, unregisterPaymentMethodVariant } from "../module/payment-method/variants";

function pmRow(overrides: Record<string, unknown> = {}) {
  return {
    id: "1",
    type: "BogusCreditCard",
    name: "Card",
    description: null,
    active: true,
    available_to_users: true,
    available_to_admin: true,
    auto_capture: null,
    position: 1,
    preferences: { server: "test", test_mode: true, login: null, password: null },
    deleted_at: null,
    created_at: "2026-01-05 10:00:00+00",
    updated_at: "2026-01-05 10:00:00+00",
    ...overrides,
  };
}

const visa = { kind: "credit_card", number: "4111111111111111", month: 12, year: 2030, cc_type: "visa" };

beforeEach(() => {
  mocks.poolQuery.mockReset();
  mocks.poolConnect.mockReset();
  mocks.clientQuery.mockReset();
  mocks.clientRelease.mockReset();

  mocks.poolConnect.mockResolvedValue({
    query: mocks.clientQuery,
    release: mocks.clientRelease,
  });
  mocks.clientQuery.mockResolvedValue({ rows: [] });

  resetGatewayCache();
  vi.spyOn(console, "info").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("GET /api/v1/payment-methods", () => {
  it("lists methods in position order", async () => {
    mocks.poolQuery.mockResolvedValueOnce({ rows: [pmRow({ id: "2" }), pmRow({ id: "1", position: 2 })] });

    const res = await request(app).get("/api/v1/payment-methods?active=true").set("Authorization", "Bearer fake");

    expect(res.status).toBe(200);
    expect(res.body.total).toBe(2);
    expect(res.body.items.map((m: { id: number }) => m.id)).toEqual([2, 1]);
    expect(mocks.poolQuery.mock.calls[0]?.[1]).toEqual([true]);
  });

  it("restricts to a store's methods", async () => {
    mocks.poolQuery
      .mockResolvedValueOnce({ rows: [{ id: "5", name: "Outlet", code: "outlet", payment_method_ids: ["2"] }] })
      .mockResolvedValueOnce({ rows: [pmRow({ id: "2" })] });

    const res = await request(app).get("/api/v1/payment-methods?store_id=5").set("Authorization", "Bearer fake");

    expect(res.status).toBe(200);
    expect(res.body.total).toBe(1);
    expect(mocks.poolQuery.mock.calls[1]?.[1]).toEqual([[2]]);
  });

  it("answers 404 for an unknown store", async () => {
    mocks.poolQuery.mockResolvedValueOnce({ rows: [] });

    const res = await request(app).get("/api/v1/payment-methods?store_id=9").set("Authorization", "Bearer fake");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Store 9 not found" });
  });

  it("still honours the deprecated display_on filter", async () => {
    mocks.poolQuery.mockResolvedValueOnce({ rows: [pmRow()] });

    const res = await request(app).get("/api/v1/payment-methods?display_on=back_end").set("Authorization", "Bearer fake");

    expect(res.status).toBe(200);
    expect(mocks.poolQuery.mock.calls[0]?.[1]).toEqual([true, true]);
    expect(console.warn).toHaveBeenCalledWith("[DEPRECATION]", expect.stringContaining("PaymentMethod.available"));
  });

  it("rejects a bad filter value", async () => {
    const res = await request(app).get("/api/v1/payment-methods?active=maybe").set("Authorization", "Bearer fake");

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("VALIDATION_ERROR");
    expect(res.body.errors[0].field).toBe("active");
  });
});

describe("variants", () => {
  it("GET /variants describes the registered variants", async () => {
    const res = await request(app).get("/api/v1/payment-methods/variants").set("Authorization", "Bearer fake");

    expect(res.status).toBe(200);
    const check = res.body.items.find((v: { type: string }) => v.type === "Check");
    expect(check).toEqual({
      type: "Check",
      label: "Check",
      method_type: "check",
      gateway: "Check",
      payment_source_class: null,
      payment_profiles_supported: false,
      source_required: false,
      not_implemented: [],
    });
    const bogus = res.body.items.find((v: { type: string }) => v.type === "BogusCreditCard");
    expect(bogus).toMatchObject({ gateway: "Bogus", payment_source_class: "credit_card", payment_profiles_supported: true });
  });

  it("GET /variants/:type/active", async () => {
    mocks.poolQuery.mockResolvedValueOnce({ rows: [{ exists: true }] });

    const res = await request(app).get("/api/v1/payment-methods/variants/StoreCredit/active").set("Authorization", "Bearer fake");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ type: "StoreCredit", active: true });
  });
});

describe("GET /api/v1/payment-methods/:id", () => {
  it("returns the method", async () => {
    mocks.poolQuery.mockResolvedValueOnce({ rows: [pmRow({ id: "3" })] });

    const res = await request(app).get("/api/v1/payment-methods/3").set("Authorization", "Bearer fake");

    expect(res.status).toBe(200);
    expect(res.body.paymentMethod).toMatchObject({ id: 3, type: "BogusCreditCard" });
  });

  it("answers 404 for a deleted method unless with_deleted is set", async () => {
    mocks.poolQuery.mockResolvedValueOnce({ rows: [] });
    const hidden = await request(app).get("/api/v1/payment-methods/3").set("Authorization", "Bearer fake");
    expect(hidden.status).toBe(404);
    expect(hidden.body).toEqual({ error: "Not found" });

    mocks.poolQuery.mockResolvedValueOnce({ rows: [pmRow({ id: "3", deleted_at: "2026-02-01 09:00:00+00" })] });
    const shown = await request(app).get("/api/v1/payment-methods/3?with_deleted=true").set("Authorization", "Bearer fake");
    expect(shown.status).toBe(200);
    expect(String(mocks.poolQuery.mock.calls[1]?.[0])).not.toContain("deleted_at IS NULL");
  });

  it("rejects a non numeric id", async () => {
    const res = await request(app).get("/api/v1/payment-methods/abc").set("Authorization", "Bearer fake");
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("VALIDATION_ERROR");
  });

  it("GET /:id/reusable-sources returns an empty list for a guest", async () => {
    mocks.poolQuery.mockResolvedValueOnce({ rows: [pmRow({ id: "3" })] });

    const res = await request(app).get("/api/v1/payment-methods/3/reusable-sources").set("Authorization", "Bearer fake");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ items: [] });
  });
});

describe("administration", () => {
  it("POST / creates a method", async () => {
    mocks.clientQuery.mockImplementation(async (sql: string) => {
      if (sql.includes("MAX(position)")) return { rows: [{ position: 2 }] };
      if (sql.includes("INSERT INTO payment_methods")) {
        return { rows: [pmRow({ id: "8", type: "Check", name: "Cheque", position: 2, preferences: { server: "test", test_mode: true } })] };
      }
      return { rows: [] };
    });

    const res = await request(app)
      .post("/api/v1/payment-methods")
      .set("Authorization", "Bearer fake")
      .send({ type: "Check", name: "Cheque" });

    expect(res.status).toBe(201);
    expect(res.body.paymentMethod).toMatchObject({ id: 8, name: "Cheque", position: 2 });
  });

  it("POST / rejects a blank name", async () => {
    const res = await request(app)
      .post("/api/v1/payment-methods")
      .set("Authorization", "Bearer fake")
      .send({ type: "Check", name: "" });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("VALIDATION_ERROR");
    expect(res.body.errors).toEqual([{ field: "name", message: expect.any(String) }]);
  });

  it("POST / rejects an unknown type", async () => {
    const res = await request(app)
      .post("/api/v1/payment-methods")
      .set("Authorization", "Bearer fake")
      .send({ type: "Nope", name: "Nope" });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Unknown payment method type: Nope", details: { type: "Nope" } });
  });

  it("POST / rejects undeclared preferences", async () => {
    const res = await request(app)
      .post("/api/v1/payment-methods")
      .set("Authorization", "Bearer fake")
      .send({ type: "Check", name: "Cheque", preferences: { login: "merchant" } });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Invalid preferences");
    expect(mocks.poolConnect).not.toHaveBeenCalled();
  });

  it("PATCH /:id without fields answers 400", async () => {
    const res = await request(app).patch("/api/v1/payment-methods/1").set("Authorization", "Bearer fake").send({});

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "No fields to update" });
  });

  it("PATCH /:id answers 404 for a missing method", async () => {
    const res = await request(app)
      .patch("/api/v1/payment-methods/12")
      .set("Authorization", "Bearer fake")
      .send({ active: false });

    expect(res.status).toBe(404);
  });

  it("PATCH /:id/position moves the method", async () => {
    mocks.clientQuery.mockImplementation(async (sql: string) => {
      if (sql.includes("SELECT position FROM")) return { rows: [{ position: 3 }] };
      if (sql.includes("COUNT(*)")) return { rows: [{ total: 3 }] };
      if (sql.includes("SET position = $2")) return { rows: [pmRow({ id: "4", position: 1 })] };
      return { rows: [] };
    });

    const res = await request(app)
      .patch("/api/v1/payment-methods/4/position")
      .set("Authorization", "Bearer fake")
      .send({ position: 1 });

    expect(res.status).toBe(200);
    expect(res.body.paymentMethod.position).toBe(1);
  });

  it("DELETE /:id soft-deletes", async () => {
    mocks.clientQuery.mockImplementation(async (sql: string) => {
      if (sql.includes("SET deleted_at = now()")) return { rows: [{ position: 1 }] };
      return { rows: [] };
    });

    const res = await request(app).delete("/api/v1/payment-methods/4").set("Authorization", "Bearer fake");

    expect(res.status).toBe(204);
  });

  it("DELETE /:id answers 404 when nothing was deleted", async () => {
    const res = await request(app).delete("/api/v1/payment-methods/4").set("Authorization", "Bearer fake");
    expect(res.status).toBe(404);
  });
});

describe("gateway dispatch", () => {
  beforeAll(() => {
    registerPaymentMethodVariant({
      type: "Acme::NoCancel",
      label: "No cancel",
      preferences: definePreferences(basePreferenceShape),
      gatewayClass: () => CheckGateway,
    });
  });

  afterAll(() => {
    unregisterPaymentMethodVariant("Acme::NoCancel");
  });

  it("POST /:id/authorize approves a test card", async () => {
    mocks.poolQuery.mockResolvedValueOnce({ rows: [pmRow()] });

    const res = await request(app)
      .post("/api/v1/payment-methods/1/authorize")
      .set("Authorization", "Bearer fake")
      .send({ amount: 1000, source: visa, options: { order_id: "R100" } });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      success: true,
      message: "Bogus Gateway: Forced success",
      authorization: "12345",
      test: true,
      params: {},
      avs_result: { code: "D" },
    });
  });

  it("POST /:id/purchase returns a decline with status 200", async () => {
    mocks.poolQuery.mockResolvedValueOnce({ rows: [pmRow()] });

    const res = await request(app)
      .post("/api/v1/payment-methods/1/purchase")
      .set("Authorization", "Bearer fake")
      .send({ amount: 1000, source: { ...visa, number: "4000000000000002" } });

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(false);
    expect(res.body.message).toBe("Bogus Gateway: Forced failure");
  });

  it("POST /:id/authorize refuses a deleted method", async () => {
    mocks.poolQuery.mockResolvedValueOnce({ rows: [] });

    const res = await request(app)
      .post("/api/v1/payment-methods/1/authorize")
      .set("Authorization", "Bearer fake")
      .send({ amount: 1000, source: visa });

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Payment method 1 not found" });
    expect(String(mocks.poolQuery.mock.calls[0]?.[0])).toContain("deleted_at IS NULL");
  });

  it("POST /:id/capture settles against a deleted method", async () => {
    mocks.poolQuery.mockResolvedValueOnce({ rows: [pmRow({ deleted_at: "2026-02-01 09:00:00+00" })] });

    const res = await request(app)
      .post("/api/v1/payment-methods/1/capture")
      .set("Authorization", "Bearer fake")
      .send({ amount: 1000, authorization: "12345" });

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(String(mocks.poolQuery.mock.calls[0]?.[0])).not.toContain("deleted_at IS NULL");
  });

  it("POST /:id/void and /credit", async () => {
    mocks.poolQuery.mockResolvedValue({ rows: [pmRow()] });

    const voided = await request(app)
      .post("/api/v1/payment-methods/1/void")
      .set("Authorization", "Bearer fake")
      .send({ authorization: "12345" });
    const credited = await request(app)
      .post("/api/v1/payment-methods/1/credit")
      .set("Authorization", "Bearer fake")
      .send({ amount: 500, authorization: "12345" });

    expect(voided.body).toMatchObject({ success: true, authorization: "12345" });
    expect(credited.body).toMatchObject({ success: true, authorization: "12345" });
  });

  it("POST /:id/cancel voids the authorization", async () => {
    mocks.poolQuery.mockResolvedValueOnce({ rows: [pmRow({ type: "Check", preferences: { server: "test", test_mode: true } })] });

    const res = await request(app)
      .post("/api/v1/payment-methods/1/cancel")
      .set("Authorization", "Bearer fake")
      .send({ authorization: "CHK-1" });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ success: true, authorization: "CHK-1" });
  });

  it("POST /:id/cancel on a variant without cancel is a server error", async () => {
    mocks.poolQuery.mockResolvedValueOnce({
      rows: [pmRow({ id: "70", type: "Acme::NoCancel", preferences: { server: "test", test_mode: true } })],
    });

    const res = await request(app)
      .post("/api/v1/payment-methods/70/cancel")
      .set("Authorization", "Bearer fake")
      .send({ authorization: "X-1" });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "Internal Server Error" });
  });

  it("rejects a negative amount", async () => {
    const res = await request(app)
      .post("/api/v1/payment-methods/1/authorize")
      .set("Authorization", "Bearer fake")
      .send({ amount: -1, source: visa });

    expect(res.status).toBe(400);
    expect(res.body.errors[0].field).toBe("amount");
  });
});
