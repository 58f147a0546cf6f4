import { describe, it, expect } from "vitest";
import { ValidationError } from "../utils/errors";
import {
  applyPaymentMethodUpdate,
  buildPaymentMethodDraft,
  paymentMethodOptions,
} from "../module/payment-method/lib/payment-method";
import {
  definePreferences,
  gatewayPreferenceShape,
  mergePreferences,
  parsePreferences,
  preferenceDefaults,
} from "../module/payment-method/lib/preferences";
import type { PaymentMethod } from "../module/payment-method/types/payment-method.types";

const cardPreferences = definePreferences(gatewayPreferenceShape);

function method(overrides: Partial<PaymentMethod> = {}): PaymentMethod {
  return {
    id: 1,
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

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}

describe("preferences", () => {
  it("fills declared defaults", () => {
    expect(preferenceDefaults(cardPreferences)).toEqual({
      server: "test",
      test_mode: true,
      login: null,
      password: null,
    });
  });

  it("keeps given values and defaults the rest", () => {
    expect(parsePreferences(cardPreferences, { server: "production", login: "merchant" })).toEqual({
      server: "production",
      test_mode: true,
      login: "merchant",
      password: null,
    });
  });

  it("rejects undeclared keys", () => {
    const err = captureError(() => parsePreferences(cardPreferences, { api_key: "test-secret" }));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ message: "Invalid preferences", statusCode: 400 });
  });

  it("rejects a value of the wrong type", () => {
    expect(() => parsePreferences(cardPreferences, { test_mode: "yes" })).toThrow("Invalid preferences");
  });

  it("merges a patch over the stored values", () => {
    const current = { server: "test", test_mode: true, login: "merchant", password: "test-secret" };
    expect(mergePreferences(cardPreferences, current, { server: "production" })).toEqual({
      server: "production",
      test_mode: true,
      login: "merchant",
      password: "test-secret",
    });
  });
});

describe("buildPaymentMethodDraft", () => {
  it("applies flag defaults and the variant's preference defaults", () => {
    expect(buildPaymentMethodDraft({ type: "BogusCreditCard", name: "  Card  " })).toEqual({
      type: "BogusCreditCard",
      name: "Card",
      description: null,
      active: true,
      available_to_users: true,
      available_to_admin: true,
      auto_capture: null,
      preferences: { server: "test", test_mode: true, login: null, password: null },
    });
  });

  it("gives a Check method only the shared preference keys", () => {
    expect(buildPaymentMethodDraft({ type: "Check", name: "Cheque" }).preferences).toEqual({
      server: "test",
      test_mode: true,
    });
  });

  it("rejects a blank name", () => {
    const err = captureError(() => buildPaymentMethodDraft({ type: "Check", name: "   " }));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ message: "Payment method name can't be blank", details: { missing: ["name"] } });
  });

  it("rejects a blank name and type together", () => {
    expect(() => buildPaymentMethodDraft({ type: "", name: "" })).toThrow(
      "Payment method name and type can't be blank"
    );
  });

  it("rejects an unregistered type", () => {
    const err = captureError(() => buildPaymentMethodDraft({ type: "Nope", name: "Nope" }));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ message: "Unknown payment method type: Nope", details: { type: "Nope" } });
  });

  it("rejects preferences the variant does not declare", () => {
    expect(() =>
      buildPaymentMethodDraft({ type: "Check", name: "Cheque", preferences: { login: "merchant" } })
    ).toThrow("Invalid preferences");
  });
});

describe("applyPaymentMethodUpdate", () => {
  it("trims the name and merges preferences", () => {
    const current = method({ preferences: { server: "test", test_mode: true, login: "merchant", password: null } });
    expect(applyPaymentMethodUpdate(current, { name: " Visa ", preferences: { test_mode: false } })).toEqual({
      name: "Visa",
      preferences: { server: "test", test_mode: false, login: "merchant", password: null },
    });
  });

  it("refuses to blank the name", () => {
    expect(() => applyPaymentMethodUpdate(method(), { name: " " })).toThrow("Payment method name can't be blank");
  });

  it("leaves the patch alone when preferences are not touched", () => {
    expect(applyPaymentMethodUpdate(method(), { active: false })).toEqual({ active: false });
  });
});

describe("paymentMethodOptions", () => {
  it("drops a null login", () => {
    expect(paymentMethodOptions(method())).toEqual({ server: "test", test_mode: true, password: null });
  });

  it("keeps a configured login", () => {
    const m = method({ preferences: { server: "test", test_mode: true, login: "merchant", password: "test-secret" } });
    expect(paymentMethodOptions(m)).toEqual({
      server: "test",
      test_mode: true,
      login: "merchant",
      password: "test-secret",
    });
  });

  it("does not mutate the stored preferences", () => {
    const m = method();
    paymentMethodOptions(m);
    expect(m.preferences).toHaveProperty("login", null);
  });
});
