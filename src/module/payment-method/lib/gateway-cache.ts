import type { GatewayMode } from "../../../config/payments";
import type { PaymentGateway } from "../gateways/gateway.types";
import type { PaymentMethod } from "../types/payment-method.types";

type CacheEntry = {
  fingerprint: string;
  gateway: PaymentGateway;
};

/**
 * Gateways built per payment method id. An entry is only served while the
 * method's type, preferences and mode are the ones it was built from.
 */
export class GatewayCache {
  private readonly entries = new Map<number, CacheEntry>();

  fetch(
    method: Pick<PaymentMethod, "id" | "type" | "preferences">,
    mode: GatewayMode,
    build: () => PaymentGateway
  ): PaymentGateway {
    const fingerprint = GatewayCache.fingerprint(method, mode);
    const entry = this.entries.get(method.id);
    if (entry && entry.fingerprint === fingerprint) {
      return entry.gateway;
    }

    const gateway = build();
    this.entries.set(method.id, { fingerprint, gateway });
    return gateway;
  }

  invalidate(id: number): boolean {
    return this.entries.delete(id);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private static fingerprint(method: Pick<PaymentMethod, "type" | "preferences">, mode: GatewayMode): string {
    const keys = Object.keys(method.preferences).sort();
    return JSON.stringify([method.type, mode, keys.map((k) => [k, method.preferences[k]])]);
  }
}
