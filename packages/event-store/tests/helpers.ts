import type { DomainEvent } from "@spreadvault/types";

export const FIXED_CLOCK = (): Date => new Date("2026-01-01T00:00:00.000Z");

let seq = 0;

export function makeEvent(
  type: DomainEvent["type"] = "vault.deposited",
  payload: DomainEvent["payload"] = { vaultId: "vault-1" },
): DomainEvent {
  seq++;
  return {
    type,
    metadata: {
      eventId: `evt-${String(seq)}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "test",
      correlationId: `corr-${String(seq)}`,
      source: "vault",
    },
    payload,
  };
}
