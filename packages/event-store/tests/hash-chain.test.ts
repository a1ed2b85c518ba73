/**
 * Tests for the journal hash chain.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import type { HashedStoredEvent, StoredEvent } from "../src/types.js";
import { FIXED_CLOCK, makeEvent } from "./helpers.js";

function stored(payload: Record<string, string> = {}): StoredEvent {
  return {
    event: makeEvent("vault.created", payload),
    streamId: "vault-1",
    version: 1,
    globalPosition: 1,
    appendedAt: "2026-01-01T00:00:00.000Z",
  };
}

describe("computeEventHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeEventHash(stored(), GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic for the same input", () => {
    const event = stored({ vaultId: "vault-1" });
    expect(computeEventHash(event, GENESIS_HASH)).toBe(computeEventHash(event, GENESIS_HASH));
  });

  it("ignores payload key order", () => {
    const a = stored({ vaultId: "vault-1", creator: "admin" });
    const b: StoredEvent = { ...a, event: { ...a.event, payload: { creator: "admin", vaultId: "vault-1" } } };
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });

  it("changes when the previous hash changes", () => {
    const event = stored();
    expect(computeEventHash(event, GENESIS_HASH)).not.toBe(computeEventHash(event, "other"));
  });
});

describe("verifyHashChain", () => {
  function chain(count: number): HashedStoredEvent[] {
    const store = new InMemoryEventStore({ clock: FIXED_CLOCK });
    for (let i = 0; i < count; i++) {
      store.append(i % 2 === 0 ? "vault-1" : "book-1", [makeEvent()]);
    }
    return [...store.readAll()];
  }

  it("detects a tampered payload", () => {
    const events = chain(3);
    const target = events[1];
    if (target === undefined) throw new Error("chain too short");
    events[1] = {
      ...target,
      event: { ...target.event, payload: { vaultId: "vault-evil" } },
    };

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.position)).toEqual([2]);
  });

  it("detects a removed event", () => {
    const events = chain(3);
    events.splice(1, 1);

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.errors[0]?.position).toBe(3);
  });

  it("detects a chain that does not start at genesis", () => {
    const result = verifyHashChain(chain(3).slice(1));
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.position).toBe(2);
  });

  it("accepts any untouched chain", () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 20 }), (count) => {
        const result = verifyHashChain(chain(count));
        expect(result.valid).toBe(true);
        expect(result.lastVerifiedPosition).toBe(count);
      }),
      { numRuns: 25 },
    );
  });
});
