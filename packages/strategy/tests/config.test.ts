import { describe, it, expect } from "vitest";
import { createStrategyConfig, MAX_ORDERS_PER_SIDE } from "../src/config.js";
import { StrategyError } from "../src/types.js";

const valid = {
  spreadBps: 100n,
  orderSize: 1_000_000_000n,
  numOrdersPerSide: 3n,
  keeper: "keeper",
};

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof StrategyError ? err.code : "NOT_A_STRATEGY_ERROR";
  }
  return undefined;
}

describe("createStrategyConfig", () => {
  it("freezes the config and emits a record", () => {
    const { config, record } = createStrategyConfig("config-1", valid);

    expect(config).toEqual({ id: "config-1", ...valid });
    expect(Object.isFrozen(config)).toBe(true);
    expect(record).toEqual({
      type: "strategy.config_created",
      configId: "config-1",
      ...valid,
    });
  });

  it("accepts the maximum orders per side", () => {
    const { config } = createStrategyConfig("config-1", {
      ...valid,
      numOrdersPerSide: MAX_ORDERS_PER_SIDE,
    });
    expect(config.numOrdersPerSide).toBe(100n);
  });

  it.each([
    ["zero spread", { ...valid, spreadBps: 0n }],
    ["full spread", { ...valid, spreadBps: 10_000n }],
    ["zero order size", { ...valid, orderSize: 0n }],
    ["no orders per side", { ...valid, numOrdersPerSide: 0n }],
    ["too many orders per side", { ...valid, numOrdersPerSide: MAX_ORDERS_PER_SIDE + 1n }],
    ["empty keeper", { ...valid, keeper: "" }],
  ])("rejects %s", (_label, input) => {
    expect(codeOf(() => createStrategyConfig("config-1", input))).toBe("INVALID_CONFIG");
  });
});
