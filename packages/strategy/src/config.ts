/**
 * Strategy configuration.
 *
 * A config is immutable once created; there is no update operation.
 */

import type {
  StrategyConfig,
  StrategyConfigCreatedRecord,
  StrategyConfigId,
} from "@spreadvault/types";
import { BPS_DENOMINATOR, assertU64 } from "@spreadvault/ledger";
import type { StrategyConfigInput } from "./types.js";
import { StrategyError } from "./types.js";

/** Upper bound on `numOrdersPerSide`. */
export const MAX_ORDERS_PER_SIDE = 100n;

/**
 * Validate and freeze a strategy config.
 *
 * Requires 0 < spreadBps < 10000, a non-zero order size, between 1 and
 * MAX_ORDERS_PER_SIDE orders per side and a keeper identity.
 */
export function createStrategyConfig(
  id: StrategyConfigId,
  input: StrategyConfigInput,
): { config: StrategyConfig; record: StrategyConfigCreatedRecord } {
  const { spreadBps, orderSize, numOrdersPerSide, keeper } = input;

  if (spreadBps <= 0n || spreadBps >= BPS_DENOMINATOR) {
    throw new StrategyError(
      "INVALID_CONFIG",
      `spreadBps must be between 1 and 9999, got ${spreadBps.toString()}`,
    );
  }
  if (orderSize <= 0n) {
    throw new StrategyError("INVALID_CONFIG", "orderSize must be greater than zero");
  }
  if (numOrdersPerSide < 1n || numOrdersPerSide > MAX_ORDERS_PER_SIDE) {
    throw new StrategyError(
      "INVALID_CONFIG",
      `numOrdersPerSide must be between 1 and ${MAX_ORDERS_PER_SIDE.toString()}, got ${numOrdersPerSide.toString()}`,
    );
  }
  if (keeper.length === 0) {
    throw new StrategyError("INVALID_CONFIG", "keeper must be a non-empty identity");
  }
  assertU64(orderSize, "order size");
  assertU64(numOrdersPerSide, "orders per side");

  const config: StrategyConfig = Object.freeze({
    id,
    spreadBps,
    orderSize,
    numOrdersPerSide,
    keeper,
  });

  return {
    config,
    record: {
      type: "strategy.config_created",
      configId: id,
      spreadBps,
      orderSize,
      numOrdersPerSide,
      keeper,
    },
  };
}
