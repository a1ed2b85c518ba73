/**
 * @spreadvault/strategy - Strategy config and controller.
 *
 * Design rules:
 * - Only the config's keeper may rebalance
 * - A rebalance never locks more than the vault has available
 * - Settlement never unlocks more than is locked
 */

export { createStrategyConfig, MAX_ORDERS_PER_SIDE } from "./config.js";
export { rebalance, settle, computeQuoteBand } from "./controller.js";
export type { QuoteBand } from "./controller.js";

export type { StrategyErrorCode, StrategyConfigInput } from "./types.js";
export { StrategyError } from "./types.js";
