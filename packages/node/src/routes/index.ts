/**
 * Route barrel - re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createVaultRoutes } from "./vaults.js";
export { createPositionRoutes } from "./positions.js";
export { createStrategyConfigRoutes } from "./strategy-configs.js";
export { createOrderBookRoutes } from "./order-books.js";
export { createMarketRoutes } from "./markets.js";
export { createTokenRoutes } from "./tokens.js";
export { createRecordRoutes } from "./records.js";
