/**
 * @spreadvault/node - Protocol facade and HTTP API.
 *
 * The Protocol is the public boundary of the workspace: it owns the
 * entity arena, enforces position ownership, runs each operation
 * atomically and journals its record. The Hono app exposes it over HTTP.
 */

export {
  Protocol,
  ProtocolError,
  DEFAULT_PROTOCOL_CONFIG,
  DEFAULT_TREASURY_ID,
} from "./services/protocol.js";
export type {
  ProtocolErrorCode,
  ProtocolConfig,
  ProtocolLogger,
  ProtocolOptions,
  PositionView,
  TokenBalanceView,
} from "./services/protocol.js";
export { loadConfig, protocolConfigFrom, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
