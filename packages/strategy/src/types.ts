/**
 * @spreadvault/strategy - Types for the strategy controller.
 */

/** Error codes for strategy operations. */
export type StrategyErrorCode = "INVALID_CONFIG" | "NOT_KEEPER";

export class StrategyError extends Error {
  public readonly code: StrategyErrorCode;

  constructor(code: StrategyErrorCode, message: string) {
    super(message);
    this.name = "StrategyError";
    this.code = code;
  }
}

/** Inputs to createStrategyConfig(). */
export interface StrategyConfigInput {
  readonly spreadBps: bigint;
  readonly orderSize: bigint;
  readonly numOrdersPerSide: bigint;
  readonly keeper: string;
}
