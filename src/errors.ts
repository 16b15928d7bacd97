// ============================================================
//                     ERROR TYPE
// ============================================================

export type EngineErrorCode =
  | "NotAuthorized"
  | "InsufficientCollateral"
  | "InvalidAmount"
  | "PositionNotFound"
  | "StalePrice"
  | "LiquidationNotAllowed"
  | "ContractPaused"
  | "OracleNotRegistered"
  | "ExceedsMaxPosition"
  | "ArithmeticError"
  | "TransferFailed";

/** Stable numeric codes, kept for clients that match on numbers */
export const ERROR_NUMBERS: Record<EngineErrorCode, number> = {
  NotAuthorized: 100,
  InsufficientCollateral: 101,
  InvalidAmount: 102,
  PositionNotFound: 103,
  StalePrice: 104,
  LiquidationNotAllowed: 105,
  ContractPaused: 106,
  OracleNotRegistered: 107,
  ExceedsMaxPosition: 108,
  ArithmeticError: 109,
  TransferFailed: 110,
};

/**
 * Terminal failure of a single engine operation.
 * No state mutation of the failing operation survives it.
 */
export class EngineError extends Error {
  public readonly errorNumber: number;

  constructor(
    public readonly code: EngineErrorCode,
    public readonly detail: string = code,
    options?: { cause?: unknown },
  ) {
    super(`${code}: ${detail}`, options);
    this.name = "EngineError";
    this.errorNumber = ERROR_NUMBERS[code];
  }
}

export function isEngineError(err: unknown, code?: EngineErrorCode): err is EngineError {
  if (!(err instanceof EngineError)) return false;
  return code === undefined || err.code === code;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
