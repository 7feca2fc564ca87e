export type TradingErrorKind = "DATA_UNAVAILABLE" | "ORDER_REJECTED" | "INVARIANT_VIOLATION";

export abstract class TradingError extends Error {
  abstract readonly kind: TradingErrorKind;

  constructor(
    readonly symbol: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Market data could not be fetched or is too short; the symbol is skipped for this pass. */
export class DataUnavailableError extends TradingError {
  readonly kind = "DATA_UNAVAILABLE";
}

/** The exchange declined or timed out an order; nothing is recorded. */
export class OrderRejectedError extends TradingError {
  readonly kind = "ORDER_REJECTED";
}

export class InvariantViolationError extends TradingError {
  readonly kind = "INVARIANT_VIOLATION";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
