/**
 * Error handling for posterior-plot
 *
 * Every failure is thrown as a PlotError (or a subclass) carrying:
 * - a structured error code
 * - the offending values as context
 */

/**
 * Error codes covering the summarizer, the statistics and the chart builders
 */
export enum ErrorCode {
  // Input errors
  EMPTY_INPUT = 'EMPTY_INPUT',
  RESHAPE_FAILED = 'RESHAPE_FAILED',

  // Option errors
  UNKNOWN_CENTRALITY = 'UNKNOWN_CENTRALITY',
  INVALID_INTERVAL_MASS = 'INVALID_INTERVAL_MASS',
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_PRIOR = 'INVALID_PRIOR',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base error with structured error code and context
 *
 * @example
 * ```typescript
 * throw new PlotError(
 *   ErrorCode.INVALID_CONFIG,
 *   'nColumns must be a positive integer',
 *   { nColumns: 0 }
 * );
 * ```
 */
export class PlotError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PlotError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Code, message and context on one line
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * The sample table (or a draw vector) has no rows
 */
export class EmptyInputError extends PlotError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.EMPTY_INPUT, message, context);
    this.name = 'EmptyInputError';
  }
}

/**
 * Centrality is not one of median, mean or MAP
 */
export class UnknownCentralityError extends PlotError {
  constructor(centrality: string) {
    super(
      ErrorCode.UNKNOWN_CENTRALITY,
      `Unknown centrality '${centrality}', expected one of median, mean, MAP`,
      { centrality }
    );
    this.name = 'UnknownCentralityError';
  }
}

/**
 * Credible mass outside (0, 1]
 */
export class InvalidIntervalMassError extends PlotError {
  constructor(ci: number) {
    super(
      ErrorCode.INVALID_INTERVAL_MASS,
      `Credible mass must be in (0, 1], got ${ci}`,
      { ci }
    );
    this.name = 'InvalidIntervalMassError';
  }
}

/**
 * The table cannot be reshaped: missing grouping values, unmatched
 * classification, non-finite draws
 */
export class ReshapeError extends PlotError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.RESHAPE_FAILED, message, context);
    this.name = 'ReshapeError';
  }
}

export function isPlotError(error: unknown): error is PlotError {
  return error instanceof PlotError;
}

/**
 * Wrap an unknown thrown value as a PlotError.
 * PlotErrors pass through unchanged.
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.INTERNAL_ERROR): PlotError {
  if (isPlotError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new PlotError(code, message, context);
}
