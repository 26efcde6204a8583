/**
 * Error types and reporting for mesh conversion.
 *
 * MeshlibError carries a machine-readable code plus flat context.
 * ErrorReporter decides whether recoverable problems abort (strict) or warn.
 */

import { StageLogger } from "./logger.js";

export const ERROR_CODES = {
  INVALID_INPUT: "INVALID_INPUT",
  INVALID_OPTIONS: "INVALID_OPTIONS",
  INTERNAL_CONSISTENCY: "INTERNAL_CONSISTENCY",
  SUBMESH_LIMIT: "SUBMESH_LIMIT",
  RECOVERABLE: "RECOVERABLE",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export type ErrorContext = Record<string, string | number | boolean>;

export class MeshlibError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context: ErrorContext = {},
  ) {
    super(message);
    this.name = "MeshlibError";
  }
}

/**
 * A fusion partition broke one of its invariants (coverage, constraint
 * satisfaction, monotonic splitting). Always a programming error.
 */
export class FusionInvariantError extends MeshlibError {
  constructor(message: string, context: ErrorContext = {}) {
    super(`[fusion] ${message}`, ERROR_CODES.INTERNAL_CONSISTENCY, context);
    this.name = "FusionInvariantError";
  }
}

export class SubmeshLimitError extends MeshlibError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ERROR_CODES.SUBMESH_LIMIT, context);
    this.name = "SubmeshLimitError";
  }
}

/**
 * Routes conversion diagnostics.
 *
 * In strict mode a recoverable problem throws, otherwise it is logged as a
 * warning and conversion carries on.
 */
export class ErrorReporter {
  private readonly logger: StageLogger;
  private recoverableCount = 0;

  constructor(
    public readonly strict: boolean,
    stage = "convert",
  ) {
    this.logger = new StageLogger(stage);
  }

  debug(category: string, message: string): void {
    this.logger.debug(`${category}: ${message}`);
  }

  info(message: string): void {
    this.logger.info(message);
  }

  recoverable(message: string, context: ErrorContext = {}): void {
    this.recoverableCount++;
    if (this.strict) {
      throw new MeshlibError(message, ERROR_CODES.RECOVERABLE, context);
    }
    this.logger.warn(message, context);
  }

  fatal(message: string, context: ErrorContext = {}): never {
    const error = new MeshlibError(message, ERROR_CODES.INVALID_INPUT, context);
    this.logger.error(message, error, context);
    throw error;
  }

  /** Number of recoverable problems seen so far */
  get recoverableProblems(): number {
    return this.recoverableCount;
  }
}
