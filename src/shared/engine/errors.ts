/**
 * Engine Domain Errors - structured error types for the rules engine layer.
 *
 * Rule violations (a move that is not legal, a move that leaves the king in
 * check) are never thrown: they are returned as values from the move
 * executor. The classes here cover the cases the engine cannot recover from,
 * such as a board that breaks a precondition every caller must uphold.
 *
 * Usage:
 * ```typescript
 * import { InvalidState, EngineErrorCode } from './errors';
 *
 * throw new InvalidState(
 *   EngineErrorCode.STATE_KING_NOT_FOUND,
 *   'No white king on the board',
 *   { color: 'white' }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Engine error codes, prefixed by category:
 * - STATE_*: board or game state breaks an engine precondition
 */
export enum EngineErrorCode {
  /** A colour has no king on the board */
  STATE_KING_NOT_FOUND = 'STATE_KING_NOT_FOUND',
}

export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  STATE_: 'Corrupted or unexpected game state',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Part of the engine that raised the error (e.g. 'CheckDetection') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for a board or state that breaks an engine precondition.
 *
 * Callers must always start from a board with exactly one king per colour;
 * the check detector throws this when that does not hold.
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}
