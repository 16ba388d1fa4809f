/**
 * Game Domain Errors - structured error types outside the rules engine.
 *
 * These cover failures of the replay tooling around the engine, chiefly a
 * moves file that cannot be found or read. Rule violations are not errors:
 * the engine returns them as values.
 *
 * Usage:
 * ```typescript
 * import { GameErrorCode, MoveFileError, isGameError } from './GameDomainErrors';
 *
 * throw new MoveFileError(GameErrorCode.MOVE_FILE_NOT_FOUND, 'games/opening.txt');
 *
 * if (isGameError(error)) {
 *   logger.error(error.message, error.toJSON());
 * }
 * ```
 *
 * @module GameDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error codes, prefixed by category:
 * - MOVE_FILE_*: moves file access errors
 * - INTERNAL_*: anything unexpected
 */
export enum GameErrorCode {
  MOVE_FILE_NOT_FOUND = 'MOVE_FILE_NOT_FOUND',
  MOVE_FILE_UNREADABLE = 'MOVE_FILE_UNREADABLE',

  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

export class GameError extends Error {
  /** Error code for programmatic handling */
  readonly code: GameErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(code: GameErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GameError.prototype);
  }

  /** Serialize to a JSON-safe object for logging */
  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface GameErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error when a moves file is missing or cannot be read. The message is the
 * one shown to the user.
 */
export class MoveFileError extends GameError {
  readonly filePath: string;

  constructor(
    code: GameErrorCode.MOVE_FILE_NOT_FOUND | GameErrorCode.MOVE_FILE_UNREADABLE,
    filePath: string,
    detail?: string,
    context: Record<string, unknown> = {}
  ) {
    super(
      code,
      code === GameErrorCode.MOVE_FILE_NOT_FOUND
        ? `Error: The specified file '${filePath}' was not found`
        : `Error reading moves: ${detail ?? filePath}`,
      { filePath, ...context }
    );
    this.name = 'MoveFileError';
    this.filePath = filePath;
    Object.setPrototypeOf(this, MoveFileError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

/**
 * Wrap an unknown error in a GameError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): GameError {
  if (isGameError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new GameError(GameErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}
