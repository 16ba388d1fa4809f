/**
 * Shared Errors Module
 *
 * @module errors
 */

export {
  // Error codes
  GameErrorCode,
  // Base class
  GameError,
  type GameErrorJSON,
  // Specific errors
  MoveFileError,
  // Utilities
  isGameError,
  wrapError,
} from './GameDomainErrors';
