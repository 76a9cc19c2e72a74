/**
 * Error codes for callers (mainly the CLI) to distinguish between error types.
 */
export const ErrorCode = {
  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',

  // Stat/scoring errors
  INVALID_CATEGORY: 'INVALID_CATEGORY',
  INVALID_SCORING_RULES: 'INVALID_SCORING_RULES',
  INVALID_DATE: 'INVALID_DATE',
  PLAYER_NOT_FOUND: 'PLAYER_NOT_FOUND',

  // Schedule errors
  GAME_NOT_FOUND: 'GAME_NOT_FOUND',

  // Team errors
  TEAM_NOT_FOUND: 'TEAM_NOT_FOUND',

  // Dataset errors
  DATASET_LOAD_FAILED: 'DATASET_LOAD_FAILED',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions.
 * `exitCode` is what the CLI exits with when the exception reaches it.
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly exitCode: number,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when validation fails
 */
export class ValidationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.VALIDATION_ERROR) {
    super(message, 2, errorCode);
  }
}

/**
 * Thrown when a requested entity does not exist and absence is not an acceptable answer
 */
export class NotFoundException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.NOT_FOUND) {
    super(message, 1, errorCode);
  }
}

/**
 * Thrown when environment or settings input cannot be used
 */
export class ConfigurationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.CONFIGURATION_ERROR) {
    super(message, 78, errorCode);
  }
}

/**
 * Thrown when a dataset file cannot be read or parsed.
 * Wraps the original error.
 */
export class DatasetException extends AppException {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(message, 66, ErrorCode.DATASET_LOAD_FAILED);
    this.originalError = originalError;
  }

  static fromError(error: unknown, filePath: string): DatasetException {
    const originalError = error instanceof Error ? error : new Error(String(error));
    return new DatasetException(
      `Failed to load dataset ${filePath}: ${originalError.message}`,
      originalError
    );
  }
}

// Domain-specific exception factory functions for common scenarios
export const StatErrors = {
  unknownCategory: (code: string) =>
    new ValidationException(`Unknown stat category: ${code}`, ErrorCode.INVALID_CATEGORY),
  invalidScoringRule: (key: string, value: unknown) =>
    new ValidationException(
      `Scoring rule ${key} must be a finite number (got ${String(value)})`,
      ErrorCode.INVALID_SCORING_RULES
    ),
  invalidDate: (value: string) =>
    new ValidationException(`Invalid date: ${value} (expected YYYY-MM-DD)`, ErrorCode.INVALID_DATE),
  playerNotFound: (playerId: string) =>
    new NotFoundException(`Player ${playerId} not found`, ErrorCode.PLAYER_NOT_FOUND),
};

export const ScheduleErrors = {
  gameNotFound: (gameId: string) =>
    new NotFoundException(`Game ${gameId} not found`, ErrorCode.GAME_NOT_FOUND),
  invalidDateTime: (value: string) =>
    new ValidationException(
      `Invalid game time: ${value} (expected ISO date-time such as 2025-10-26T19:30)`,
      ErrorCode.INVALID_DATE
    ),
};

export const TeamErrors = {
  teamNotFound: (teamId: string) =>
    new NotFoundException(`Team ${teamId} not found`, ErrorCode.TEAM_NOT_FOUND),
};
