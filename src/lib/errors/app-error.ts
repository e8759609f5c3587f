/**
 * Application Error Types
 *
 * Centralized error handling with typed error codes and safe messages.
 * Safe messages are user-facing and do not expose sensitive data.
 */

export type AppErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'DB_ERROR'
  | 'AGENT_ERROR'
  | 'INSUFFICIENT_CANDIDATE_RECIPES'
  | 'MEAL_PLAN_VALIDATION_FAILED';

/**
 * Application Error
 *
 * Extends Error with a typed error code and safe user-facing message.
 * The safeMessage should not expose sensitive data (API keys, prompts, etc.).
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly safeMessage: string;
  /** Optional payload for observability (e.g. violations for MEAL_PLAN_VALIDATION_FAILED) */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: AppErrorCode,
    safeMessage: string,
    causeOrDetails?: unknown,
  ) {
    super(safeMessage);
    this.name = 'AppError';
    this.code = code;
    this.safeMessage = safeMessage;

    if (causeOrDetails instanceof Error) {
      // Preserve original error as cause (for debugging)
      this.cause = causeOrDetails;
    } else if (isPlainRecord(causeOrDetails)) {
      this.details = causeOrDetails;
    } else if (causeOrDetails) {
      this.cause = new Error(String(causeOrDetails));
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): {
    code: AppErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.safeMessage,
      ...(this.details && { details: this.details }),
    };
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
