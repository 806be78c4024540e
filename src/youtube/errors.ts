import { logger } from "../utils/logger.js";

export const ErrorCode = {
  InvalidParams: "INVALID_PARAMS",
  MissingParams: "MISSING_PARAMS",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Raised by every parameter check. Carries the kind of violation in `code`
 * and a message naming the offending parameter.
 */
export class YouTubeParamsError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "YouTubeParamsError";
    this.code = code;
  }

  toJSON(): { code: ErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }

  override toString(): string {
    return `${this.name}(code=${this.code}, message=${this.message})`;
  }
}

export function invalidParams(message: string): YouTubeParamsError {
  logger.debug({ code: ErrorCode.InvalidParams, message }, "Rejecting request parameters");
  return new YouTubeParamsError(ErrorCode.InvalidParams, message);
}

export function missingParams(message: string): YouTubeParamsError {
  logger.debug({ code: ErrorCode.MissingParams, message }, "Rejecting request parameters");
  return new YouTubeParamsError(ErrorCode.MissingParams, message);
}

/**
 * Check if a thrown value is a parameter validation error
 */
export function isYouTubeParamsError(
  error: unknown,
): error is YouTubeParamsError {
  return error instanceof YouTubeParamsError;
}
