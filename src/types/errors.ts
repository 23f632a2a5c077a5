/**
 * Custom error classes
 */

import { SoundErrorCode, describeErrorCode } from './codes';

export class SoundError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: SoundErrorCode,
    public readonly originalError?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SoundError';
    this.timestamp = new Date();
    this.context = context;
    Object.setPrototypeOf(this, SoundError.prototype);

    // Capture stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON for logging/debugging
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      codeText: describeErrorCode(this.code),
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * The backend refused a request when it was handed over
 */
export class SubmissionError extends SoundError {
  constructor(message: string, code: SoundErrorCode, context?: Record<string, unknown>) {
    super(message, code, undefined, context);
    this.name = 'SubmissionError';
    Object.setPrototypeOf(this, SubmissionError.prototype);
  }
}

/**
 * The backend accepted a request but reported failure once it finished
 */
export class PlaybackError extends SoundError {
  constructor(message: string, code: SoundErrorCode, context?: Record<string, unknown>) {
    super(message, code, undefined, context);
    this.name = 'PlaybackError';
    Object.setPrototypeOf(this, PlaybackError.prototype);
  }
}

export class InvalidArgumentError extends SoundError {
  constructor(
    message: string,
    public readonly validationErrors?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, SoundErrorCode.INVALID, validationErrors, context);
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * An attribute could not be inserted into the property list
 */
export class MarshalError extends SoundError {
  constructor(message: string, code: SoundErrorCode, context?: Record<string, unknown>) {
    super(message, code, undefined, context);
    this.name = 'MarshalError';
    Object.setPrototypeOf(this, MarshalError.prototype);
  }
}

export function isSoundError(error: unknown): error is SoundError {
  return error instanceof SoundError;
}
