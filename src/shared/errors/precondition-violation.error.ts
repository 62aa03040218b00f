import { BaseError } from './base.error.js';

/**
 * Raised when a caller breaks the contract of a pure pixel-scale operation
 * (empty frame list, frames of different sizes, a factor that does not divide
 * the frame). These are programming errors and are never retried or wrapped.
 */
export class PreconditionViolationError extends BaseError {
  public constructor(code: string, message: string, metadata?: Record<string, unknown>) {
    super({ code, message, metadata, exposeMessage: true });
  }
}
