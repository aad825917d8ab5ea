/**
 * Shared browser errors.
 *
 * @module
 */

import { RuntimeError, RuntimeErrorCodes } from '../types/errors.js';

export class BrowserUnavailableError extends RuntimeError {
  constructor(message: string, cause?: unknown) {
    super(message, RuntimeErrorCodes.BROWSER_UNAVAILABLE);
    this.name = 'BrowserUnavailableError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}
