/**
 * Reputation persistence errors.
 *
 * @module
 */

import { RuntimeError, RuntimeErrorCodes } from '../types/errors.js';

export class ReputationStoreError extends RuntimeError {
  public readonly storeName: string;

  constructor(storeName: string, message: string) {
    super(`${storeName}: ${message}`, RuntimeErrorCodes.REPUTATION_STORE_ERROR);
    this.name = 'ReputationStoreError';
    this.storeName = storeName;
  }
}
