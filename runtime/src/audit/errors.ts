/**
 * Audit service errors.
 *
 * @module
 */

import { RuntimeError, RuntimeErrorCodes } from '../types/errors.js';

export class AuditNotFoundError extends RuntimeError {
  public readonly auditId: string;

  constructor(auditId: string) {
    super(`No audit with id "${auditId}"`, RuntimeErrorCodes.AUDIT_NOT_FOUND);
    this.name = 'AuditNotFoundError';
    this.auditId = auditId;
  }
}

/** The service is shutting down and accepts no new audits. */
export class AuditUnavailableError extends RuntimeError {
  constructor(message: string) {
    super(message, RuntimeErrorCodes.AUDIT_UNAVAILABLE);
    this.name = 'AuditUnavailableError';
  }
}

export class AuditCancelledError extends RuntimeError {
  public readonly auditId: string;

  constructor(auditId: string) {
    super(`Audit "${auditId}" was cancelled`, RuntimeErrorCodes.AUDIT_CANCELLED);
    this.name = 'AuditCancelledError';
    this.auditId = auditId;
  }
}
