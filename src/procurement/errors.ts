import type { PurchaseOrderState, ReservationStatus } from './domain.js';

export const ErrorCode = {
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  APPROVER_NOT_ELIGIBLE: 'APPROVER_NOT_ELIGIBLE',
  LEDGER_INVARIANT_VIOLATION: 'LEDGER_INVARIANT_VIOLATION',
  CONCURRENT_MODIFICATION: 'CONCURRENT_MODIFICATION',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class EngineError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'EngineError';
  }

  toJSON() {
    const result: { error: ErrorCode; message: string; details?: unknown } = {
      error: this.code,
      message: this.message,
    };
    if (this.details !== undefined) {
      result.details = this.details;
    }
    return result;
  }
}

export class NotFoundError extends EngineError {
  constructor(resource: string, id?: string | number) {
    super(
      ErrorCode.NOT_FOUND,
      id !== undefined ? `${resource} '${id}' not found` : `${resource} not found`,
    );
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends EngineError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.VALIDATION_ERROR, message, details);
    this.name = 'ValidationError';
  }
}

export class InvalidTransitionError extends EngineError {
  constructor(
    subject: string,
    from: PurchaseOrderState | ReservationStatus,
    attempted: string,
  ) {
    super(
      ErrorCode.INVALID_TRANSITION,
      `${subject} cannot ${attempted} from state '${from}'`,
      { from, attempted },
    );
    this.name = 'InvalidTransitionError';
  }
}

export class ApproverNotEligibleError extends EngineError {
  constructor(poId: string, role: string, reason: string) {
    super(
      ErrorCode.APPROVER_NOT_ELIGIBLE,
      `Role '${role}' cannot act on ${poId}: ${reason}`,
      { poId, role },
    );
    this.name = 'ApproverNotEligibleError';
  }
}

/**
 * Raised when a ledger mutation would leave a budget with negative
 * availability or negative balances. Aborts the whole atomic unit.
 */
export class LedgerInvariantError extends EngineError {
  constructor(departmentId: string, message: string, details?: unknown) {
    super(
      ErrorCode.LEDGER_INVARIANT_VIOLATION,
      `Budget ledger invariant violated for ${departmentId}: ${message}`,
      details,
    );
    this.name = 'LedgerInvariantError';
  }
}

export class ConcurrentModificationError extends EngineError {
  constructor(resource: string, id: string) {
    super(
      ErrorCode.CONCURRENT_MODIFICATION,
      `${resource} '${id}' was modified concurrently`,
    );
    this.name = 'ConcurrentModificationError';
  }
}
