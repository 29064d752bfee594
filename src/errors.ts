import type { CreditKey, CreditStatus } from './types/dmrv';

export type ErrorKind =
  | 'validation_failed'
  | 'not_found'
  | 'duplicate'
  | 'invalid_transition'
  | 'insufficient_data'
  | 'insufficient_samples'
  | 'irradiance_unavailable'
  | 'chain_tampered'
  | 'ledger_halted';

/**
 * Base class for every failure the engine reports to its callers. `kind` and
 * `status` are what the HTTP boundary serializes.
 */
export class DmrvError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    public readonly status: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DmrvError';
  }

  toJSON() {
    return {
      error: this.kind,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export function creditRef(key: CreditKey): string {
  return `credit:${key.inverterId}:${key.date}`;
}

export class ValidationError extends DmrvError {
  constructor(message: string, public readonly issues: string[] = []) {
    super('validation_failed', 400, message, issues.length ? { issues } : undefined);
    this.name = 'ValidationError';
  }
}

export class InverterNotFoundError extends DmrvError {
  constructor(inverterId: number) {
    super('not_found', 404, `Inverter ${inverterId} not found`, { inverterId });
    this.name = 'InverterNotFoundError';
  }
}

export class CreditNotFoundError extends DmrvError {
  constructor(key: CreditKey) {
    super('not_found', 404, `Credit not found for inverter ${key.inverterId} on ${key.date}`, {
      ...key,
    });
    this.name = 'CreditNotFoundError';
  }
}

export class DuplicateCreditError extends DmrvError {
  constructor(key: CreditKey) {
    super(
      'duplicate',
      409,
      `Credit for inverter ${key.inverterId} on ${key.date} already exists`,
      { ...key },
    );
    this.name = 'DuplicateCreditError';
  }
}

export class DuplicateReadingError extends DmrvError {
  constructor(inverterId: number, public readonly timestamps: string[]) {
    super(
      'duplicate',
      409,
      `Inverter ${inverterId} already has readings at ${timestamps.length} of the submitted timestamps`,
      { inverterId, timestamps },
    );
    this.name = 'DuplicateReadingError';
  }
}

export class InvalidTransitionError extends DmrvError {
  constructor(
    public readonly from: CreditStatus,
    public readonly to: CreditStatus | null,
    reason: string,
  ) {
    super('invalid_transition', 409, reason, { from, to });
    this.name = 'InvalidTransitionError';
  }
}

export class InsufficientDataError extends DmrvError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('insufficient_data', 422, message, details);
    this.name = 'InsufficientDataError';
  }
}

export class InsufficientSamplesError extends DmrvError {
  constructor(public readonly alignedPoints: number, public readonly required: number) {
    super(
      'insufficient_samples',
      422,
      `Only ${alignedPoints} aligned points available, ${required} required`,
      { alignedPoints, required },
    );
    this.name = 'InsufficientSamplesError';
  }
}

export class IrradianceUnavailableError extends DmrvError {
  constructor(
    message: string,
    public readonly definitive: boolean,
    details?: Record<string, unknown>,
  ) {
    super('irradiance_unavailable', 503, message, details);
    this.name = 'IrradianceUnavailableError';
  }
}

export class ChainTamperedError extends DmrvError {
  constructor(public readonly sequenceNo: number, reason: string) {
    super('chain_tampered', 500, `Audit chain broken at sequence ${sequenceNo}: ${reason}`, {
      sequenceNo,
      reason,
    });
    this.name = 'ChainTamperedError';
  }
}

export class LedgerHaltedError extends DmrvError {
  constructor(reason: string) {
    super(
      'ledger_halted',
      423,
      `Ledger mutations are halted pending integrity investigation: ${reason}`,
      { reason },
    );
    this.name = 'LedgerHaltedError';
  }
}
