import type { AuditTrail } from '../audit/auditTrail';
import type { VerificationPolicy } from '../config';
import {
  CreditNotFoundError,
  DuplicateCreditError,
  InsufficientDataError,
  InverterNotFoundError,
  ValidationError,
  creditRef,
} from '../errors';
import logger from '../logger';
import type { Repositories, Store } from '../repositories/types';
import type { IrradianceProvider } from '../services/irradiance/irradianceGateway';
import { buildTheoreticalCurve } from '../services/solar/solarIrradianceModel';
import { scoreVerification, type VerificationOutcome } from '../services/verification/fraudDetector';
import type { IntegrityGuard } from '../state/integrityGuard';
import {
  type AuditAction,
  type CreditKey,
  type CreditRecord,
  type CreditStatus,
  isCreditStatus,
} from '../types/dmrv';
import { isIsoDate, utcDayRange } from '../utils/dates';
import { KeyedMutex } from './keyedMutex';
import { assertTransition, assertVerifiable } from './statusTransitions';

export interface CreditLedgerDeps {
  store: Store;
  auditTrail: AuditTrail;
  irradiance: IrradianceProvider;
  integrity: IntegrityGuard;
  policy: VerificationPolicy;
  clock?: () => Date;
}

const VERIFICATION_ACTIONS: Record<VerificationOutcome, AuditAction> = {
  VERIFIED: 'credit.verified',
  FLAGGED: 'credit.flagged',
  PENDING: 'credit.verification_pending',
};

export function tonnesFromKwh(kwh: number, emissionFactorKgPerKwh: number): number {
  return (kwh * emissionFactorKgPerKwh) / 1000;
}

export function assertCreditKey(key: CreditKey): void {
  const issues: string[] = [];
  if (!Number.isInteger(key.inverterId) || key.inverterId <= 0) {
    issues.push('inverterId must be a positive integer');
  }
  if (!isIsoDate(key.date)) {
    issues.push('date must be a YYYY-MM-DD calendar date');
  }
  if (issues.length) {
    throw new ValidationError('Invalid credit key', issues);
  }
}

/**
 * Sole owner of credit records. Every mutation runs under a per-key exclusive
 * section and commits together with its audit entry.
 */
export class CreditLedger {
  private readonly mutex = new KeyedMutex();
  private readonly clock: () => Date;

  constructor(private readonly deps: CreditLedgerDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  private exclusive<T>(key: CreditKey, work: (tx: Repositories) => Promise<T>): Promise<T> {
    const ref = creditRef(key);
    return this.mutex.runExclusive(ref, () => this.deps.store.withTransaction(ref, work));
  }

  private async lockExisting(tx: Repositories, key: CreditKey): Promise<CreditRecord> {
    const record = await tx.credits.find(key, { forUpdate: true });
    if (!record) {
      throw new CreditNotFoundError(key);
    }
    return record;
  }

  async calculate(key: CreditKey): Promise<CreditRecord> {
    assertCreditKey(key);
    this.deps.integrity.assertOperational();
    const { policy, auditTrail } = this.deps;

    const record = await this.exclusive(key, async (tx) => {
      const inverter = await tx.inverters.findById(key.inverterId);
      if (!inverter) {
        throw new InverterNotFoundError(key.inverterId);
      }
      if (await tx.credits.find(key, { forUpdate: true })) {
        throw new DuplicateCreditError(key);
      }

      const readings = await tx.readings.listForInverter(key.inverterId, utcDayRange(key.date));
      if (readings.length === 0) {
        throw new InsufficientDataError(
          `No readings for inverter ${key.inverterId} on ${key.date}`,
          { ...key },
        );
      }

      const kwhTotal = readings.reduce((sum, r) => sum + r.kwh, 0);
      const tonnesCo2 = tonnesFromKwh(kwhTotal, policy.emissionFactorKgPerKwh);
      const created = await tx.credits.insert(
        { ...key, tonnesCo2, status: 'PENDING', correlation: null, flaggedReason: null },
        this.clock(),
      );

      await auditTrail.append(tx.audit, creditRef(key), 'credit.calculated', {
        inverterId: key.inverterId,
        date: key.date,
        readingCount: readings.length,
        kwhTotal,
        emissionFactorKgPerKwh: policy.emissionFactorKgPerKwh,
        tonnesCo2,
        status: created.status,
      });
      return created;
    });

    logger.info('[ledger] credit calculated', {
      ...key,
      tonnesCo2: record.tonnesCo2,
    });
    return record;
  }

  async verify(key: CreditKey): Promise<CreditRecord> {
    assertCreditKey(key);
    this.deps.integrity.assertOperational();
    const { store, irradiance, policy, auditTrail } = this.deps;

    try {
      const existing = await store.credits.find(key);
      if (!existing) {
        throw new CreditNotFoundError(key);
      }
      assertVerifiable(existing.status);

      const inverter = await store.inverters.findById(key.inverterId);
      if (!inverter) {
        throw new InverterNotFoundError(key.inverterId);
      }

      // Remote fetch stays outside the ledger transaction.
      const day = await irradiance.getIrradiance(inverter.gpsLat, inverter.gpsLon, key.date);
      const theoretical = buildTheoreticalCurve(day.samples, inverter.capacityKw);

      const updated = await this.exclusive(key, async (tx) => {
        const current = await this.lockExisting(tx, key);
        assertVerifiable(current.status);

        const readings = await tx.readings.listForInverter(key.inverterId, utcDayRange(key.date));
        const decision = scoreVerification(readings, theoretical, policy);
        assertTransition(current.status, decision.status, 'automatic');

        const next = await tx.credits.update(
          key,
          {
            status: decision.status,
            correlation: decision.correlation,
            flaggedReason: decision.flaggedReason,
          },
          this.clock(),
        );

        await auditTrail.append(tx.audit, creditRef(key), VERIFICATION_ACTIONS[decision.status], {
          inverterId: key.inverterId,
          date: key.date,
          trigger: 'automatic',
          oldStatus: current.status,
          newStatus: decision.status,
          correlation: decision.correlation,
          reason: decision.flaggedReason,
          actualTotalKwh: decision.actualTotalKwh,
          theoreticalTotalKwh: decision.theoreticalTotalKwh,
          alignedPoints: decision.alignedPoints,
        });
        return next;
      });

      logger.info('[ledger] credit verification decided', {
        ...key,
        status: updated.status,
        correlation: updated.correlation,
      });
      return updated;
    } catch (err) {
      logger.warn('[ledger] verification attempt failed', { ...key, err });
      throw err;
    }
  }

  async updateStatus(key: CreditKey, newStatus: CreditStatus, note?: string): Promise<CreditRecord> {
    assertCreditKey(key);
    if (!isCreditStatus(newStatus)) {
      throw new ValidationError('Invalid status', [`status must be one of PENDING, VERIFIED, FLAGGED, SUBMITTED`]);
    }
    this.deps.integrity.assertOperational();
    const { auditTrail } = this.deps;

    const updated = await this.exclusive(key, async (tx) => {
      const current = await this.lockExisting(tx, key);
      assertTransition(current.status, newStatus, 'manual');

      const flaggedReason =
        newStatus === 'FLAGGED'
          ? note ?? 'Flagged by manual review'
          : newStatus === 'PENDING'
            ? null
            : current.flaggedReason;

      const next = await tx.credits.update(
        key,
        { status: newStatus, correlation: current.correlation, flaggedReason },
        this.clock(),
      );

      await auditTrail.append(tx.audit, creditRef(key), 'credit.status_overridden', {
        inverterId: key.inverterId,
        date: key.date,
        trigger: 'manual',
        oldStatus: current.status,
        newStatus,
        note: note ?? null,
      });
      return next;
    });

    logger.info('[ledger] credit status overridden', {
      ...key,
      status: updated.status,
    });
    return updated;
  }

  async getCredit(key: CreditKey): Promise<CreditRecord> {
    assertCreditKey(key);
    const record = await this.deps.store.credits.find(key);
    if (!record) {
      throw new CreditNotFoundError(key);
    }
    return record;
  }

  listCredits(inverterId: number): Promise<CreditRecord[]> {
    return this.deps.store.credits.listForInverter(inverterId);
  }
}
