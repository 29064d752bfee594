import type { AuditTrail, ChainVerification } from '../audit/auditTrail';
import { ChainTamperedError, InverterNotFoundError, creditRef } from '../errors';
import logger from '../logger';
import type { Store } from '../repositories/types';
import type { IntegrityGuard, IntegrityState } from '../state/integrityGuard';
import type { AuditEntry, CreditRecord, CreditStatus, Inverter, Reading } from '../types/dmrv';

const RECENT_READINGS = 10;
export const DEFAULT_AUDIT_PAGE = 100;
export const MAX_AUDIT_PAGE = 1000;

export function roundTonnes(value: number): number {
  return Math.round(value * 100) / 100;
}

export interface FleetSummary {
  inverterCount: number;
  creditCounts: Record<CreditStatus, number>;
  totalCredits: number;
  totalTonnesCo2: number;
  verifiedTonnesCo2: number;
}

export interface InverterAuditView {
  inverter: Inverter;
  readingsCount: number;
  totalKwh: number;
  credits: CreditRecord[];
  totalTonnesCo2: number;
  verifiedTonnesCo2: number;
  recentReadings: Reading[];
  auditEntries: AuditEntry[];
}

export type ChainStatus =
  | (ChainVerification & { integrity: IntegrityState })
  | { valid: false; brokenAtSequenceNo: number; reason: string; integrity: IntegrityState };

/** Read-only views over inverters, credits and the audit chain. */
export class FleetReports {
  constructor(
    private readonly store: Store,
    private readonly auditTrail: AuditTrail,
    private readonly integrity: IntegrityGuard,
  ) {}

  async fleetSummary(): Promise<FleetSummary> {
    const [inverterCount, rows] = await Promise.all([
      this.store.inverters.count(),
      this.store.credits.summarizeByStatus(),
    ]);

    const creditCounts: Record<CreditStatus, number> = {
      PENDING: 0,
      VERIFIED: 0,
      FLAGGED: 0,
      SUBMITTED: 0,
    };
    let totalCredits = 0;
    let totalTonnes = 0;
    let verifiedTonnes = 0;
    for (const row of rows) {
      creditCounts[row.status] = row.count;
      totalCredits += row.count;
      totalTonnes += row.tonnesCo2;
      if (row.status === 'VERIFIED') verifiedTonnes += row.tonnesCo2;
    }

    return {
      inverterCount,
      creditCounts,
      totalCredits,
      totalTonnesCo2: roundTonnes(totalTonnes),
      verifiedTonnesCo2: roundTonnes(verifiedTonnes),
    };
  }

  async inverterAudit(inverterId: number): Promise<InverterAuditView> {
    const inverter = await this.store.inverters.findById(inverterId);
    if (!inverter) {
      throw new InverterNotFoundError(inverterId);
    }
    const [summary, credits, recentReadings] = await Promise.all([
      this.store.readings.summarize(inverterId),
      this.store.credits.listForInverter(inverterId),
      this.store.readings.listRecent(inverterId, RECENT_READINGS),
    ]);
    const auditEntries = (
      await Promise.all(credits.map((c) => this.auditTrail.listForEntity(creditRef(c))))
    )
      .flat()
      .sort((a, b) => a.sequenceNo - b.sequenceNo);

    const totalTonnes = credits.reduce((sum, c) => sum + c.tonnesCo2, 0);
    const verifiedTonnes = credits
      .filter((c) => c.status === 'VERIFIED')
      .reduce((sum, c) => sum + c.tonnesCo2, 0);

    return {
      inverter,
      readingsCount: summary.count,
      totalKwh: summary.totalKwh,
      credits,
      totalTonnesCo2: roundTonnes(totalTonnes),
      verifiedTonnesCo2: roundTonnes(verifiedTonnes),
      recentReadings,
      auditEntries,
    };
  }

  creditsByStatus(status?: CreditStatus): Promise<CreditRecord[]> {
    return this.store.credits.listByStatus(status);
  }

  auditEntries(options: { afterSequenceNo?: number; limit?: number } = {}): Promise<AuditEntry[]> {
    const limit = Math.min(Math.max(options.limit ?? DEFAULT_AUDIT_PAGE, 1), MAX_AUDIT_PAGE);
    return this.auditTrail.list({ afterSequenceNo: options.afterSequenceNo, limit });
  }

  /** Verifies the chain; a break halts ledger mutations. */
  async chainStatus(): Promise<ChainStatus> {
    try {
      const result = await this.auditTrail.verifyChain();
      return { ...result, integrity: this.integrity.snapshot() };
    } catch (err) {
      if (!(err instanceof ChainTamperedError)) throw err;
      this.integrity.halt(err.message, err.sequenceNo);
      logger.warn('[reports] audit chain verification failed', { sequenceNo: err.sequenceNo });
      return {
        valid: false,
        brokenAtSequenceNo: err.sequenceNo,
        reason: err.message,
        integrity: this.integrity.snapshot(),
      };
    }
  }
}
