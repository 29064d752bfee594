import { DuplicateCreditError, DuplicateReadingError, CreditNotFoundError } from '../../src/errors';
import { KeyedMutex } from '../../src/ledger/keyedMutex';
import type { Repositories, Store } from '../../src/repositories/types';
import type {
  AuditEntry,
  CreditKey,
  CreditRecord,
  Inverter,
  IrradianceDay,
  Reading,
} from '../../src/types/dmrv';

interface State {
  inverters: Inverter[];
  readings: Reading[];
  credits: CreditRecord[];
  audit: AuditEntry[];
}

function clone(state: State): State {
  return {
    inverters: state.inverters.map((i) => ({ ...i })),
    readings: state.readings.map((r) => ({ ...r })),
    credits: state.credits.map((c) => ({ ...c })),
    audit: state.audit.map((e) => ({ ...e, payload: structuredClone(e.payload) })),
  };
}

const sameKey = (record: CreditKey, key: CreditKey) =>
  record.inverterId === key.inverterId && record.date === key.date;

/**
 * In-process Store. Transactions run one at a time and restore a snapshot
 * when the work throws.
 */
export class MemoryStore implements Store {
  private state: State = { inverters: [], readings: [], credits: [], audit: [] };
  private readonly cache = new Map<string, IrradianceDay>();
  private readonly txLock = new KeyedMutex();
  private nextInverterId = 1;

  /** Called before each audit insert; throw from it to simulate a failed write. */
  beforeAuditInsert: ((entry: AuditEntry) => void) | null = null;
  /** Thrown from irradiance cache writes when set. */
  cacheWriteError: Error | null = null;
  cacheReads = 0;
  cacheWrites = 0;
  transactions = 0;

  readonly inverters: Repositories['inverters'] = {
    create: async (input) => {
      const inverter: Inverter = { id: this.nextInverterId++, ...input, createdAt: new Date() };
      this.state.inverters.push(inverter);
      return { ...inverter };
    },
    findById: async (id) => {
      const found = this.state.inverters.find((i) => i.id === id);
      return found ? { ...found } : null;
    },
    list: async () => this.state.inverters.map((i) => ({ ...i })),
    count: async () => this.state.inverters.length,
  };

  readonly readings: Repositories['readings'] = {
    insertMany: async (inverterId, readings) => {
      const existing = new Set(
        this.state.readings.filter((r) => r.inverterId === inverterId).map((r) => r.timestamp.getTime()),
      );
      const clashes = readings.filter((r) => existing.has(r.timestamp.getTime()));
      if (clashes.length) {
        throw new DuplicateReadingError(
          inverterId,
          clashes.map((r) => r.timestamp.toISOString()),
        );
      }
      const stored = readings.map((r) => ({ inverterId, timestamp: new Date(r.timestamp), kwh: r.kwh }));
      this.state.readings.push(...stored);
      return stored.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    },
    listForInverter: async (inverterId, range = {}) =>
      this.state.readings
        .filter(
          (r) =>
            r.inverterId === inverterId &&
            (!range.start || r.timestamp >= range.start) &&
            (!range.end || r.timestamp < range.end),
        )
        .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
        .map((r) => ({ ...r })),
    summarize: async (inverterId) => {
      const rows = this.state.readings.filter((r) => r.inverterId === inverterId);
      return { count: rows.length, totalKwh: rows.reduce((sum, r) => sum + r.kwh, 0) };
    },
    listRecent: async (inverterId, limit) =>
      this.state.readings
        .filter((r) => r.inverterId === inverterId)
        .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
        .slice(0, limit)
        .map((r) => ({ ...r })),
  };

  readonly credits: Repositories['credits'] = {
    find: async (key) => {
      const found = this.state.credits.find((c) => sameKey(c, key));
      return found ? { ...found } : null;
    },
    insert: async (record, now) => {
      if (this.state.credits.some((c) => sameKey(c, record))) {
        throw new DuplicateCreditError(record);
      }
      const created: CreditRecord = { ...record, createdAt: now, updatedAt: now };
      this.state.credits.push(created);
      return { ...created };
    },
    update: async (key, patch, now) => {
      const index = this.state.credits.findIndex((c) => sameKey(c, key));
      if (index < 0) throw new CreditNotFoundError(key);
      const updated: CreditRecord = { ...this.state.credits[index], ...patch, updatedAt: now };
      this.state.credits[index] = updated;
      return { ...updated };
    },
    listForInverter: async (inverterId) =>
      this.state.credits
        .filter((c) => c.inverterId === inverterId)
        .sort((a, b) => b.date.localeCompare(a.date))
        .map((c) => ({ ...c })),
    listByStatus: async (status) =>
      this.state.credits
        .filter((c) => !status || c.status === status)
        .sort((a, b) => b.date.localeCompare(a.date) || a.inverterId - b.inverterId)
        .map((c) => ({ ...c })),
    summarizeByStatus: async () => {
      const rows = new Map<CreditRecord['status'], { count: number; tonnesCo2: number }>();
      for (const credit of this.state.credits) {
        const row = rows.get(credit.status) ?? { count: 0, tonnesCo2: 0 };
        row.count += 1;
        row.tonnesCo2 += credit.tonnesCo2;
        rows.set(credit.status, row);
      }
      return [...rows.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([status, row]) => ({ status, ...row }));
    },
  };

  readonly audit: Repositories['audit'] = {
    lockHead: async () => {
      const head = this.state.audit[this.state.audit.length - 1];
      return head ? { ...head } : null;
    },
    insert: async (entry) => {
      this.beforeAuditInsert?.(entry);
      this.state.audit.push({ ...entry, payload: structuredClone(entry.payload) });
    },
    list: async ({ afterSequenceNo, limit }) =>
      this.state.audit
        .filter((e) => afterSequenceNo === undefined || e.sequenceNo > afterSequenceNo)
        .slice(0, limit)
        .map((e) => ({ ...e, payload: structuredClone(e.payload) })),
    listForEntity: async (entityRef) =>
      this.state.audit
        .filter((e) => e.entityRef === entityRef)
        .map((e) => ({ ...e, payload: structuredClone(e.payload) })),
  };

  readonly irradianceCache: Store['irradianceCache'] = {
    get: async (latKey, lonKey, date) => {
      this.cacheReads += 1;
      return this.cache.get(`${latKey}:${lonKey}:${date}`) ?? null;
    },
    put: async (latKey, lonKey, day) => {
      this.cacheWrites += 1;
      if (this.cacheWriteError) throw this.cacheWriteError;
      this.cache.set(`${latKey}:${lonKey}:${day.date}`, day);
    },
  };

  withTransaction<T>(_lockKey: string, work: (tx: Repositories) => Promise<T>): Promise<T> {
    return this.txLock.runExclusive('tx', async () => {
      this.transactions += 1;
      const snapshot = clone(this.state);
      try {
        return await work(this);
      } catch (err) {
        this.state = snapshot;
        throw err;
      }
    });
  }

  /** Direct access for tests that corrupt stored entries. */
  auditEntries(): AuditEntry[] {
    return this.state.audit;
  }
}
