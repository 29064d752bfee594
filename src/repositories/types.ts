import type {
  AuditEntry,
  CreditKey,
  CreditPatch,
  CreditRecord,
  CreditStatus,
  Inverter,
  IrradianceDay,
  NewInverter,
  NewReading,
  Reading,
} from '../types/dmrv';

/** `start` inclusive, `end` exclusive. */
export interface DateRange {
  start?: Date;
  end?: Date;
}

export interface InverterRepository {
  create(input: NewInverter): Promise<Inverter>;
  findById(id: number): Promise<Inverter | null>;
  list(): Promise<Inverter[]>;
  count(): Promise<number>;
}

export interface ReadingRepository {
  /** All-or-nothing; throws DuplicateReadingError if any timestamp is already stored. */
  insertMany(inverterId: number, readings: NewReading[]): Promise<Reading[]>;
  listForInverter(inverterId: number, range?: DateRange): Promise<Reading[]>;
  summarize(inverterId: number): Promise<{ count: number; totalKwh: number }>;
  listRecent(inverterId: number, limit: number): Promise<Reading[]>;
}

export interface StatusSummaryRow {
  status: CreditStatus;
  count: number;
  tonnesCo2: number;
}

export interface CreditRepository {
  find(key: CreditKey, options?: { forUpdate?: boolean }): Promise<CreditRecord | null>;
  insert(record: Omit<CreditRecord, 'createdAt' | 'updatedAt'>, now: Date): Promise<CreditRecord>;
  update(key: CreditKey, patch: CreditPatch, now: Date): Promise<CreditRecord>;
  listForInverter(inverterId: number): Promise<CreditRecord[]>;
  listByStatus(status?: CreditStatus): Promise<CreditRecord[]>;
  summarizeByStatus(): Promise<StatusSummaryRow[]>;
}

export interface AuditRepository {
  /** Latest entry; inside a transaction also serializes concurrent appenders. */
  lockHead(): Promise<AuditEntry | null>;
  insert(entry: AuditEntry): Promise<void>;
  list(options: { afterSequenceNo?: number; limit: number }): Promise<AuditEntry[]>;
  listForEntity(entityRef: string): Promise<AuditEntry[]>;
}

export interface IrradianceCacheRepository {
  get(latKey: number, lonKey: number, date: string): Promise<IrradianceDay | null>;
  put(latKey: number, lonKey: number, day: IrradianceDay): Promise<void>;
}

export interface Repositories {
  inverters: InverterRepository;
  readings: ReadingRepository;
  credits: CreditRepository;
  audit: AuditRepository;
}

export interface Store extends Repositories {
  irradianceCache: IrradianceCacheRepository;
  /**
   * Run `work` in one transaction holding an exclusive lock on `lockKey`. The
   * repositories handed to `work` are bound to that transaction; a throw rolls
   * every write back.
   */
  withTransaction<T>(lockKey: string, work: (tx: Repositories) => Promise<T>): Promise<T>;
}
