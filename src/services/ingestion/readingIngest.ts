import { InverterNotFoundError } from '../../errors';
import logger from '../../logger';
import type { DateRange, Store } from '../../repositories/types';
import type { Inverter, NewInverter, NewReading, Reading } from '../../types/dmrv';

export interface IngestResult {
  inverterId: number;
  inserted: number;
  firstTimestamp: Date | null;
  lastTimestamp: Date | null;
}

/** Registry of inverters and the append-only stream of their readings. */
export class ReadingIngest {
  constructor(private readonly store: Pick<Store, 'inverters' | 'readings'>) {}

  async registerInverter(input: NewInverter): Promise<Inverter> {
    const inverter = await this.store.inverters.create(input);
    logger.info('[ingest] inverter registered', {
      inverterId: inverter.id,
      capacityKw: inverter.capacityKw,
    });
    return inverter;
  }

  async getInverter(id: number): Promise<Inverter> {
    const inverter = await this.store.inverters.findById(id);
    if (!inverter) {
      throw new InverterNotFoundError(id);
    }
    return inverter;
  }

  listInverters(): Promise<Inverter[]> {
    return this.store.inverters.list();
  }

  /** Whole batch or nothing; duplicates reject the batch with DuplicateReadingError. */
  async ingest(inverterId: number, readings: NewReading[]): Promise<IngestResult> {
    await this.getInverter(inverterId);
    const stored = await this.store.readings.insertMany(inverterId, readings);
    const result: IngestResult = {
      inverterId,
      inserted: stored.length,
      firstTimestamp: stored[0]?.timestamp ?? null,
      lastTimestamp: stored[stored.length - 1]?.timestamp ?? null,
    };
    logger.info('[ingest] readings stored', { inverterId, inserted: result.inserted });
    return result;
  }

  async listReadings(inverterId: number, range?: DateRange): Promise<Reading[]> {
    await this.getInverter(inverterId);
    return this.store.readings.listForInverter(inverterId, range);
  }
}
