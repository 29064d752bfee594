import { AuditTrail } from '../../src/audit/auditTrail';
import type { VerificationPolicy } from '../../src/config';
import { IrradianceUnavailableError } from '../../src/errors';
import { CreditLedger } from '../../src/ledger/creditLedger';
import type { IrradianceProvider } from '../../src/services/irradiance/irradianceGateway';
import { IntegrityGuard } from '../../src/state/integrityGuard';
import type { IrradianceDay, IrradianceSample, NewReading, Reading } from '../../src/types/dmrv';
import { MemoryStore } from './memoryStore';

export const TEST_DATE = '2025-01-15';
export const FIRST_HOUR = 8;

/** W/m² for 08:00..15:00 UTC; a 10 kW inverter gets 5,8,10,10,10,8,5,4 = 60 kWh. */
export const CLEAR_DAY_IRRADIANCE = [500, 800, 1000, 1000, 1000, 800, 500, 400];
export const TRACKING_50_KWH = [4, 7, 8, 9, 8, 7, 4, 3];
export const IMPOSSIBLE_80_KWH = [6, 11, 13, 14, 13, 11, 7, 5];
export const ERRATIC_50_KWH = [8, 3, 9, 2, 9, 3, 8, 8];

export const DEFAULT_POLICY: VerificationPolicy = {
  emissionFactorKgPerKwh: 1.2,
  minCorrelation: 0.9,
  excessToleranceRatio: 0.02,
  minAlignedPoints: 3,
};

export function hourAt(date: string, hour: number): Date {
  return new Date(`${date}T${String(hour).padStart(2, '0')}:00:00.000Z`);
}

export function hourlyReadings(values: number[], date = TEST_DATE, firstHour = FIRST_HOUR): NewReading[] {
  return values.map((kwh, i) => ({ timestamp: hourAt(date, firstHour + i), kwh }));
}

export function asReadings(inverterId: number, readings: NewReading[]): Reading[] {
  return readings.map((r) => ({ inverterId, ...r }));
}

export function irradianceSamples(
  values: number[],
  date = TEST_DATE,
  firstHour = FIRST_HOUR,
  lat = 12.97,
  lon = 77.59,
): IrradianceSample[] {
  return values.map((allskyIrradiance, i) => ({
    lat,
    lon,
    date,
    timestamp: hourAt(date, firstHour + i),
    allskyIrradiance,
  }));
}

/** Serves fixed days; unknown days are a definitive miss. */
export class FakeIrradiance implements IrradianceProvider {
  calls = 0;
  failWith: Error | null = null;
  private readonly days = new Map<string, number[]>();

  setDay(date: string, values: number[]) {
    this.days.set(date, values);
  }

  async getIrradiance(lat: number, lon: number, date: string): Promise<IrradianceDay> {
    this.calls += 1;
    if (this.failWith) throw this.failWith;
    const values = this.days.get(date);
    if (!values) {
      throw new IrradianceUnavailableError(`No irradiance data for ${date}`, true, { lat, lon, date });
    }
    return { lat, lon, date, samples: irradianceSamples(values, date, FIRST_HOUR, lat, lon) };
  }
}

export interface LedgerHarness {
  store: MemoryStore;
  irradiance: FakeIrradiance;
  integrity: IntegrityGuard;
  auditTrail: AuditTrail;
  ledger: CreditLedger;
}

export function createLedgerHarness(policy: VerificationPolicy = DEFAULT_POLICY): LedgerHarness {
  const store = new MemoryStore();
  const irradiance = new FakeIrradiance();
  irradiance.setDay(TEST_DATE, CLEAR_DAY_IRRADIANCE);
  const integrity = new IntegrityGuard();
  let tick = Date.parse('2025-01-16T00:00:00.000Z');
  const clock = () => new Date((tick += 1000));
  const auditTrail = new AuditTrail(store.audit, clock);
  const ledger = new CreditLedger({ store, auditTrail, irradiance, integrity, policy, clock });
  return { store, irradiance, integrity, auditTrail, ledger };
}

export async function seedInverter(
  store: MemoryStore,
  readings: number[] = TRACKING_50_KWH,
): Promise<number> {
  const inverter = await store.inverters.create({ gpsLat: 12.97, gpsLon: 77.59, capacityKw: 10 });
  if (readings.length) {
    await store.readings.insertMany(inverter.id, hourlyReadings(readings));
  }
  return inverter.id;
}
