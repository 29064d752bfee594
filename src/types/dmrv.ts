export const CREDIT_STATUSES = ['PENDING', 'VERIFIED', 'FLAGGED', 'SUBMITTED'] as const;

export type CreditStatus = (typeof CREDIT_STATUSES)[number];

export function isCreditStatus(value: unknown): value is CreditStatus {
  return CREDIT_STATUSES.some((status) => status === value);
}

export interface Inverter {
  id: number;
  gpsLat: number;
  gpsLon: number;
  capacityKw: number;
  createdAt: Date;
}

export type NewInverter = Omit<Inverter, 'id' | 'createdAt'>;

export interface Reading {
  inverterId: number;
  timestamp: Date;
  kwh: number;
}

export interface NewReading {
  timestamp: Date;
  kwh: number;
}

export interface CreditKey {
  inverterId: number;
  /** UTC calendar day, YYYY-MM-DD */
  date: string;
}

export interface CreditRecord extends CreditKey {
  tonnesCo2: number;
  status: CreditStatus;
  correlation: number | null;
  flaggedReason: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type CreditPatch = Pick<CreditRecord, 'status' | 'correlation' | 'flaggedReason'>;

export interface IrradianceSample {
  lat: number;
  lon: number;
  date: string;
  timestamp: Date;
  /** All-sky surface shortwave irradiance, hourly mean in W/m^2 */
  allskyIrradiance: number;
}

export interface IrradianceDay {
  lat: number;
  lon: number;
  date: string;
  samples: IrradianceSample[];
}

export interface CurvePoint {
  timestamp: Date;
  kwh: number;
}

export const AUDIT_ACTIONS = [
  'credit.calculated',
  'credit.verified',
  'credit.flagged',
  'credit.verification_pending',
  'credit.status_overridden',
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export interface AuditEntry {
  sequenceNo: number;
  timestamp: Date;
  entityRef: string;
  action: AuditAction;
  payload: Record<string, unknown>;
  payloadHash: string;
  prevHash: string;
  thisHash: string;
}
