import { type Queryable, poolQueryable } from '../db';
import { CreditNotFoundError, DuplicateCreditError } from '../errors';
import {
  type CreditKey,
  type CreditPatch,
  type CreditRecord,
  type CreditStatus,
  isCreditStatus,
} from '../types/dmrv';
import type { CreditRepository, StatusSummaryRow } from './types';

interface CreditRow {
  inverterId: number;
  date: string;
  tonnesCo2: number;
  status: string;
  correlation: number | null;
  flaggedReason: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const SELECT_COLUMNS = `
  inverter_id AS "inverterId",
  to_char(credit_date, 'YYYY-MM-DD') AS "date",
  tonnes_co2 AS "tonnesCo2",
  status,
  correlation,
  flagged_reason AS "flaggedReason",
  created_at AS "createdAt",
  updated_at AS "updatedAt"
`;

function toStatus(value: string): CreditStatus {
  if (!isCreditStatus(value)) {
    throw new Error(`Unknown credit status in storage: ${value}`);
  }
  return value;
}

function toCredit(row: CreditRow): CreditRecord {
  return {
    inverterId: Number(row.inverterId),
    date: row.date,
    tonnesCo2: Number(row.tonnesCo2),
    status: toStatus(row.status),
    correlation: row.correlation === null ? null : Number(row.correlation),
    flaggedReason: row.flaggedReason,
    createdAt: new Date(row.createdAt),
    updatedAt: new Date(row.updatedAt),
  };
}

export async function findCredit(
  key: CreditKey,
  options: { forUpdate?: boolean } = {},
  db: Queryable = poolQueryable,
): Promise<CreditRecord | null> {
  const { rows } = await db.query<CreditRow>(
    `
    SELECT ${SELECT_COLUMNS}
    FROM credit_records
    WHERE inverter_id = $1 AND credit_date = $2::date
    ${options.forUpdate ? 'FOR UPDATE' : ''};
  `,
    [key.inverterId, key.date],
  );
  return rows[0] ? toCredit(rows[0]) : null;
}

export async function insertCredit(
  record: Omit<CreditRecord, 'createdAt' | 'updatedAt'>,
  now: Date,
  db: Queryable = poolQueryable,
): Promise<CreditRecord> {
  const { rows } = await db.query<CreditRow>(
    `
    INSERT INTO credit_records (inverter_id, credit_date, tonnes_co2, status, correlation, flagged_reason, created_at, updated_at)
    VALUES ($1, $2::date, $3, $4, $5, $6, $7, $7)
    ON CONFLICT ON CONSTRAINT credit_records_pkey DO NOTHING
    RETURNING ${SELECT_COLUMNS};
  `,
    [
      record.inverterId,
      record.date,
      record.tonnesCo2,
      record.status,
      record.correlation,
      record.flaggedReason,
      now.toISOString(),
    ],
  );
  if (!rows[0]) {
    throw new DuplicateCreditError(record);
  }
  return toCredit(rows[0]);
}

export async function updateCredit(
  key: CreditKey,
  patch: CreditPatch,
  now: Date,
  db: Queryable = poolQueryable,
): Promise<CreditRecord> {
  const { rows } = await db.query<CreditRow>(
    `
    UPDATE credit_records
    SET status = $3, correlation = $4, flagged_reason = $5, updated_at = $6
    WHERE inverter_id = $1 AND credit_date = $2::date
    RETURNING ${SELECT_COLUMNS};
  `,
    [key.inverterId, key.date, patch.status, patch.correlation, patch.flaggedReason, now.toISOString()],
  );
  if (!rows[0]) {
    throw new CreditNotFoundError(key);
  }
  return toCredit(rows[0]);
}

export async function getCreditsForInverter(
  inverterId: number,
  db: Queryable = poolQueryable,
): Promise<CreditRecord[]> {
  const { rows } = await db.query<CreditRow>(
    `SELECT ${SELECT_COLUMNS} FROM credit_records WHERE inverter_id = $1 ORDER BY credit_date DESC;`,
    [inverterId],
  );
  return rows.map(toCredit);
}

export async function getCreditsByStatus(
  status?: CreditStatus,
  db: Queryable = poolQueryable,
): Promise<CreditRecord[]> {
  const { rows } = await db.query<CreditRow>(
    `
    SELECT ${SELECT_COLUMNS}
    FROM credit_records
    WHERE ($1::text IS NULL OR status = $1)
    ORDER BY credit_date DESC, inverter_id ASC;
  `,
    [status ?? null],
  );
  return rows.map(toCredit);
}

export async function summarizeCreditsByStatus(db: Queryable = poolQueryable): Promise<StatusSummaryRow[]> {
  const { rows } = await db.query<{ status: string; count: string; tonnes: number }>(
    `
    SELECT status, COUNT(*) AS count, COALESCE(SUM(tonnes_co2), 0) AS tonnes
    FROM credit_records
    GROUP BY status
    ORDER BY status;
  `,
  );
  return rows.map((r) => ({ status: toStatus(r.status), count: Number(r.count), tonnesCo2: Number(r.tonnes) }));
}

export function creditRepository(db: Queryable = poolQueryable): CreditRepository {
  return {
    find: (key, options) => findCredit(key, options, db),
    insert: (record, now) => insertCredit(record, now, db),
    update: (key, patch, now) => updateCredit(key, patch, now, db),
    listForInverter: (inverterId) => getCreditsForInverter(inverterId, db),
    listByStatus: (status) => getCreditsByStatus(status, db),
    summarizeByStatus: () => summarizeCreditsByStatus(db),
  };
}
