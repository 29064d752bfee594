import { type Queryable, poolQueryable } from '../db';
import type { Inverter, NewInverter } from '../types/dmrv';
import type { InverterRepository } from './types';

interface InverterRow {
  id: number;
  gpsLat: number;
  gpsLon: number;
  capacityKw: number;
  createdAt: Date;
}

const SELECT_COLUMNS = `id, gps_lat AS "gpsLat", gps_lon AS "gpsLon", capacity_kw AS "capacityKw", created_at AS "createdAt"`;

function toInverter(row: InverterRow): Inverter {
  return {
    id: Number(row.id),
    gpsLat: Number(row.gpsLat),
    gpsLon: Number(row.gpsLon),
    capacityKw: Number(row.capacityKw),
    createdAt: new Date(row.createdAt),
  };
}

export async function createInverter(input: NewInverter, db: Queryable = poolQueryable): Promise<Inverter> {
  const { rows } = await db.query<InverterRow>(
    `
    INSERT INTO inverters (gps_lat, gps_lon, capacity_kw)
    VALUES ($1, $2, $3)
    RETURNING ${SELECT_COLUMNS};
  `,
    [input.gpsLat, input.gpsLon, input.capacityKw],
  );
  return toInverter(rows[0]);
}

export async function getInverterById(id: number, db: Queryable = poolQueryable): Promise<Inverter | null> {
  const { rows } = await db.query<InverterRow>(
    `SELECT ${SELECT_COLUMNS} FROM inverters WHERE id = $1 LIMIT 1;`,
    [id],
  );
  return rows[0] ? toInverter(rows[0]) : null;
}

export async function getAllInverters(db: Queryable = poolQueryable): Promise<Inverter[]> {
  const { rows } = await db.query<InverterRow>(`SELECT ${SELECT_COLUMNS} FROM inverters ORDER BY id;`);
  return rows.map(toInverter);
}

export async function countInverters(db: Queryable = poolQueryable): Promise<number> {
  const { rows } = await db.query<{ count: string }>(`SELECT COUNT(*) AS count FROM inverters;`);
  return Number(rows[0]?.count ?? 0);
}

export function inverterRepository(db: Queryable = poolQueryable): InverterRepository {
  return {
    create: (input) => createInverter(input, db),
    findById: (id) => getInverterById(id, db),
    list: () => getAllInverters(db),
    count: () => countInverters(db),
  };
}
