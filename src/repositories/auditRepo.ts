import { canonicalize } from '../audit/canonical';
import { type Queryable, poolQueryable } from '../db';
import { AUDIT_ACTIONS, type AuditAction, type AuditEntry } from '../types/dmrv';
import type { AuditRepository } from './types';

interface AuditRow {
  sequenceNo: string;
  timestamp: Date;
  entityRef: string;
  action: string;
  payload: string;
  payloadHash: string;
  prevHash: string;
  thisHash: string;
}

/** pg_advisory_xact_lock key guarding the chain head. */
export const AUDIT_HEAD_LOCK_KEY = 'audit_entries:head';

const SELECT_COLUMNS = `
  sequence_no AS "sequenceNo",
  ts AS "timestamp",
  entity_ref AS "entityRef",
  action,
  payload,
  payload_hash AS "payloadHash",
  prev_hash AS "prevHash",
  this_hash AS "thisHash"
`;

function isAuditAction(value: string): value is AuditAction {
  return AUDIT_ACTIONS.some((action) => action === value);
}

function parsePayload(text: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Stored audit payload is not an object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

function toEntry(row: AuditRow): AuditEntry {
  if (!isAuditAction(row.action)) {
    throw new Error(`Unknown audit action in storage: ${row.action}`);
  }
  return {
    sequenceNo: Number(row.sequenceNo),
    timestamp: new Date(row.timestamp),
    entityRef: row.entityRef,
    action: row.action,
    payload: parsePayload(row.payload),
    payloadHash: row.payloadHash.trim(),
    prevHash: row.prevHash.trim(),
    thisHash: row.thisHash.trim(),
  };
}

/** Takes the head lock for the current transaction, then reads the head. */
export async function lockAuditHead(db: Queryable): Promise<AuditEntry | null> {
  await db.query(`SELECT pg_advisory_xact_lock(hashtext($1));`, [AUDIT_HEAD_LOCK_KEY]);
  const { rows } = await db.query<AuditRow>(
    `SELECT ${SELECT_COLUMNS} FROM audit_entries ORDER BY sequence_no DESC LIMIT 1;`,
  );
  return rows[0] ? toEntry(rows[0]) : null;
}

export async function insertAuditEntry(entry: AuditEntry, db: Queryable): Promise<void> {
  await db.query(
    `
    INSERT INTO audit_entries (sequence_no, ts, entity_ref, action, payload, payload_hash, prev_hash, this_hash)
    VALUES ($1, $2, $3, $4, $5, $6, $7, $8);
  `,
    [
      entry.sequenceNo,
      entry.timestamp.toISOString(),
      entry.entityRef,
      entry.action,
      canonicalize(entry.payload),
      entry.payloadHash,
      entry.prevHash,
      entry.thisHash,
    ],
  );
}

export async function getAuditEntries(
  options: { afterSequenceNo?: number; limit: number },
  db: Queryable = poolQueryable,
): Promise<AuditEntry[]> {
  const { rows } = await db.query<AuditRow>(
    `
    SELECT ${SELECT_COLUMNS}
    FROM audit_entries
    WHERE ($1::bigint IS NULL OR sequence_no > $1)
    ORDER BY sequence_no ASC
    LIMIT $2;
  `,
    [options.afterSequenceNo ?? null, options.limit],
  );
  return rows.map(toEntry);
}

export async function getAuditEntriesForEntity(
  entityRef: string,
  db: Queryable = poolQueryable,
): Promise<AuditEntry[]> {
  const { rows } = await db.query<AuditRow>(
    `SELECT ${SELECT_COLUMNS} FROM audit_entries WHERE entity_ref = $1 ORDER BY sequence_no ASC;`,
    [entityRef],
  );
  return rows.map(toEntry);
}

/** Repository over `db`; `lockHead` only serializes when `db` is a transaction client. */
export function auditRepository(db: Queryable = poolQueryable): AuditRepository {
  return {
    lockHead: () => lockAuditHead(db),
    insert: (entry) => insertAuditEntry(entry, db),
    list: (options) => getAuditEntries(options, db),
    listForEntity: (entityRef) => getAuditEntriesForEntity(entityRef, db),
  };
}
