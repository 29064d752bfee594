import { ChainTamperedError } from '../errors';
import type { AuditRepository } from '../repositories/types';
import type { AuditAction, AuditEntry } from '../types/dmrv';
import { canonicalize, sha256 } from './canonical';

/** prev_hash of entry 0 */
export const GENESIS_HASH = '0'.repeat(64);

const VERIFY_PAGE_SIZE = 500;

export function computeEntryHash(
  prevHash: string,
  canonicalPayload: string,
  timestamp: Date,
  sequenceNo: number,
): string {
  return sha256([prevHash, canonicalPayload, timestamp.toISOString(), String(sequenceNo)].join('|'));
}

export interface ChainVerification {
  valid: true;
  totalEntries: number;
  headSequenceNo: number | null;
  headHash: string;
}

/**
 * Append-only, hash-chained log of credit events.
 *
 * Appends go through the repository of the caller's transaction, so the
 * sequence number is claimed atomically with the ledger write it describes.
 */
export class AuditTrail {
  constructor(
    private readonly entries: AuditRepository,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async append(
    tx: AuditRepository,
    entityRef: string,
    action: AuditAction,
    payload: Record<string, unknown>,
  ): Promise<AuditEntry> {
    const head = await tx.lockHead();
    const sequenceNo = head ? head.sequenceNo + 1 : 0;
    const prevHash = head ? head.thisHash : GENESIS_HASH;
    const timestamp = this.clock();
    const canonicalPayload = canonicalize(payload);

    const entry: AuditEntry = {
      sequenceNo,
      timestamp,
      entityRef,
      action,
      payload,
      payloadHash: sha256(canonicalPayload),
      prevHash,
      thisHash: computeEntryHash(prevHash, canonicalPayload, timestamp, sequenceNo),
    };
    await tx.insert(entry);
    return entry;
  }

  /**
   * Recompute the chain from entry 0.
   * @throws ChainTamperedError at the first entry whose link or hashes do not match.
   */
  async verifyChain(): Promise<ChainVerification> {
    let expectedSequence = 0;
    let prevHash = GENESIS_HASH;
    let afterSequenceNo: number | undefined;

    for (;;) {
      const page = await this.entries.list({ afterSequenceNo, limit: VERIFY_PAGE_SIZE });
      for (const entry of page) {
        if (entry.sequenceNo !== expectedSequence) {
          throw new ChainTamperedError(
            expectedSequence,
            `expected sequence ${expectedSequence}, found ${entry.sequenceNo}`,
          );
        }
        if (entry.prevHash !== prevHash) {
          throw new ChainTamperedError(entry.sequenceNo, 'prev_hash does not link to previous entry');
        }
        const canonicalPayload = canonicalize(entry.payload);
        if (sha256(canonicalPayload) !== entry.payloadHash) {
          throw new ChainTamperedError(entry.sequenceNo, 'payload hash mismatch');
        }
        const recomputed = computeEntryHash(
          entry.prevHash,
          canonicalPayload,
          entry.timestamp,
          entry.sequenceNo,
        );
        if (recomputed !== entry.thisHash) {
          throw new ChainTamperedError(entry.sequenceNo, 'entry hash mismatch');
        }
        prevHash = entry.thisHash;
        expectedSequence += 1;
      }
      if (page.length < VERIFY_PAGE_SIZE) break;
      afterSequenceNo = page[page.length - 1].sequenceNo;
    }

    return {
      valid: true,
      totalEntries: expectedSequence,
      headSequenceNo: expectedSequence > 0 ? expectedSequence - 1 : null,
      headHash: prevHash,
    };
  }

  list(options: { afterSequenceNo?: number; limit: number }): Promise<AuditEntry[]> {
    return this.entries.list(options);
  }

  listForEntity(entityRef: string): Promise<AuditEntry[]> {
    return this.entries.listForEntity(entityRef);
  }
}
