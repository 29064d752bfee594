import { LedgerHaltedError } from '../errors';
import logger from '../logger';

export interface IntegrityState {
  halted: boolean;
  reason: string | null;
  brokenAtSequenceNo: number | null;
  haltedAt: Date | null;
}

/**
 * Tracks whether the audit chain has been found broken. While halted, every
 * ledger mutation is refused until an operator clears the halt.
 */
export class IntegrityGuard {
  private state: IntegrityState = {
    halted: false,
    reason: null,
    brokenAtSequenceNo: null,
    haltedAt: null,
  };

  halt(reason: string, brokenAtSequenceNo: number | null = null, now = new Date()) {
    this.state = { halted: true, reason, brokenAtSequenceNo, haltedAt: now };
    logger.error({ reason, brokenAtSequenceNo }, '[integrity] ledger halted');
  }

  clear(operatorNote: string) {
    logger.warn('[integrity] halt cleared', { operatorNote, previous: this.state.reason });
    this.state = { halted: false, reason: null, brokenAtSequenceNo: null, haltedAt: null };
  }

  assertOperational() {
    if (this.state.halted) {
      throw new LedgerHaltedError(this.state.reason ?? 'audit chain integrity failure');
    }
  }

  snapshot(): IntegrityState {
    return { ...this.state };
  }
}
