import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { DuplicateCreditError } from '../src/errors';
import { formatLogLine } from '../src/logger';

const now = new Date('2025-01-15T08:00:00.000Z');

describe('log line formatting', () => {
  it('writes JSON with the fixed fields first and errors flattened', () => {
    const line = formatLogLine(
      'info',
      '[ledger] credit calculated',
      { inverterId: 3, err: new Error('boom'), skipped: undefined },
      { pretty: false, now },
    );

    assert.equal(
      line,
      '{"ts":"2025-01-15T08:00:00.000Z","level":"info","service":"solar-dmrv-engine",' +
        '"message":"[ledger] credit calculated","inverterId":3,"err":{"name":"Error","message":"boom"}}',
    );
  });

  it('keeps the fixed fields when meta reuses their names', () => {
    const parsed: unknown = JSON.parse(
      formatLogLine('warn', 'real message', { level: 'debug', message: 'other' }, { pretty: false, now }),
    );
    assert.deepEqual(parsed, {
      ts: '2025-01-15T08:00:00.000Z',
      level: 'warn',
      service: 'solar-dmrv-engine',
      message: 'real message',
    });
  });

  it('carries the kind of domain errors', () => {
    const line = formatLogLine(
      'error',
      '[http] request failed',
      { err: new DuplicateCreditError({ inverterId: 3, date: '2025-01-15' }) },
      { pretty: false, now },
    );
    const parsed: unknown = JSON.parse(line);
    assert.ok(typeof parsed === 'object' && parsed !== null && 'err' in parsed);
    assert.ok(typeof parsed.err === 'object' && parsed.err !== null && 'kind' in parsed.err);
    assert.equal(parsed.err.kind, 'duplicate');
  });

  it('writes pretty lines as key=value pairs', () => {
    const line = formatLogLine(
      'warn',
      '[ledger] status overridden',
      { attempt: 2, date: '2025-01-15', note: 'meter swap', at: new Date('2025-01-15T09:00:00.000Z') },
      { pretty: true, now },
    );

    assert.equal(
      line,
      '2025-01-15T08:00:00.000Z WARN  [ledger] status overridden attempt=2 date=2025-01-15 ' +
        'note="meter swap" at=2025-01-15T09:00:00.000Z',
    );
  });
});
