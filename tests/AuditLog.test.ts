import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  AuditLog,
  FileAuditSink,
  IAuditSink,
  InMemoryAuditSink,
  formatTimestamp,
} from '../src/domain/audit/AuditLog.js';
import { fixedClock } from './helpers.js';

describe('AuditLog', () => {
  let sink: InMemoryAuditSink;
  let audit: AuditLog;

  beforeEach(() => {
    sink = new InMemoryAuditSink();
    audit = new AuditLog(sink, fixedClock);
  });

  it('writes one pipe-delimited line per record', () => {
    audit.record('CONFIRMED', { store: '10391', total: 34.87, estimated: false, order_id: 'A-1' });

    expect(sink.lines).toEqual([
      '2026-03-01T12:00:00Z | PLACE_ORDER | CONFIRMED | store=10391 | total=34.87 | estimated=false | order_id=A-1',
    ]);
  });

  it('omits absent fields', () => {
    audit.record('DRY_RUN', { store: '10391', scheduled: undefined, note: null });

    expect(sink.lines).toEqual(['2026-03-01T12:00:00Z | PLACE_ORDER | DRY_RUN | store=10391']);
  });

  it('keeps values on one line and out of the delimiter', () => {
    audit.record('ERROR', { error: 'bad | worse\nworst' });

    expect(sink.lines).toEqual(['2026-03-01T12:00:00Z | PLACE_ORDER | ERROR | error=bad / worse worst']);
  });

  it('writes a bare line without fields', () => {
    audit.record('ABORTED');

    expect(sink.lines).toEqual(['2026-03-01T12:00:00Z | PLACE_ORDER | ABORTED']);
  });

  it('does not throw when the sink fails', () => {
    const failing: IAuditSink = {
      append: () => {
        throw new Error('read-only file system');
      },
    };

    expect(() => new AuditLog(failing).record('ABORTED', { reason: 'NOT_CONFIRMED' })).not.toThrow();
  });

  it('formats timestamps in UTC without milliseconds', () => {
    expect(formatTimestamp(new Date('2026-02-27T18:30:00.789Z'))).toBe('2026-02-27T18:30:00Z');
  });

  describe('FileAuditSink', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'audit-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('appends lines to the file', () => {
      const path = join(dir, 'logs', 'orders.log');
      const fileAudit = new AuditLog(new FileAuditSink(path), fixedClock);

      fileAudit.record('ABORTED', { reason: 'NOT_CONFIRMED' });
      fileAudit.record('ABORTED', { reason: 'EMPTY_CART' });

      expect(readFileSync(path, 'utf8')).toBe(
        '2026-03-01T12:00:00Z | PLACE_ORDER | ABORTED | reason=NOT_CONFIRMED\n' +
          '2026-03-01T12:00:00Z | PLACE_ORDER | ABORTED | reason=EMPTY_CART\n'
      );
    });
  });
});
