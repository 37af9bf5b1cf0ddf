import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { auditLogger as log } from '../../utils/logger.js';
import { errorMessage } from '../errors/index.js';

export type AuditOutcome = 'ABORTED' | 'DRY_RUN' | 'CONFIRMED' | 'ERROR';

export type AuditFields = Record<string, string | number | boolean | null | undefined>;

export interface IAuditSink {
  append(line: string): void;
}

export class FileAuditSink implements IAuditSink {
  constructor(private readonly path: string) {}

  append(line: string): void {
    mkdirSync(dirname(this.path), { recursive: true });
    appendFileSync(this.path, `${line}\n`, 'utf8');
  }
}

export class InMemoryAuditSink implements IAuditSink {
  readonly lines: string[] = [];

  append(line: string): void {
    this.lines.push(line);
  }
}

// 2026-02-27T18:30:00Z
export function formatTimestamp(at: Date): string {
  return at.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

// keeps one record per line and the pipe delimiter unambiguous
function formatValue(value: string | number | boolean): string {
  return String(value).replace(/[\r\n]+/g, ' ').replace(/\|/g, '/');
}

/**
 * Append-only trail of order placement attempts, one line each:
 *
 *   2026-02-27T18:30:00Z | PLACE_ORDER | CONFIRMED | store=10391 | total=34.87
 *
 * A failing sink is logged and otherwise ignored.
 */
export class AuditLog {
  constructor(
    private readonly sink: IAuditSink,
    private readonly clock: () => Date = () => new Date()
  ) {}

  record(outcome: AuditOutcome, fields: AuditFields = {}): void {
    const tail = Object.entries(fields)
      .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined && entry[1] !== null)
      .map(([key, value]) => `${key}=${formatValue(value)}`);

    const line = [formatTimestamp(this.clock()), 'PLACE_ORDER', outcome, ...tail].join(' | ');

    try {
      this.sink.append(line);
    } catch (error) {
      log.warn({ outcome, error: errorMessage(error) }, 'Failed to write audit log');
    }
  }
}
