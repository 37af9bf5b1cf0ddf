import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { SessionRecord } from '../../domain/models.js';

// Durable home of the session record. Both methods may throw; the session
// store decides what a failure means.
export interface ISessionStorage {
  // null when nothing has been written yet
  read(): unknown;
  write(record: SessionRecord): void;
}

export class FileSessionStorage implements ISessionStorage {
  constructor(private readonly path: string) {}

  read(): unknown {
    let raw: string;
    try {
      raw = readFileSync(this.path, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    }
    return JSON.parse(raw);
  }

  write(record: SessionRecord): void {
    mkdirSync(dirname(this.path), { recursive: true });
    // the previous record stays readable until the rename
    const tmp = `${this.path}.tmp`;
    writeFileSync(tmp, JSON.stringify(record, null, 2), 'utf8');
    renameSync(tmp, this.path);
  }
}

export class InMemorySessionStorage implements ISessionStorage {
  private stored: string | null = null;

  constructor(initial?: unknown) {
    if (initial !== undefined) this.stored = JSON.stringify(initial);
  }

  read(): unknown {
    return this.stored === null ? null : JSON.parse(this.stored);
  }

  write(record: SessionRecord): void {
    this.stored = JSON.stringify(record);
  }

  // Utility for testing
  writeRaw(content: string): void {
    this.stored = content;
  }
}
