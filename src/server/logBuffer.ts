import { EventEmitter } from 'node:events';

export const DEFAULT_MAX_LOG_ENTRIES = 50;

/**
 * Bounded append-only list of status lines. Readers always receive a copy, so
 * the loop can keep appending while streams are being written.
 */
export class LogBuffer extends EventEmitter {
  private readonly entries: string[] = [];

  constructor(readonly maxEntries = DEFAULT_MAX_LOG_ENTRIES) {
    super();
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer (received ${maxEntries})`);
    }
  }

  get size() {
    return this.entries.length;
  }

  append(line: string) {
    this.entries.push(line);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }
    this.emit('change', this.snapshot());
  }

  snapshot(): string[] {
    return [...this.entries];
  }

  clear() {
    this.entries.length = 0;
    this.emit('change', []);
  }
}
