/**
 * Page params snapshot
 *
 * Ordered field map that remembers every write. Field order is the
 * order of first write; rewriting a field keeps its position.
 */

export interface SnapshotWrite {
  field: string;
  value: unknown;
}

export class Snapshot {
  private readonly fields = new Map<string, unknown>();
  private readonly log: SnapshotWrite[] = [];

  set(field: string, value: unknown): this {
    this.fields.set(field, value);
    this.log.push({ field, value });
    return this;
  }

  /**
   * Write every key of a plain object, in its key order
   */
  merge(values: Record<string, unknown>): this {
    for (const [field, value] of Object.entries(values)) {
      this.set(field, value);
    }
    return this;
  }

  get(field: string): unknown {
    return this.fields.get(field);
  }

  has(field: string): boolean {
    return this.fields.has(field);
  }

  keys(): string[] {
    return [...this.fields.keys()];
  }

  /**
   * Every write in the order it happened
   */
  get writes(): readonly SnapshotWrite[] {
    return this.log;
  }

  toJSON(): Record<string, unknown> {
    return Object.fromEntries(this.fields);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
