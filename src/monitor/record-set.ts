import { BlockedPackageRecord } from '../types';

function keyOf({ name, version }: BlockedPackageRecord): string {
  return JSON.stringify([name, version]);
}

/**
 * Insertion-ordered set of blocked packages, compared by exact
 * `(name, version)` equality.
 */
export class OrderedRecordSet {
  private readonly entries = new Map<string, BlockedPackageRecord>();

  add(record: BlockedPackageRecord): boolean {
    const key = keyOf(record);
    if (this.entries.has(key)) return false;
    this.entries.set(key, { name: record.name, version: record.version });
    return true;
  }

  has(record: BlockedPackageRecord): boolean {
    return this.entries.has(keyOf(record));
  }

  get size(): number {
    return this.entries.size;
  }

  values(): BlockedPackageRecord[] {
    return Array.from(this.entries.values());
  }
}
