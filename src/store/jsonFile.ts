import fs from 'node:fs';
import path from 'node:path';

/**
 * Map-backed record collection mirrored to a JSON array on disk. The whole file is
 * rewritten on each mutation; writes go through a temp file and a rename so a crash
 * never leaves half a file behind.
 */
export class JsonFileCollection<T extends { id: string }> {
  private records = new Map<string, T>();

  constructor(
    private readonly storePath: string,
    private readonly isRecord: (value: unknown) => value is T,
  ) {
    fs.mkdirSync(path.dirname(storePath), { recursive: true });
    this.loadFromDisk();
  }

  private loadFromDisk(): void {
    if (!fs.existsSync(this.storePath)) {
      return;
    }

    const raw = fs.readFileSync(this.storePath, 'utf-8');
    if (!raw.trim()) {
      return;
    }

    const parsed: unknown = JSON.parse(raw);
    const entries: unknown[] = Array.isArray(parsed)
      ? parsed
      : parsed && typeof parsed === 'object'
        ? Object.values(parsed)
        : [];

    let skipped = 0;
    entries.forEach((entry) => {
      if (this.isRecord(entry)) {
        this.records.set(entry.id, entry);
      } else {
        skipped += 1;
      }
    });

    if (skipped) {
      console.warn(`[store] Skipped ${skipped} malformed record(s) in ${this.storePath}.`);
    }
  }

  // Memory changes only once the file is written.
  private commit(next: Map<string, T>): void {
    const payload = JSON.stringify(Array.from(next.values()), null, 2);
    const tempPath = `${this.storePath}.tmp`;
    fs.writeFileSync(tempPath, payload);
    fs.renameSync(tempPath, this.storePath);
    this.records = next;
  }

  get(id: string): T | undefined {
    return this.records.get(id);
  }

  values(): T[] {
    return Array.from(this.records.values());
  }

  size(): number {
    return this.records.size;
  }

  insert(record: T): T {
    if (this.records.has(record.id)) {
      throw new Error(`Record ${record.id} already exists in ${path.basename(this.storePath)}.`);
    }
    this.commit(new Map(this.records).set(record.id, record));
    return record;
  }

  replace(record: T): T {
    this.commit(new Map(this.records).set(record.id, record));
    return record;
  }

  remove(id: string): boolean {
    if (!this.records.has(id)) {
      return false;
    }
    const next = new Map(this.records);
    next.delete(id);
    this.commit(next);
    return true;
  }
}

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);
