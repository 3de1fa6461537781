import {
  RecordNotFoundError,
  applyPatch,
  type Clock,
  type ExamplePage,
  type ExampleStore,
} from '../contracts/exampleStore';
import type { ExampleId, ExamplePatch, ExampleRecord, NewExample } from '../types';

/** In-process store for local runs and tests. Records live only as long as the instance. */
export class MemoryExampleStore implements ExampleStore {
  // Map iteration follows insertion order; newest is last
  private readonly records = new Map<ExampleId, ExampleRecord>();
  private seq = 0;

  constructor(private readonly now: Clock = Date.now) {}

  async list(offset: number, limit: number): Promise<ExamplePage> {
    const ordered = Array.from(this.records.values()).reverse();
    return {
      items: ordered.slice(offset, offset + Math.max(limit, 0)).map(copy),
      total: ordered.length,
    };
  }

  async create(input: NewExample): Promise<ExampleRecord> {
    this.seq += 1;
    const now = new Date(this.now());
    const record: ExampleRecord = { id: String(this.seq), ...input, created_at: now, updated_at: now };
    this.records.set(record.id, record);
    return copy(record);
  }

  async get(id: ExampleId): Promise<ExampleRecord> {
    const record = this.records.get(id);
    if (!record) throw new RecordNotFoundError(id);
    return copy(record);
  }

  async update(id: ExampleId, patch: ExamplePatch): Promise<ExampleRecord> {
    const current = this.records.get(id);
    if (!current) throw new RecordNotFoundError(id);
    const updated = applyPatch(current, patch, this.now());
    this.records.set(id, updated);
    return copy(updated);
  }

  async delete(id: ExampleId): Promise<void> {
    if (!this.records.delete(id)) throw new RecordNotFoundError(id);
  }

  async ping(): Promise<void> {}
}

function copy(record: ExampleRecord): ExampleRecord {
  return {
    ...record,
    created_at: new Date(record.created_at.getTime()),
    updated_at: new Date(record.updated_at.getTime()),
  };
}
