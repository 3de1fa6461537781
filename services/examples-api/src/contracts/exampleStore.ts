import type { ExampleId, ExamplePatch, ExampleRecord, NewExample } from '../types';

/** Raised by every store operation that addresses a record that does not exist. */
export class RecordNotFoundError extends Error {
  constructor(public readonly id: ExampleId) {
    super(`Example ${id} not found`);
    this.name = 'RecordNotFoundError';
  }
}

/** One slice of the ordered record set plus the total across all slices. */
export interface ExamplePage {
  items: ExampleRecord[];
  total: number;
}

/** Clock used for `created_at` / `updated_at`, in epoch milliseconds. */
export type Clock = () => number;

/** Defines a pluggable storage backend the example routes rely on. */
export interface ExampleStore {
  list(offset: number, limit: number): Promise<ExamplePage>;
  create(input: NewExample): Promise<ExampleRecord>;
  get(id: ExampleId): Promise<ExampleRecord>;
  update(id: ExampleId, patch: ExamplePatch): Promise<ExampleRecord>;
  delete(id: ExampleId): Promise<void>;
  ping(): Promise<void>;
}

/** Next `updated_at` for a mutation: strictly after the previous value. */
export function nextUpdatedAt(previous: Date, now: number): Date {
  return new Date(now <= previous.getTime() ? previous.getTime() + 1 : now);
}

/** Overwrites only the fields present in `patch` and refreshes `updated_at`. */
export function applyPatch(current: ExampleRecord, patch: ExamplePatch, now: number): ExampleRecord {
  return {
    ...current,
    name: patch.name ?? current.name,
    description: patch.description ?? current.description,
    is_active: patch.is_active ?? current.is_active,
    updated_at: nextUpdatedAt(current.updated_at, now),
  };
}
