import type { NoteId, NoteRecord, NoteUpdate } from '../types';

/** Condition failures are distinct from transport failures because handlers branch on them. */
export type StoreError =
  | { kind: 'AlreadyExists' }
  | { kind: 'NotFound' }
  | { kind: 'StoreUnavailable'; cause: unknown };

export type StoreResult<T> = { ok: true; value: T } | { ok: false; error: StoreError };

/**
 * Key-value table addressed by (owner, id). Each backend is bound to one owner partition;
 * every mutation is a single conditional operation evaluated atomically by the store.
 * Implementations report failures as result variants and do not throw.
 */
export interface NoteStore {
  readonly backend: string;
  putIfAbsent(record: NoteRecord): Promise<StoreResult<void>>;
  updateIfPresent(id: NoteId, fields: NoteUpdate): Promise<StoreResult<NoteRecord>>;
  deleteIfPresent(id: NoteId): Promise<StoreResult<void>>;
  listByOwner(): Promise<StoreResult<NoteRecord[]>>;
}

export const stored = <T>(value: T): StoreResult<T> => ({ ok: true, value });

export const alreadyExists = <T>(): StoreResult<T> => ({ ok: false, error: { kind: 'AlreadyExists' } });

export const notFound = <T>(): StoreResult<T> => ({ ok: false, error: { kind: 'NotFound' } });

export const storeUnavailable = <T>(cause: unknown): StoreResult<T> => ({
  ok: false,
  error: { kind: 'StoreUnavailable', cause },
});
