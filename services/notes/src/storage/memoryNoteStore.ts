import {
  alreadyExists,
  notFound,
  stored,
  type NoteStore,
  type StoreResult,
} from '../contracts/noteStore';
import { nextUpdatedAt } from '../codec/note';
import type { NoteId, NoteRecord, NoteUpdate, Owner } from '../types';

export type MemoryTable = Map<string, NoteRecord>;

const tableKey = (owner: Owner, id: NoteId) => `${owner}#${id}`;

/**
 * In-process table. Each check-and-mutate runs synchronously inside one call, so it is as
 * atomic as the real backends' conditional writes. Records are copied in and out.
 */
export class MemoryNoteStore implements NoteStore {
  readonly backend = 'memory';

  constructor(
    private readonly owner: Owner,
    private readonly table: MemoryTable = new Map(),
  ) {}

  async putIfAbsent(record: NoteRecord): Promise<StoreResult<void>> {
    const key = tableKey(record.owner, record.id);
    if (this.table.has(key)) return alreadyExists();
    this.table.set(key, { ...record });
    return stored(undefined);
  }

  async updateIfPresent(id: NoteId, fields: NoteUpdate): Promise<StoreResult<NoteRecord>> {
    const key = tableKey(this.owner, id);
    const existing = this.table.get(key);
    if (!existing) return notFound();
    const next: NoteRecord = {
      ...existing,
      title: fields.title,
      note: fields.note,
      // strictly later than whatever is stored
      updated_at: nextUpdatedAt(existing.updated_at, fields.updated_at),
    };
    this.table.set(key, next);
    return stored({ ...next });
  }

  async deleteIfPresent(id: NoteId): Promise<StoreResult<void>> {
    return this.table.delete(tableKey(this.owner, id)) ? stored(undefined) : notFound();
  }

  async listByOwner(): Promise<StoreResult<NoteRecord[]>> {
    const items: NoteRecord[] = [];
    for (const record of this.table.values()) {
      if (record.owner === this.owner) items.push({ ...record });
    }
    return stored(items);
  }
}
