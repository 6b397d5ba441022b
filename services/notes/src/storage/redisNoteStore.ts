import { insertNote, listNotes, removeNote, updateNote, type UpdateReply } from '../redis/kv';
import { decodeNoteRecord, nextUpdatedAt } from '../codec/note';
import {
  alreadyExists,
  notFound,
  stored,
  storeUnavailable,
  type NoteStore,
  type StoreResult,
} from '../contracts/noteStore';
import type { NoteId, NoteRecord, NoteUpdate, Owner } from '../types';

// A stale reply only repeats when another writer keeps moving updated_at forward.
const MAX_UPDATE_ATTEMPTS = 3;

/**
 * Implements `NoteStore` on top of a Redis hash per note and an id set per owner.
 * Every mutation is one Lua script, so the existence check and the write run as a single
 * atomic step on the server.
 */
export class RedisNoteStore implements NoteStore {
  readonly backend = 'redis';

  constructor(
    private readonly table: string,
    private readonly owner: Owner,
  ) {}

  async putIfAbsent(record: NoteRecord): Promise<StoreResult<void>> {
    try {
      const created = await insertNote(this.table, record);
      return created ? stored(undefined) : alreadyExists();
    } catch (err) {
      return storeUnavailable(err);
    }
  }

  async updateIfPresent(id: NoteId, fields: NoteUpdate): Promise<StoreResult<NoteRecord>> {
    let updatedAt = fields.updated_at;
    for (let attempt = 0; attempt < MAX_UPDATE_ATTEMPTS; attempt++) {
      let reply: UpdateReply;
      try {
        reply = await updateNote(this.table, this.owner, id, { ...fields, updated_at: updatedAt });
      } catch (err) {
        return storeUnavailable(err);
      }

      if (reply.status === 'missing') return notFound();
      if (reply.status === 'stale') {
        updatedAt = nextUpdatedAt(reply.previous, updatedAt);
        continue;
      }

      const record = this.decode(reply.fields);
      if (!record) return storeUnavailable(new Error(`stored note ${id} is malformed`));
      return stored(record);
    }
    return storeUnavailable(new Error(`updated_at of note ${id} kept moving; gave up`));
  }

  async deleteIfPresent(id: NoteId): Promise<StoreResult<void>> {
    try {
      const removed = await removeNote(this.table, this.owner, id);
      return removed ? stored(undefined) : notFound();
    } catch (err) {
      return storeUnavailable(err);
    }
  }

  async listByOwner(): Promise<StoreResult<NoteRecord[]>> {
    let rows: Array<Record<string, string>>;
    try {
      rows = await listNotes(this.table, this.owner);
    } catch (err) {
      return storeUnavailable(err);
    }

    const items: NoteRecord[] = [];
    for (const row of rows) {
      const record = this.decode(row);
      if (!record) return storeUnavailable(new Error(`malformed note under ${this.table}:${this.owner}`));
      items.push(record);
    }
    return stored(items);
  }

  private decode(fields: Record<string, string>): NoteRecord | null {
    const record = decodeNoteRecord(fields);
    return record && record.owner === this.owner ? record : null;
  }
}
