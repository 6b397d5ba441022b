import { getRedis } from './client';
import type { NoteId, NoteRecord, NoteUpdate, Owner } from '../types';

// One hash per note, plus a set of the ids in each owner partition.
export const noteKey = (table: string, owner: Owner, id: NoteId) => `${table}:${owner}:note:${id}`;
export const partitionIdsKey = (table: string, owner: Owner) => `${table}:${owner}:ids`;

export const NOTE_FIELDS = ['owner', 'id', 'title', 'note', 'created_at', 'updated_at'] as const;

// KEYS: note hash, id set. ARGV: the six fields in NOTE_FIELDS order. 1 = inserted, 0 = taken.
export const PUT_IF_ABSENT_LUA = `
if redis.call('EXISTS', KEYS[1]) == 1 then
  return 0
end
redis.call('HSET', KEYS[1], 'owner', ARGV[1], 'id', ARGV[2], 'title', ARGV[3], 'note', ARGV[4], 'created_at', ARGV[5], 'updated_at', ARGV[6])
redis.call('SADD', KEYS[2], ARGV[2])
return 1
`;

// KEYS: note hash. ARGV: title, note, updated_at.
// Replies {'missing'}, {'stale', stored updated_at} when ARGV[3] is not later,
// or {'updated', <six fields>}.
export const UPDATE_IF_PRESENT_LUA = `
if redis.call('EXISTS', KEYS[1]) == 0 then
  return {'missing'}
end
local function sortable(ts)
  local head, frac = string.match(ts, '^(.-)%.(%d+)Z$')
  if not head then
    head = string.sub(ts, 1, -2)
    frac = ''
  end
  return head .. '.' .. frac .. string.rep('0', 6 - string.len(frac))
end
local previous = redis.call('HGET', KEYS[1], 'updated_at')
if previous and sortable(ARGV[3]) <= sortable(previous) then
  return {'stale', previous}
end
redis.call('HSET', KEYS[1], 'title', ARGV[1], 'note', ARGV[2], 'updated_at', ARGV[3])
local rec = redis.call('HMGET', KEYS[1], 'owner', 'id', 'title', 'note', 'created_at', 'updated_at')
table.insert(rec, 1, 'updated')
return rec
`;

// KEYS: note hash, id set. ARGV: id. Replies the number of hashes removed.
export const DELETE_IF_PRESENT_LUA = `
local removed = redis.call('DEL', KEYS[1])
redis.call('SREM', KEYS[2], ARGV[1])
return removed
`;

export type UpdateReply =
  | { status: 'missing' }
  | { status: 'stale'; previous: string }
  | { status: 'updated'; fields: Record<string, string> };

/** True when the note was created, false when the key was already taken. */
export async function insertNote(table: string, record: NoteRecord): Promise<boolean> {
  const res = await getRedis().eval(
    PUT_IF_ABSENT_LUA,
    2,
    noteKey(table, record.owner, record.id),
    partitionIdsKey(table, record.owner),
    ...NOTE_FIELDS.map((field) => record[field]),
  );
  return Number(res) === 1;
}

export async function updateNote(
  table: string,
  owner: Owner,
  id: NoteId,
  fields: NoteUpdate,
): Promise<UpdateReply> {
  const res = await getRedis().eval(
    UPDATE_IF_PRESENT_LUA,
    1,
    noteKey(table, owner, id),
    fields.title,
    fields.note,
    fields.updated_at,
  );
  if (!Array.isArray(res) || res.length === 0) {
    throw new Error('unexpected reply from update script');
  }

  const [status, ...rest] = res.map(toStringSafe);
  if (status === 'missing') return { status: 'missing' };
  if (status === 'stale') return { status: 'stale', previous: rest[0] ?? '' };
  if (status === 'updated') return { status: 'updated', fields: zipFields(rest) };
  throw new Error(`unexpected update status: ${status}`);
}

/** True when a note was removed. */
export async function removeNote(table: string, owner: Owner, id: NoteId): Promise<boolean> {
  const res = await getRedis().eval(
    DELETE_IF_PRESENT_LUA,
    2,
    noteKey(table, owner, id),
    partitionIdsKey(table, owner),
    id,
  );
  return Number(res) > 0;
}

/** Field maps of every note in the partition; ids whose hash has gone are skipped. */
export async function listNotes(table: string, owner: Owner): Promise<Array<Record<string, string>>> {
  const redis = getRedis();
  const ids = await redis.smembers(partitionIdsKey(table, owner));
  if (!ids || ids.length === 0) return [];

  const multi = redis.multi();
  for (const id of ids) {
    multi.hmget(noteKey(table, owner, id), ...NOTE_FIELDS);
  }
  const results = (await multi.exec()) ?? [];

  const notes: Array<Record<string, string>> = [];
  for (const [err, values] of results) {
    if (err) throw err;
    if (!Array.isArray(values) || values.every((value) => value === null)) continue;
    notes.push(zipFields(values.map(toStringSafe)));
  }
  return notes;
}

function zipFields(values: string[]): Record<string, string> {
  const fields: Record<string, string> = {};
  NOTE_FIELDS.forEach((field, idx) => {
    const value = values[idx];
    if (value) fields[field] = value;
  });
  return fields;
}

function toStringSafe(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  if (value == null) return '';
  return String(value);
}
