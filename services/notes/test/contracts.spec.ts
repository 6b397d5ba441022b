import { describe, expect, it, vi } from 'vitest';
import {
  alreadyExists,
  notFound,
  stored,
  storeUnavailable,
  type NoteStore,
} from '../src/contracts/noteStore';
import { createNoteStore } from '../src/storage';
import { DynamoNoteStore } from '../src/storage/dynamoNoteStore';
import { MemoryNoteStore } from '../src/storage/memoryNoteStore';
import { RedisNoteStore } from '../src/storage/redisNoteStore';

const NOTES = { tableName: 'notes-test', owner: 'global' };

describe('Contracts surface', () => {
  it('builds each result variant', () => {
    const cause = new Error('down');
    expect(stored(3)).toEqual({ ok: true, value: 3 });
    expect(alreadyExists()).toEqual({ ok: false, error: { kind: 'AlreadyExists' } });
    expect(notFound()).toEqual({ ok: false, error: { kind: 'NotFound' } });
    expect(storeUnavailable(cause)).toEqual({ ok: false, error: { kind: 'StoreUnavailable', cause } });
  });

  it('forces store implementations to satisfy the interface', async () => {
    const putSpy = vi.fn(async () => stored(undefined));

    const backend: NoteStore = {
      backend: 'fake',
      putIfAbsent: async () => putSpy(),
      updateIfPresent: async () => notFound(),
      deleteIfPresent: async () => notFound(),
      listByOwner: async () => stored([]),
    };

    const result = await backend.putIfAbsent({
      owner: 'global',
      id: 'n1',
      title: 't',
      note: 'n',
      created_at: '2024-01-01T00:00:00.000Z',
      updated_at: '2024-01-01T00:00:00.000Z',
    });

    expect(putSpy).toHaveBeenCalledOnce();
    expect(result.ok).toBe(true);
    expect(await backend.deleteIfPresent('n1')).toEqual({ ok: false, error: { kind: 'NotFound' } });
  });
});

describe('createNoteStore', () => {
  it('selects the backend by name', () => {
    expect(createNoteStore(NOTES, 'redis')).toBeInstanceOf(RedisNoteStore);
    expect(createNoteStore(NOTES, 'dynamodb')).toBeInstanceOf(DynamoNoteStore);
    expect(createNoteStore(NOTES, 'memory')).toBeInstanceOf(MemoryNoteStore);
  });

  it('rejects an unknown backend', () => {
    expect(() => createNoteStore(NOTES, 'cassandra')).toThrow('Unsupported note store: cassandra');
  });
});
