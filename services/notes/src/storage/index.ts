// src/storage/index.ts
import { config, type NotesConfig } from '../config';
import type { NoteStore } from '../contracts/noteStore';
import { DynamoNoteStore } from './dynamoNoteStore';
import { MemoryNoteStore } from './memoryNoteStore';
import { RedisNoteStore } from './redisNoteStore';

export function createNoteStore(notes: NotesConfig, backend: string = config.store.backend): NoteStore {
  switch (backend) {
    case 'redis':
      return new RedisNoteStore(notes.tableName, notes.owner);
    case 'dynamodb':
      return new DynamoNoteStore(notes.tableName, notes.owner);
    case 'memory':
      return new MemoryNoteStore(notes.owner);
    default:
      throw new Error(`Unsupported note store: ${backend}`);
  }
}
