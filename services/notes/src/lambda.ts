import pino from 'pino';
import { config } from './config';
import type { NoteStore } from './contracts/noteStore';
import type { NoteRequest } from './codec/note';
import {
  handleCreateNote,
  handleDeleteNote,
  handleListNotes,
  handleUpdateNote,
  type NoteHandler,
  type NoteResponse,
} from './handlers';
import { jsonResponse } from './handlers/shared';
import { createNoteStore } from './storage';

/** The subset of an API Gateway proxy event the handlers read. */
export interface ApiGatewayEvent {
  body?: string | null;
  isBase64Encoded?: boolean;
  pathParameters?: Record<string, string | undefined> | null;
}

const logger = pino({ level: config.logLevel });

// Reused across warm invocations; holds a client, never request state.
let store: NoteStore | null = null;

function getStore(): NoteStore {
  if (!store) store = createNoteStore(config.notes);
  return store;
}

// Builds the real store on first use, which comes after the handler's configuration check.
const lazyStore: NoteStore = {
  backend: config.store.backend,
  putIfAbsent: (record) => getStore().putIfAbsent(record),
  updateIfPresent: (id, fields) => getStore().updateIfPresent(id, fields),
  deleteIfPresent: (id) => getStore().deleteIfPresent(id),
  listByOwner: () => getStore().listByOwner(),
};

function toRequest(event: ApiGatewayEvent): NoteRequest {
  const body =
    event.isBase64Encoded && typeof event.body === 'string'
      ? Buffer.from(event.body, 'base64').toString('utf8')
      : event.body;
  return { body, pathParameters: event.pathParameters };
}

function entryPoint(handler: NoteHandler) {
  return async (event: ApiGatewayEvent): Promise<NoteResponse> => {
    try {
      return await handler(toRequest(event), {
        config: config.notes,
        store: lazyStore,
        logger,
      });
    } catch (err) {
      logger.error({ err }, 'Unhandled handler error');
      return jsonResponse(500, { error: 'Internal Server Error' });
    }
  };
}

export const create = entryPoint(handleCreateNote);
export const list = entryPoint(handleListNotes);
export const update = entryPoint(handleUpdateNote);
export const remove = entryPoint(handleDeleteNote);
