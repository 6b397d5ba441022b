import Fastify, { type FastifyServerOptions } from 'fastify';
import { config, type NotesConfig } from './config';
import type { NoteStore } from './contracts/noteStore';
import { registerNoteRoutes } from './routes/notes';
import { createNoteStore } from './storage';
import type { NoteId } from './types';

export interface BuildAppOptions {
  notes?: NotesConfig;
  store?: NoteStore;
  logger?: FastifyServerOptions['logger'];
  clock?: () => string;
  newId?: () => NoteId;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const notes = options.notes ?? config.notes;
  const store = options.store ?? createNoteStore(notes);
  const app = Fastify({ logger: options.logger ?? false });

  app.setErrorHandler((err, req, reply) => {
    req.log.error({ err }, 'Unhandled route error');
    reply.code(500).send({ error: 'Internal Server Error' });
  });

  app.get('/health', async () => ({ status: 'ok', store: store.backend }));

  await registerNoteRoutes(app, {
    notes,
    store,
    clock: options.clock,
    newId: options.newId,
  });
  return app;
}
