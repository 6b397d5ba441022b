import type { FastifyInstance, FastifyReply } from 'fastify';
import type { NotesConfig } from '../config';
import type { NoteStore } from '../contracts/noteStore';
import type { NoteRequest } from '../codec/note';
import {
  handleCreateNote,
  handleDeleteNote,
  handleListNotes,
  handleUpdateNote,
  type HandlerDeps,
  type NoteHandler,
  type NoteResponse,
} from '../handlers';
import type { NoteId } from '../types';

export interface NoteRouteOptions {
  notes: NotesConfig;
  store: NoteStore;
  clock?: () => string;
  newId?: () => NoteId;
}

type IdParams = { Params: { id: string } };

// ---------- Helper ----------
function sendResponse(reply: FastifyReply, res: NoteResponse) {
  return reply.code(res.statusCode).headers(res.headers).send(res.body);
}

const rawBody = (body: unknown): string | null => (typeof body === 'string' ? body : null);

// ---------- Routes ----------
export async function registerNoteRoutes(app: FastifyInstance, options: NoteRouteOptions) {
  // Handlers parse bodies themselves so malformed JSON gets their 400, not Fastify's.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_req, body, done) => {
    done(null, body);
  });

  const run = (handler: NoteHandler, request: NoteRequest, log: HandlerDeps['logger']) =>
    handler(request, {
      config: options.notes,
      store: options.store,
      logger: log,
      clock: options.clock,
      newId: options.newId,
    });

  // Create
  app.post('/notes', async (req, reply) => {
    const res = await run(handleCreateNote, { body: rawBody(req.body) }, req.log);
    return sendResponse(reply, res);
  });

  // List
  app.get('/notes', async (req, reply) => {
    const res = await run(handleListNotes, {}, req.log);
    return sendResponse(reply, res);
  });

  // Update
  app.put<IdParams>('/notes/:id', async (req, reply) => {
    const res = await run(
      handleUpdateNote,
      { body: rawBody(req.body), pathParameters: { id: req.params.id } },
      req.log,
    );
    return sendResponse(reply, res);
  });

  // Delete
  app.delete<IdParams>('/notes/:id', async (req, reply) => {
    const res = await run(handleDeleteNote, { pathParameters: { id: req.params.id } }, req.log);
    return sendResponse(reply, res);
  });
}
