import type { FastifyBaseLogger } from 'fastify';
import type { NotesConfig } from '../config';
import type { NoteStore, StoreError } from '../contracts/noteStore';
import type { CodecError, NoteRequest } from '../codec/note';
import type { NoteId } from '../types';

export const CONFIG_ERROR_MESSAGE = 'NOTES_TABLE_NAME environment variable is required';
export const NOT_FOUND_MESSAGE = 'Note not found';

export type HandlerLogger = Pick<FastifyBaseLogger, 'info' | 'warn' | 'error'>;

export interface NoteResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

/** Everything a handler needs, passed in per call instead of read from ambient state. */
export interface HandlerDeps {
  config: NotesConfig;
  store: NoteStore;
  logger: HandlerLogger;
  clock?: () => string;
  newId?: () => NoteId;
}

export type NoteHandler = (request: NoteRequest, deps: HandlerDeps) => Promise<NoteResponse>;

export function jsonResponse(statusCode: number, body: unknown): NoteResponse {
  return {
    statusCode,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

export const errorResponse = (statusCode: number, message: string) =>
  jsonResponse(statusCode, { error: message });

/** 500 when no store target is configured; null when the handler may proceed. */
export function configurationError(deps: HandlerDeps): NoteResponse | null {
  if (deps.config.tableName.trim()) return null;
  deps.logger.error(CONFIG_ERROR_MESSAGE);
  return errorResponse(500, CONFIG_ERROR_MESSAGE);
}

export function rejectRequest(deps: HandlerDeps, error: CodecError, prefix?: string): NoteResponse {
  const message = prefix ? `${prefix}: ${error.message}` : error.message;
  deps.logger.warn({ kind: error.kind }, message);
  return errorResponse(400, message);
}

/** Maps a store failure to 404 (NotFound) or a generic 500 that leaks nothing. */
export function storeFailure(
  deps: HandlerDeps,
  error: StoreError,
  failureMessage: string,
  noteId?: NoteId,
): NoteResponse {
  if (error.kind === 'NotFound') {
    deps.logger.warn({ noteId }, NOT_FOUND_MESSAGE);
    return errorResponse(404, NOT_FOUND_MESSAGE);
  }
  const err = error.kind === 'StoreUnavailable' ? error.cause : undefined;
  deps.logger.error({ err, kind: error.kind, noteId }, failureMessage);
  return errorResponse(500, failureMessage);
}
