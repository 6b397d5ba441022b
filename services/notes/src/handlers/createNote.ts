import { newId, now, parseNotePayload } from '../codec/note';
import type { NoteRecord } from '../types';
import {
  configurationError,
  jsonResponse,
  rejectRequest,
  storeFailure,
  type NoteHandler,
} from './shared';

/**
 * POST /notes. Generates the id and timestamps server-side and inserts with a
 * put-if-absent condition. An id collision surfaces as a plain 500.
 */
export const handleCreateNote: NoteHandler = async (request, deps) => {
  const misconfigured = configurationError(deps);
  if (misconfigured) return misconfigured;

  const payload = parseNotePayload(request.body);
  if (!payload.ok) return rejectRequest(deps, payload.error, 'Invalid request body');

  const { title, note } = payload.value;
  const timestamp = (deps.clock ?? now)();
  const record: NoteRecord = {
    owner: deps.config.owner,
    id: (deps.newId ?? newId)(),
    title,
    note,
    created_at: timestamp,
    updated_at: timestamp,
  };

  const result = await deps.store.putIfAbsent(record);
  if (!result.ok) return storeFailure(deps, result.error, 'Failed to create note', record.id);

  deps.logger.info({ noteId: record.id }, 'Note created');
  return jsonResponse(201, { id: record.id, title, note });
};
