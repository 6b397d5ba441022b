import { extractPathId, now, parseNotePayload } from '../codec/note';
import {
  configurationError,
  jsonResponse,
  rejectRequest,
  storeFailure,
  type NoteHandler,
} from './shared';

// PUT /notes/:id
export const handleUpdateNote: NoteHandler = async (request, deps) => {
  const misconfigured = configurationError(deps);
  if (misconfigured) return misconfigured;

  const id = extractPathId(request);
  if (!id.ok) return rejectRequest(deps, id.error);

  const payload = parseNotePayload(request.body);
  if (!payload.ok) return rejectRequest(deps, payload.error, 'Invalid request body');

  const result = await deps.store.updateIfPresent(id.value, {
    ...payload.value,
    updated_at: (deps.clock ?? now)(),
  });
  if (!result.ok) return storeFailure(deps, result.error, 'Failed to update note', id.value);

  deps.logger.info({ noteId: id.value }, 'Note updated');
  return jsonResponse(200, result.value);
};
