import { extractPathId } from '../codec/note';
import {
  configurationError,
  jsonResponse,
  rejectRequest,
  storeFailure,
  type NoteHandler,
} from './shared';

// DELETE /notes/:id
export const handleDeleteNote: NoteHandler = async (request, deps) => {
  const misconfigured = configurationError(deps);
  if (misconfigured) return misconfigured;

  const id = extractPathId(request);
  if (!id.ok) return rejectRequest(deps, id.error);

  const result = await deps.store.deleteIfPresent(id.value);
  if (!result.ok) return storeFailure(deps, result.error, 'Failed to delete note', id.value);

  deps.logger.info({ noteId: id.value }, 'Note deleted');
  return jsonResponse(200, { message: 'Note deleted' });
};
