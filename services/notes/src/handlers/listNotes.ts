import { configurationError, jsonResponse, storeFailure, type NoteHandler } from './shared';

/** GET /notes. Every note in the owner's partition, in whatever order the store returns. */
export const handleListNotes: NoteHandler = async (_request, deps) => {
  const misconfigured = configurationError(deps);
  if (misconfigured) return misconfigured;

  const result = await deps.store.listByOwner();
  if (!result.ok) return storeFailure(deps, result.error, 'Failed to list notes');

  return jsonResponse(200, { items: result.value });
};
