export { handleCreateNote } from './createNote';
export { handleListNotes } from './listNotes';
export { handleUpdateNote } from './updateNote';
export { handleDeleteNote } from './deleteNote';
export type { HandlerDeps, HandlerLogger, NoteHandler, NoteResponse } from './shared';
