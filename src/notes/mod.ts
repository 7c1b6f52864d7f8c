import type { Application } from '../../framework/mod.ts';
import { InMemoryNoteRepository, NOTE_REPOSITORY } from './note_repository.ts';
import { NotesController } from './notes_controller.ts';

export { NotesController } from './notes_controller.ts';
export { InMemoryNoteRepository, NOTE_REPOSITORY, type Note, type NoteRepository } from './note_repository.ts';

/**
 * Bind the notes services on an application
 */
export function registerNotes(app: Application): void {
  app.singleton(NOTE_REPOSITORY, InMemoryNoteRepository).controller(NotesController);
}
