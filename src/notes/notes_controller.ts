/**
 * Notes API
 */

import { Controller, NotFoundError, type RequestData } from '../../framework/mod.ts';
import { NOTE_REPOSITORY, type Note, type NoteRepository } from './note_repository.ts';

export class NotesController extends Controller {
  static inject = [NOTE_REPOSITORY];

  constructor(private notes: NoteRepository) {
    super();
  }

  index(): Response {
    return this.success('Notes retrieved', { notes: this.notes.all() });
  }

  show(params: RequestData): Response {
    return this.success('Note retrieved', { note: this.findOrFail(params.id) });
  }

  store(): Response {
    const data = this.validate({
      title: { type: 'string', required: true, max: 120 },
      body: { type: 'string', required: true },
    });

    const note = this.notes.create(String(data.title), String(data.body));
    return this.created({ note }, 'Note created');
  }

  destroy(params: RequestData): Response {
    const note = this.findOrFail(params.id);
    this.notes.delete(note.id);
    return this.success('Note deleted');
  }

  private findOrFail(id: unknown): Note {
    const note = this.notes.find(Number(id));
    if (!note) {
      throw new NotFoundError('Note not found');
    }
    return note;
  }
}
