/**
 * Note storage
 */

import { InjectionToken } from '../../framework/mod.ts';

export interface Note {
  id: number;
  title: string;
  body: string;
  createdAt: string;
}

export interface NoteRepository {
  all(): Note[];
  find(id: number): Note | undefined;
  create(title: string, body: string): Note;
  delete(id: number): boolean;
}

export const NOTE_REPOSITORY = new InjectionToken<NoteRepository>('NoteRepository');

/**
 * Process-local store, lost on restart
 */
export class InMemoryNoteRepository implements NoteRepository {
  private notes = new Map<number, Note>();
  private nextId = 1;

  all(): Note[] {
    return [...this.notes.values()];
  }

  find(id: number): Note | undefined {
    return this.notes.get(id);
  }

  create(title: string, body: string): Note {
    const note: Note = { id: this.nextId++, title, body, createdAt: new Date().toISOString() };
    this.notes.set(note.id, note);
    return note;
  }

  delete(id: number): boolean {
    return this.notes.delete(id);
  }
}
