/**
 * API Routes
 */

import type { Router } from '../../framework/mod.ts';
import { NotesController } from '../notes/mod.ts';

export default function apiRoutes(router: Router): void {
  router.get('/api/health', () => ({ status: 'healthy', uptime: Math.round(process.uptime()) })).name('health');

  router.group('/api/notes', (notes) => {
    notes.get('', [NotesController, 'index']).name('notes.index');
    notes.get('/{id:number}', [NotesController, 'show']).name('notes.show');
    notes.group('', (writes) => {
      writes.post('', [NotesController, 'store']).name('notes.store');
      writes.delete('/{id:number}', [NotesController, 'destroy']).name('notes.destroy');
    }, { middleware: ['token'] });
  });
}
