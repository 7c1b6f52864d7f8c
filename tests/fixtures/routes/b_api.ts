import type { Router } from '../../../framework/mod.ts';

export default async function apiRoutes(router: Router): Promise<void> {
  router.get('/api/ping', () => ({ pong: true }), { middleware: ['audit'] }).name('api.ping');
  router.get('/api/secret', () => ({ secret: true }), { middleware: ['custom-auth'] });
}
