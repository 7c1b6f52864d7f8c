/**
 * Application Entry Point
 *
 * Boot sequence: environment, application, services, discovery, server.
 */

import { createApp, Environment, getLogger, loggingMiddleware } from './framework/mod.ts';
import { registerNotes } from './src/notes/mod.ts';

async function main(): Promise<void> {
  // 1. Seed process.env from .env
  Environment.loadDotenv();

  // 2. Create application instance
  const app = createApp();

  // 3. Global middleware and services
  app.use(loggingMiddleware(app.getLogger()));
  registerNotes(app);

  // 4. Load config/app.json and discover routes and middleware
  await app.init();

  // 5. Start server
  await app.listen();
}

main().catch((error: unknown) => {
  getLogger().error('Failed to start', error);
  process.exit(1);
});
