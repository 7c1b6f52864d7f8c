/**
 * Application Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { fileURLToPath } from 'node:url';
import { Application, createApp } from '../../framework/app.ts';
import { Config } from '../../framework/config/config.ts';
import { Controller } from '../../framework/controller/base.ts';
import { loggingMiddleware } from '../../framework/middleware/logging.ts';
import { Logger, type LogEntry } from '../../framework/telemetry/logger.ts';

const appConfig = fileURLToPath(new URL('../fixtures/config/app.json', import.meta.url));

function quietApp(options: ConstructorParameters<typeof Application>[0] = {}): Application {
  return createApp({ logger: new Logger({ level: 'error', output: () => {} }), ...options });
}

function get(path: string, headers: Record<string, string> = {}): Request {
  return new Request(`http://localhost${path}`, { headers });
}

test('Application - handles a registered route', async () => {
  const app = quietApp().get('/api/hello', () => ({ hello: 'world' }));

  const response = await app.handle(get('/api/hello'));

  assert.equal(response.status, 200);
  assert.deepEqual(await response.json(), { hello: 'world' });
});

test('Application - unmatched API paths get a 404 envelope', async () => {
  const response = await quietApp().handle(get('/api/missing'));
  const body = await response.json();

  assert.equal(response.status, 404);
  assert.equal(body.status, 'Client Error');
  assert.equal(body.message, 'Endpoint not found');
});

test('Application - unmatched pages get an HTML 404', async () => {
  const response = await quietApp().handle(get('/missing'));

  assert.equal(response.status, 404);
  assert.equal(response.headers.get('Content-Type'), 'text/html; charset=utf-8');
});

test('Application - handler errors become a 500', async () => {
  const app = quietApp().get('/api/fail', () => {
    throw new Error('database unavailable');
  });

  const response = await app.handle(get('/api/fail'));
  const body = await response.json();

  assert.equal(response.status, 500);
  assert.equal(body.message, 'Internal server error');
});

test('Application - debug mode exposes the error message', async () => {
  const app = quietApp({ config: { debug: true } }).get('/api/fail', () => {
    throw new Error('database unavailable');
  });

  const body = await (await app.handle(get('/api/fail'))).json();

  assert.equal(body.message, 'database unavailable');
  assert.equal(body.data.error, 'Error');
});

test('Application - request id comes from the header or is generated', async () => {
  const app = quietApp().get('/api/id', (req) => ({ id: req.state.get('requestId') }));

  const given = await (await app.handle(get('/api/id', { 'X-Request-Id': 'req-42' }))).json();
  assert.equal(given.id, 'req-42');

  const generated = await (await app.handle(get('/api/id'))).json();
  assert.match(generated.id, /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
});

test('Application - connection address reaches the request', async () => {
  const app = quietApp().get('/api/ip', (req) => ({ ip: req.ip }));

  const body = await (await app.handle(get('/api/ip'), { remoteAddress: '10.0.0.8' })).json();
  assert.equal(body.ip, '10.0.0.8');
});

test('Application - global middleware wraps dispatch', async () => {
  const app = quietApp()
    .use(async (_req, _res, next) => {
      const response = await next();
      response.headers.set('X-Powered-By', 'bramble');
      return response;
    })
    .get('/api/hello', () => ({ ok: true }));

  const response = await app.handle(get('/api/hello'));
  assert.equal(response.headers.get('X-Powered-By'), 'bramble');
});

test('Application - named middleware halts dispatch', async () => {
  const app = quietApp()
    .middleware('maintenance', (_req, res) => res.status(503).json({ error: 'Down for maintenance' }))
    .get('/api/down', () => 'never', { middleware: ['maintenance'] });

  const response = await app.handle(get('/api/down'));

  assert.equal(response.status, 503);
  assert.deepEqual(await response.json(), { error: 'Down for maintenance' });
});

test('Application - global middleware sees rendered errors', async () => {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'info', output: (entry) => entries.push(entry) });
  const app = createApp({ logger })
    .use(loggingMiddleware(logger))
    .get('/api/fail', () => {
      throw new Error('database unavailable');
    });

  assert.equal((await app.handle(get('/api/missing'))).status, 404);
  assert.equal((await app.handle(get('/api/fail'))).status, 500);

  const responses = entries.filter((entry) => entry.message === 'Response');
  assert.deepEqual(
    responses.map((entry) => [entry.level, entry.context?.status]),
    [
      ['warn', 404],
      ['error', 500],
    ]
  );
});

test('Application - request logs carry the request id and matched route', async () => {
  const entries: LogEntry[] = [];
  const app = createApp({ logger: new Logger({ level: 'debug', output: (entry) => entries.push(entry) }) }).get(
    '/api/notes/{id:number}',
    () => null
  );

  await app.handle(get('/api/notes/3', { 'X-Request-Id': 'req-7' }));

  const matched = entries.find((entry) => entry.message === 'Route matched');
  assert.equal(matched?.request?.requestId, 'req-7');
  assert.equal(matched?.request?.route, '/api/notes/{id:number}');
  assert.equal(matched?.request?.path, '/api/notes/3');
});

class CounterService {
  private count = 0;

  next(): number {
    return ++this.count;
  }
}

class CounterController extends Controller {
  static inject = [CounterService];

  constructor(private counter: CounterService) {
    super();
  }

  hit(): Response {
    return this.success('Counted', { count: this.counter.next() });
  }
}

test('Application - controllers resolve services from the container', async () => {
  const app = quietApp()
    .singleton(CounterService)
    .controller(CounterController)
    .get('/api/count', 'CounterController@hit');

  await app.handle(get('/api/count'));
  const body = await (await app.handle(get('/api/count'))).json();

  assert.equal(body.message, 'Counted');
  assert.deepEqual(body.data, { count: 2 });
});

test('Application - framework services are in the container', () => {
  const app = quietApp();

  assert.equal(app.resolve(Application), app);
  assert.equal(app.resolve(Config), app.getConfig());
  assert.equal(app.resolve(Logger), app.getLogger());
});

test('Application - groups and URL generation', () => {
  const app = quietApp().group('/api/v2', (v2) => {
    v2.get('/users/{id:number}', () => null).name('v2.users.show');
  });

  assert.equal(app.url('v2.users.show', { id: 5 }), '/api/v2/users/5');
});

test('Application - init loads config and discovers routes', async () => {
  const app = quietApp({ configPath: appConfig });
  await app.init();

  assert.equal(app.isInitialized, true);
  assert.equal(app.getConfig().get('custom.flag'), true);
  assert.equal(app.url('pages.about'), '/pages/about');

  const about = await app.handle(get('/pages/about'));
  assert.equal(await about.text(), '<h1>About</h1>');

  const ping = await app.handle(get('/api/ping'));
  assert.equal(ping.headers.get('X-Audit'), '1');
  assert.deepEqual(await ping.json(), { pong: true });

  const blog = await app.handle(get('/blog'));
  assert.equal(blog.headers.get('X-Feature'), 'blog');
});

test('Application - discovered class middleware guards routes', async () => {
  const app = quietApp({ configPath: appConfig });
  await app.init();

  const denied = await app.handle(get('/api/secret'));
  assert.equal(denied.status, 401);

  const allowed = await app.handle(get('/api/secret', { Authorization: 'Bearer test-token' }));
  assert.equal(allowed.status, 200);
  assert.deepEqual(await allowed.json(), { secret: true });
});

test('Application - init runs once and options win over the file', async () => {
  const app = quietApp({ configPath: appConfig, config: { debug: true, logLevel: 'warn' } });
  await app.init();
  await app.init();

  assert.equal(app.getConfig().get('debug'), true);
  assert.equal(app.getLogger().getLevel(), 'warn');
  assert.equal(app.getRouter().getRoutes().length, 4);
  assert.equal(app.resolve(Config), app.getConfig());
});

test('Application - config options merge into file sections', async () => {
  const app = quietApp({ configPath: appConfig, config: { routing: { routes: [] } } });
  await app.init();

  assert.deepEqual(app.getConfig().get('routing.routes'), []);
  assert.deepEqual(app.getConfig().get('routing.middleware'), ['tests/fixtures/middleware']);
  assert.equal(app.getConfig().get('routing.features'), 'tests/fixtures/features');
  assert.equal(app.getRouter().hasRoute('pages.about'), false);
});

test('Application - shutdown runs hooks in reverse order', async () => {
  const app = quietApp();
  const calls: string[] = [];
  app.getLifecycle().onShutdown(() => {
    calls.push('first');
  });
  app.getLifecycle().onShutdown(async () => {
    calls.push('second');
  });

  await app.shutdown('test');
  await app.shutdown('again');

  assert.deepEqual(calls, ['second', 'first']);
  assert.equal(app.getLifecycle().shuttingDown, true);
  assert.equal(app.getLifecycle().signal.aborted, true);
});
