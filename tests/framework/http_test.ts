/**
 * HTTP Tests
 *
 * Tests for BrambleRequest and BrambleResponse classes.
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { fileURLToPath } from 'node:url';
import { BrambleRequest } from '../../framework/http/request.ts';
import { BrambleResponse, formatTimestamp, statusName } from '../../framework/http/response.ts';
import { Logger, type LogEntry } from '../../framework/telemetry/logger.ts';

const report = fileURLToPath(new URL('../fixtures/files/report.txt', import.meta.url));

function captureLogger(entries: LogEntry[]): Logger {
  return new Logger({ level: 'debug', output: (entry) => entries.push(entry) });
}

function post(path: string, body: BodyInit, headers: Record<string, string> = {}): BrambleRequest {
  return new BrambleRequest(new Request(`http://localhost${path}`, { method: 'POST', body, headers }));
}

// BrambleRequest tests

test('BrambleRequest - parses method, path and query', () => {
  const req = new BrambleRequest(new Request('http://localhost/api/users?page=1', { method: 'PUT' }));
  assert.equal(req.method, 'PUT');
  assert.equal(req.path, '/api/users');
  assert.equal(req.url, 'http://localhost/api/users?page=1');
  assert.equal(req.query.get('page'), '1');
});

test('BrambleRequest - ip prefers the first forwarded address', () => {
  const req = new BrambleRequest(
    new Request('http://localhost/', {
      headers: { 'X-Forwarded-For': '203.0.113.5, 10.0.0.1', 'X-Real-IP': '198.51.100.2' },
    })
  );
  assert.equal(req.ip, '203.0.113.5');
});

test('BrambleRequest - ip falls back to X-Real-IP, socket, then loopback', () => {
  const realIp = new BrambleRequest(new Request('http://localhost/', { headers: { 'X-Real-IP': '198.51.100.2' } }));
  assert.equal(realIp.ip, '198.51.100.2');

  const socket = new BrambleRequest(new Request('http://localhost/'), { connection: { remoteAddress: '10.1.1.1' } });
  assert.equal(socket.ip, '10.1.1.1');

  const none = new BrambleRequest(new Request('http://localhost/'));
  assert.equal(none.ip, '127.0.0.1');
});

test('BrambleRequest - GET data comes from the query string', async () => {
  const req = new BrambleRequest(new Request('http://localhost/search?q=node&page=2'));
  await req.parse();
  assert.deepEqual(req.all(), { q: 'node', page: '2' });
  assert.equal(req.parsed, true);
});

test('BrambleRequest - POST ignores the query string', async () => {
  const req = post('/items?q=ignored', JSON.stringify({ name: 'Ada' }), { 'Content-Type': 'application/json' });
  await req.parse();
  assert.deepEqual(req.all(), { name: 'Ada' });
});

test('BrambleRequest - decodes JSON bodies', async () => {
  const req = post('/items', JSON.stringify({ name: 'Ada', tags: ['a', 'b'] }), {
    'Content-Type': 'application/json; charset=utf-8',
  });
  await req.parse();
  assert.equal(req.input('name'), 'Ada');
  assert.deepEqual(req.input('tags'), ['a', 'b']);
  assert.equal(req.input('missing', 'fallback'), 'fallback');
  assert.equal(req.isJson, true);
});

test('BrambleRequest - JSON arrays become index-keyed data', async () => {
  const req = post('/items', '["a","b"]', { 'Content-Type': 'application/json' });
  await req.parse();
  assert.deepEqual(req.all(), { '0': 'a', '1': 'b' });
});

test('BrambleRequest - malformed JSON yields empty data and a warning', async () => {
  const entries: LogEntry[] = [];
  const req = post('/items', '{"name": ', { 'Content-Type': 'application/json' });
  await req.parse(captureLogger(entries));

  assert.deepEqual(req.all(), {});
  assert.equal(entries.length, 1);
  assert.equal(entries[0].level, 'warn');
  assert.equal(entries[0].message, 'Malformed JSON request body');
});

test('BrambleRequest - JSON scalars yield empty data', async () => {
  const entries: LogEntry[] = [];
  const req = post('/items', '42', { 'Content-Type': 'application/json' });
  await req.parse(captureLogger(entries));

  assert.deepEqual(req.all(), {});
  assert.equal(entries[0].message, 'JSON request body is not an object or array');
});

test('BrambleRequest - decodes url-encoded forms', async () => {
  const req = post('/login', 'email=ada%40example.com&remember=on', {
    'Content-Type': 'application/x-www-form-urlencoded',
  });
  await req.parse();
  assert.deepEqual(req.all(), { email: 'ada@example.com', remember: 'on' });
});

test('BrambleRequest - multipart fields become data, parts become files', async () => {
  const form = new FormData();
  form.append('title', 'Report');
  form.append('attachment', new Blob(['hello'], { type: 'text/plain' }), 'report.txt');

  const req = post('/upload', form);
  await req.parse();

  assert.deepEqual(req.all(), { title: 'Report' });
  assert.equal(req.hasFile('attachment'), true);
  assert.equal(req.file('attachment')?.name, 'report.txt');
  assert.equal(req.file('missing'), null);
});

test('BrambleRequest - unknown content types are sniffed', async () => {
  const json = post('/sniff', '{"a":1}');
  await json.parse();
  assert.deepEqual(json.all(), { a: 1 });

  const form = post('/sniff', 'x=1&y=2');
  await form.parse();
  assert.deepEqual(form.all(), { x: '1', y: '2' });
});

test('BrambleRequest - parse runs once', async () => {
  const req = post('/items', '{"a":1}', { 'Content-Type': 'application/json' });
  await req.parse();
  await req.parse();
  assert.deepEqual(req.all(), { a: 1 });
  assert.equal(await req.text(), '{"a":1}');
});

test('BrambleRequest - only, except, has', async () => {
  const req = post('/items', JSON.stringify({ a: 1, b: null, c: 'x' }), { 'Content-Type': 'application/json' });
  await req.parse();

  assert.equal(req.has('a'), true);
  assert.equal(req.has('b'), false);
  assert.equal(req.hasAll(['a', 'c']), true);
  assert.equal(req.hasAny(['b', 'z']), false);
  assert.deepEqual(req.only(['a', 'b', 'z']), { a: 1 });
  assert.deepEqual(req.except(['a']), { b: null, c: 'x' });
});

test('BrambleRequest - api paths expect JSON', () => {
  const api = new BrambleRequest(new Request('http://localhost/api/users'));
  assert.equal(api.isApi, true);
  assert.equal(api.expectsJson, true);

  const page = new BrambleRequest(new Request('http://localhost/apiary'));
  assert.equal(page.isApi, false);
  assert.equal(page.expectsJson, false);
});

test('BrambleRequest - bearer token and cookies', () => {
  const req = new BrambleRequest(
    new Request('http://localhost/', {
      headers: { Authorization: 'Bearer test-token', Cookie: 'session=abc; theme=dark' },
    })
  );
  assert.equal(req.bearerToken(), 'test-token');
  assert.equal(req.cookie('session'), 'abc');
  assert.equal(req.cookie('theme'), 'dark');
});

test('BrambleRequest - setParams exposes route params', () => {
  const req = new BrambleRequest(new Request('http://localhost/users/7'));
  req.setParams({ id: '7' });
  assert.deepEqual(req.params, { id: '7' });
});

// BrambleResponse tests

test('BrambleResponse - json sets status and body', async () => {
  const response = new BrambleResponse().status(202).json({ ok: true });
  assert.equal(response.status, 202);
  assert.equal(response.headers.get('Content-Type'), 'application/json; charset=utf-8');
  assert.deepEqual(await response.json(), { ok: true });
});

test('BrambleResponse - envelope lifts message and pretty-prints', async () => {
  const response = new BrambleResponse().envelope({ message: 'Saved', id: 3 });
  const text = await response.text();

  assert.equal(response.status, 200);
  assert.ok(text.startsWith('{\n    "status": "Success",\n    "message": "Saved",\n'));

  const body = JSON.parse(text);
  assert.deepEqual(body.data, { id: 3 });
  assert.match(body.timestamp, /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  assert.equal(typeof body.server_time, 'number');
});

test('BrambleResponse - envelope prefers an explicit data field', async () => {
  const response = new BrambleResponse().envelope({ message: 'm', data: { id: 1 }, extra: 2 });
  const body = await response.json();
  assert.deepEqual(body.data, { id: 1 });
});

test('BrambleResponse - envelope omits data when there is none', async () => {
  const body = await new BrambleResponse().accepted().json();
  assert.equal(body.status, 'Success');
  assert.equal(body.message, 'Request accepted');
  assert.equal('data' in body, false);
});

test('BrambleResponse - envelope carries security headers', () => {
  const response = new BrambleResponse().success('ok');
  assert.equal(response.headers.get('X-Content-Type-Options'), 'nosniff');
  assert.equal(response.headers.get('X-Frame-Options'), 'DENY');
  assert.equal(response.headers.get('X-XSS-Protection'), '1; mode=block');
});

test('BrambleResponse - error includes only non-empty errors', async () => {
  const plain = await new BrambleResponse().error('Bad input', 400, {}).json();
  assert.equal(plain.status, 'Client Error');
  assert.equal(plain.message, 'Bad input');
  assert.equal('data' in plain, false);

  const detailed = await new BrambleResponse().error('Bad input', 400, { name: ['name is required'] }).json();
  assert.deepEqual(detailed.data, { errors: { name: ['name is required'] } });
});

test('BrambleResponse - validationError and created', async () => {
  const invalid = new BrambleResponse().validationError({ email: ['email is required'] });
  assert.equal(invalid.status, 422);
  const invalidBody = await invalid.json();
  assert.equal(invalidBody.message, 'Validation failed');
  assert.deepEqual(invalidBody.data, { errors: { email: ['email is required'] } });

  const created = new BrambleResponse().created({ id: 9 });
  assert.equal(created.status, 201);
  const createdBody = await created.json();
  assert.equal(createdBody.message, 'Resource created successfully');
  assert.deepEqual(createdBody.data, { id: 9 });
});

test('BrambleResponse - helpers send error objects', async () => {
  const response = new BrambleResponse().forbidden();
  assert.equal(response.status, 403);
  assert.deepEqual(await response.json(), { error: 'Forbidden' });
});

test('BrambleResponse - redirect and cookies', () => {
  const response = new BrambleResponse()
    .cookie('session', 'abc', { path: '/', httpOnly: true })
    .redirect('/login');

  assert.equal(response.status, 302);
  assert.equal(response.headers.get('Location'), '/login');
  assert.equal(response.headers.get('Set-Cookie'), 'session=abc; Path=/; HttpOnly');
});

test('BrambleResponse - builder state accessors', () => {
  const res = new BrambleResponse();
  assert.equal(res.statusCode, 200);
  assert.equal(res.hasBody, false);
  assert.equal(res.location, null);

  res.status(404).html('<p>gone</p>');
  assert.equal(res.statusCode, 404);
  assert.equal(res.hasBody, true);
});

test('statusName - maps status classes', () => {
  assert.equal(statusName(101), 'Informational');
  assert.equal(statusName(204), 'Success');
  assert.equal(statusName(302), 'Redirect');
  assert.equal(statusName(422), 'Client Error');
  assert.equal(statusName(503), 'Server Error');
  assert.equal(statusName(99), 'Unknown');
});

test('formatTimestamp - pads every field', () => {
  assert.equal(formatTimestamp(new Date(2024, 0, 5, 9, 3, 7)), '2024-01-05 09:03:07');
});

test('BrambleResponse - download sends an attachment', async () => {
  const response = await new BrambleResponse().download(report, 'q3.txt', { 'X-Report': 'q3' });

  assert.equal(response.status, 200);
  assert.equal(response.headers.get('Content-Type'), 'text/plain');
  assert.equal(response.headers.get('Content-Disposition'), 'attachment; filename="q3.txt"');
  assert.equal(response.headers.get('Content-Length'), '18');
  assert.equal(response.headers.get('Cache-Control'), 'no-cache, must-revalidate');
  assert.equal(response.headers.get('X-Report'), 'q3');
  assert.equal(await response.text(), 'quarterly numbers\n');
});

test('BrambleResponse - file is sent inline under its own name', async () => {
  const response = await new BrambleResponse().file(report);

  assert.equal(response.headers.get('Content-Disposition'), 'inline; filename="report.txt"');
  assert.equal(response.headers.get('Cache-Control'), null);
  assert.equal(await response.text(), 'quarterly numbers\n');
});

test('BrambleResponse - missing files get a 404 envelope', async () => {
  const missing = await new BrambleResponse().download(report.replace('report.txt', 'nope.txt'));
  assert.equal(missing.status, 404);
  assert.equal((await missing.json()).message, 'File not found');

  const directory = await new BrambleResponse().file(fileURLToPath(new URL('../fixtures/files', import.meta.url)));
  assert.equal(directory.status, 404);
});
