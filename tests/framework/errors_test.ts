/**
 * Error Rendering Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { fileURLToPath } from 'node:url';
import { renderError } from '../../framework/http/error_pages.ts';
import { HttpError, NotFoundError, ValidationError } from '../../framework/http/errors.ts';
import { BrambleRequest } from '../../framework/http/request.ts';
import { escapeHtml, escapeRegex } from '../../framework/security/sanitize.ts';
import { Logger, type LogEntry } from '../../framework/telemetry/logger.ts';

const pagesPath = fileURLToPath(new URL('../fixtures/pages/', import.meta.url));

function request(path: string): BrambleRequest {
  return new BrambleRequest(new Request(`http://localhost${path}`));
}

function capture(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { logger: new Logger({ level: 'debug', output: (entry) => entries.push(entry) }), entries };
}

test('renderError - HTTP errors become envelopes for API requests', async () => {
  const response = await renderError(new NotFoundError('Note not found'), request('/api/notes/9'));
  const body = await response.json();

  assert.equal(response.status, 404);
  assert.equal(body.status, 'Client Error');
  assert.equal(body.message, 'Note not found');
  assert.equal('data' in body, false);
});

test('renderError - JSON content type also gets an envelope', async () => {
  const req = new BrambleRequest(
    new Request('http://localhost/notes', { method: 'POST', headers: { 'Content-Type': 'application/json' } })
  );
  const response = await renderError(new HttpError(409, 'Conflict'), req);

  assert.equal(response.status, 409);
  assert.equal((await response.json()).message, 'Conflict');
});

test('renderError - validation errors carry field messages', async () => {
  const response = await renderError(
    new ValidationError({ title: ['title is required'] }),
    request('/api/notes')
  );
  const body = await response.json();

  assert.equal(response.status, 422);
  assert.equal(body.message, 'Validation failed');
  assert.deepEqual(body.data, { errors: { title: ['title is required'] } });
});

test('renderError - built-in HTML pages', async () => {
  const missing = await renderError(new NotFoundError(), request('/nowhere'));
  assert.equal(missing.status, 404);
  assert.equal(missing.headers.get('Content-Type'), 'text/html; charset=utf-8');
  assert.ok((await missing.text()).includes('<h1>404 - Page Not Found</h1>'));

  const denied = await renderError(new HttpError(403, 'No <access>'), request('/admin'));
  assert.equal(denied.status, 403);
  assert.ok((await denied.text()).includes('<p>No &lt;access&gt;</p>'));
});

test('renderError - custom pages from the pages directory', async () => {
  const custom = await renderError(new NotFoundError(), request('/nowhere'), { pagesPath });
  assert.equal(await custom.text(), '<h1>Custom missing page</h1>\n');

  const fallback = await renderError(new HttpError(500, 'Broken'), request('/page'), { pagesPath });
  assert.ok((await fallback.text()).includes('<h1>500 - Internal Server Error</h1>'));
});

test('renderError - unexpected errors are logged and hidden', async () => {
  const { logger, entries } = capture();
  const response = await renderError(new Error('boom'), request('/api/x'), { logger });
  const body = await response.json();

  assert.equal(response.status, 500);
  assert.equal(body.status, 'Server Error');
  assert.equal(body.message, 'Internal server error');
  assert.equal(entries.length, 1);
  assert.equal(entries[0].level, 'error');
  assert.equal(entries[0].message, 'Router Error: boom');
  assert.equal(entries[0].error?.message, 'boom');
  assert.equal(entries[0].context?.path, '/api/x');
});

test('renderError - non-Error values are wrapped', async () => {
  const { logger, entries } = capture();
  const response = await renderError('plain failure', request('/page'), { logger });

  assert.equal(response.status, 500);
  assert.equal(entries[0].message, 'Router Error: plain failure');
});

test('renderError - debug mode shows details', async () => {
  const { logger } = capture();

  const json = await renderError(new TypeError('bad type'), request('/api/x'), { debug: true, logger });
  const body = await json.json();
  assert.equal(json.status, 500);
  assert.equal(body.message, 'bad type');
  assert.equal(body.data.error, 'TypeError');
  assert.ok(Array.isArray(body.data.trace));

  const html = await renderError(new Error('a & b'), request('/page'), { debug: true, logger });
  assert.ok((await html.text()).includes('<p><strong>Message:</strong> a &amp; b</p>'));
});

test('escapeHtml - escapes markup characters', () => {
  assert.equal(escapeHtml('<a href="/x">\'hi\'</a>'), '&lt;a href&#x3D;&quot;&#x2F;x&quot;&gt;&#x27;hi&#x27;&lt;&#x2F;a&gt;');
});

test('escapeRegex - escapes pattern metacharacters', () => {
  assert.equal(escapeRegex('/a.b(c)'), '\\/a\\.b\\(c\\)');
});
