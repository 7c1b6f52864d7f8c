/**
 * Controller Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { fileURLToPath } from 'node:url';
import { Controller, validateData } from '../../framework/controller/base.ts';
import { HttpError, ValidationError } from '../../framework/http/errors.ts';
import { BrambleRequest } from '../../framework/http/request.ts';
import { BrambleResponse } from '../../framework/http/response.ts';
import { Router } from '../../framework/router/router.ts';
import { Logger } from '../../framework/telemetry/logger.ts';

class ProfileController extends Controller {
  show(): Response {
    return this.json({ message: 'Profile', id: this.requireParam('id') });
  }

  back(): Response {
    return this.redirectBack('/profiles');
  }

  toProfile(): Response {
    return this.redirectToRoute('profiles.show', { id: 3 });
  }

  missing(): Response {
    return this.notFound();
  }

  locked(): Response {
    return this.forbidden('Profile is locked');
  }

  exportProfile(): Promise<Response> {
    return this.download(fileURLToPath(new URL('../fixtures/files/report.txt', import.meta.url)), 'profile.txt');
  }

  save(): Response {
    const data = this.validate({
      name: { type: 'string', required: true, max: 10 },
      age: { type: 'number', min: 18 },
    });
    return this.created(data);
  }
}

const quiet = new Logger({ level: 'error', output: () => {} });

async function controllerFor(request: Request, params: Record<string, string> = {}): Promise<ProfileController> {
  const router = new Router({ logger: quiet });
  router.get('/profiles/{id}', () => null).name('profiles.show');

  const req = new BrambleRequest(request);
  await req.parse();
  req.setParams(params);
  return new ProfileController().setContext(req, new BrambleResponse(), router);
}

test('Controller - exposes request input and params', async () => {
  const controller = await controllerFor(new Request('http://localhost/profiles/7?tab=posts'), { id: '7' });

  assert.deepEqual(controller.params, { id: '7' });
  assert.equal(controller.queryParam('tab'), 'posts');
  assert.equal(controller.queryParam('sort', 'new'), 'new');
  assert.equal(controller.input('tab'), 'posts');
  assert.equal(controller.has('tab'), true);
  assert.equal(controller.method(), 'GET');
  assert.equal(controller.context.params.id, '7');
});

test('Controller - json sends an envelope', async () => {
  const controller = await controllerFor(new Request('http://localhost/profiles/7'), { id: '7' });
  const body = await controller.show().json();

  assert.equal(body.status, 'Success');
  assert.equal(body.message, 'Profile');
  assert.deepEqual(body.data, { id: '7' });
});

test('Controller - requireParam throws a 400', async () => {
  const controller = await controllerFor(new Request('http://localhost/profiles'));

  assert.throws(() => controller.show(), (error: unknown) => {
    return error instanceof HttpError && error.status === 400 && error.message === "Required parameter 'id' is missing";
  });
});

test('Controller - redirectBack uses the Referer header', async () => {
  const withReferer = await controllerFor(
    new Request('http://localhost/x', { headers: { Referer: 'http://localhost/previous' } })
  );
  assert.equal(withReferer.back().headers.get('Location'), 'http://localhost/previous');

  const without = await controllerFor(new Request('http://localhost/x'));
  assert.equal(without.back().headers.get('Location'), '/profiles');
});

test('Controller - redirectToRoute builds the named URL', async () => {
  const controller = await controllerFor(new Request('http://localhost/x'));
  const response = controller.toProfile();

  assert.equal(response.status, 302);
  assert.equal(response.headers.get('Location'), '/profiles/3');
});

test('Controller - validate passes valid data through', async () => {
  const controller = await controllerFor(
    new Request('http://localhost/profiles', {
      method: 'POST',
      body: JSON.stringify({ name: 'Ada', age: 36 }),
      headers: { 'Content-Type': 'application/json' },
    })
  );
  const response = controller.save();

  assert.equal(response.status, 201);
  assert.deepEqual((await response.json()).data, { name: 'Ada', age: 36 });
});

test('Controller - validate throws ValidationError', async () => {
  const controller = await controllerFor(
    new Request('http://localhost/profiles', {
      method: 'POST',
      body: JSON.stringify({ age: 12 }),
      headers: { 'Content-Type': 'application/json' },
    })
  );

  assert.throws(() => controller.save(), (error: unknown) => {
    return (
      error instanceof ValidationError &&
      error.status === 422 &&
      JSON.stringify(error.errors) === JSON.stringify({ name: ['name is required'], age: ['age must be at least 18'] })
    );
  });
});

test('validateData - required, type and bounds', () => {
  const errors = validateData(
    { title: '', count: 'three', tags: 'a', code: 'abc', score: 150 },
    {
      title: { required: true },
      count: { type: 'number' },
      tags: { type: 'array' },
      code: { type: 'string', min: 4, pattern: /^[0-9]+$/ },
      score: { type: 'number', max: 100 },
      optional: { type: 'string' },
    }
  );

  assert.deepEqual(errors, {
    title: ['title is required'],
    count: ['count must be a number'],
    tags: ['tags must be a array'],
    code: ['code must be at least 4 characters', 'code format is invalid'],
    score: ['score must be at most 100'],
  });
});

test('validateData - arrays are not objects', () => {
  assert.deepEqual(validateData({ items: [1, 2] }, { items: { type: 'object' } }), {
    items: ['items must be a object'],
  });
  assert.deepEqual(validateData({ items: [1, 2] }, { items: { type: 'array' } }), {});
});

test('validateData - long strings', () => {
  assert.deepEqual(validateData({ name: 'abcdefghijk' }, { name: { max: 10 } }), {
    name: ['name must be at most 10 characters'],
  });
});

test('Controller - notFound and forbidden send envelopes', async () => {
  const missing = (await controllerFor(new Request('http://localhost/api/profiles/1'))).missing();
  const missingBody = await missing.json();
  assert.equal(missing.status, 404);
  assert.equal(missingBody.status, 'Client Error');
  assert.equal(missingBody.message, 'Resource not found');
  assert.equal(missingBody.data, undefined);

  const locked = (await controllerFor(new Request('http://localhost/api/profiles/1'))).locked();
  assert.equal(locked.status, 403);
  assert.equal((await locked.json()).message, 'Profile is locked');
});

test('Controller - download sends a file attachment', async () => {
  const response = await (await controllerFor(new Request('http://localhost/profiles/1/export'))).exportProfile();

  assert.equal(response.headers.get('Content-Disposition'), 'attachment; filename="profile.txt"');
  assert.equal(await response.text(), 'quarterly numbers\n');
});
