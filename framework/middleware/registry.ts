/**
 * Named Route Middleware
 *
 * Routes list their middleware by name, with colon-separated string
 * parameters: `'auth'`, `'permission:view:admin'`. Each entry runs in order
 * before the handler; returning `false` or a Response stops dispatch.
 */

import type { Container } from '../container/container.ts';
import type { Constructor } from '../container/token.ts';
import type { BrambleRequest } from '../http/request.ts';
import type { BrambleResponse } from '../http/response.ts';
import { InvalidMiddlewareSpecError, MiddlewareNotFoundError } from '../router/errors.ts';

/**
 * `false` halts, a Response halts with that response, anything else continues
 */
export type MiddlewareResult = boolean | Response | null | undefined | void;

/**
 * Function middleware
 */
export type NamedMiddleware = (
  req: BrambleRequest,
  res: BrambleResponse,
  ...params: string[]
) => MiddlewareResult | Promise<MiddlewareResult>;

/**
 * Class middleware, built through the container on every call
 */
export interface MiddlewareHandler {
  handle(
    req: BrambleRequest,
    res: BrambleResponse,
    ...params: string[]
  ): MiddlewareResult | Promise<MiddlewareResult>;
}

export type MiddlewareClass = Constructor<MiddlewareHandler>;

export type MiddlewareDefinition = NamedMiddleware | MiddlewareClass;

/**
 * An entry in a route's middleware list: a spec string or an inline function
 */
export type RouteMiddleware = string | NamedMiddleware;

export interface MiddlewareSpec {
  name: string;
  params: string[];
}

/**
 * Split `'name:p1:p2'` into its name and parameters
 */
export function parseMiddlewareSpec(spec: string): MiddlewareSpec {
  const [name, ...params] = spec.split(':');
  if (!name) {
    throw new InvalidMiddlewareSpecError(spec);
  }
  return { name, params };
}

/**
 * A class whose prototype has a `handle` method
 */
export function isMiddlewareClass(value: unknown): value is MiddlewareClass {
  if (typeof value !== 'function') return false;
  const proto: unknown = Reflect.get(value, 'prototype');
  return typeof proto === 'object' && proto !== null && typeof Reflect.get(proto, 'handle') === 'function';
}

export class MiddlewareRegistry {
  private definitions = new Map<string, MiddlewareDefinition>();

  /**
   * Register middleware under a name; a later registration replaces an earlier one
   */
  register(name: string, definition: MiddlewareDefinition): this {
    this.definitions.set(name, definition);
    return this;
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  get(name: string): MiddlewareDefinition | undefined {
    return this.definitions.get(name);
  }

  names(): string[] {
    return [...this.definitions.keys()];
  }

  entries(): [string, MiddlewareDefinition][] {
    return [...this.definitions.entries()];
  }

  /**
   * Run a middleware list in order.
   *
   * @returns the response that halted dispatch, or null to continue to the handler
   */
  async run(
    list: readonly RouteMiddleware[],
    req: BrambleRequest,
    res: BrambleResponse,
    container: Container
  ): Promise<Response | null> {
    for (const entry of list) {
      const result =
        typeof entry === 'string'
          ? await this.execute(parseMiddlewareSpec(entry), req, res, container)
          : await entry(req, res);

      if (result instanceof Response) {
        return result;
      }
      if (result === false) {
        return haltResponse(res);
      }
    }
    return null;
  }

  private async execute(
    spec: MiddlewareSpec,
    req: BrambleRequest,
    res: BrambleResponse,
    container: Container
  ): Promise<MiddlewareResult> {
    const definition = this.definitions.get(spec.name);
    if (!definition) {
      throw new MiddlewareNotFoundError(spec.name);
    }

    if (isMiddlewareClass(definition)) {
      return await container.resolve(definition).handle(req, res, ...spec.params);
    }
    return await definition(req, res, ...spec.params);
  }
}

/**
 * Response for a middleware that returned `false`: whatever it configured on
 * the builder, or 403 when it left the builder untouched.
 */
function haltResponse(res: BrambleResponse): Response {
  if (res.statusCode === 200 && !res.hasBody && res.location === null) {
    return res.forbidden();
  }
  return res.build();
}
