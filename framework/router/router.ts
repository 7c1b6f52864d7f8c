/**
 * URL Router
 *
 * Routes are matched in registration order against compiled path templates;
 * the first route whose method and pattern both match wins.
 */

import { Container } from '../container/container.ts';
import type { Constructor } from '../container/token.ts';
import { Controller } from '../controller/base.ts';
import { NotFoundError } from '../http/errors.ts';
import type { BrambleRequest } from '../http/request.ts';
import type { BrambleResponse } from '../http/response.ts';
import type { Handler, HttpMethod, RequestData } from '../http/types.ts';
import {
  MiddlewareRegistry,
  type MiddlewareDefinition,
  type RouteMiddleware,
} from '../middleware/registry.ts';
import { getLogger, Logger } from '../telemetry/logger.ts';
import { setRouteAttribute, withSpan } from '../telemetry/tracing.ts';
import {
  ActionNotFoundError,
  ControllerNotFoundError,
  InvalidHandlerError,
  RouteNotFoundError,
} from './errors.ts';
import { RouteGroup } from './group.ts';
import { buildPath, compilePattern, normalizePath, PatternRegistry } from './patterns.ts';

/**
 * Method names of T whose values are functions
 */
export type ActionName<T> = {
  [K in keyof T]: T[K] extends (...args: never[]) => unknown ? K : never;
}[keyof T] &
  string;

/**
 * `[UserController, 'show']`
 */
export type ControllerAction<T = unknown> = readonly [Constructor<T>, ActionName<T>];

/**
 * Function, controller action tuple, or `'UserController@show'`
 */
export type RouteHandler<T = unknown> = Handler | ControllerAction<T> | string;

type StoredHandler = Handler | readonly [Constructor, string] | string;

export type RouteMethod = HttpMethod | '*';

export interface RouteDefinition {
  method: RouteMethod;
  pattern: string;
  regex: RegExp;
  parameters: string[];
  handler: StoredHandler;
  middleware: RouteMiddleware[];
  name?: string;
  meta?: Record<string, unknown>;
}

export interface RouteMatch {
  route: RouteDefinition;
  params: Record<string, string>;
  handler: StoredHandler;
}

export interface RouteOptions {
  name?: string;
  middleware?: RouteMiddleware[];
  meta?: Record<string, unknown>;
}

export interface RouterOptions {
  prefix?: string;
  container?: Container;
  patterns?: PatternRegistry;
  middleware?: MiddlewareRegistry;
  logger?: Logger;
}

/**
 * Anything that can turn a route name back into a URL
 */
export interface UrlGenerator {
  url(name: string, params?: Record<string, string | number>, query?: Record<string, string | string[]>): string;
}

export class Router implements UrlGenerator {
  private routes: RouteDefinition[] = [];
  private namedRoutes = new Map<string, RouteDefinition>();
  private globalMiddleware: RouteMiddleware[] = [];
  private controllers = new Map<string, Constructor>();
  private prefix: string;
  private container: Container;
  private patterns: PatternRegistry;
  private middlewareRegistry: MiddlewareRegistry;
  private logger: Logger;

  constructor(options: RouterOptions = {}) {
    this.prefix = options.prefix ?? '';
    this.container = options.container ?? new Container();
    this.patterns = options.patterns ?? new PatternRegistry();
    this.middlewareRegistry = options.middleware ?? new MiddlewareRegistry();
    this.logger = options.logger ?? getLogger().child({ component: 'router' });
  }

  /**
   * Add middleware that every route on this router runs first
   */
  use(...middleware: RouteMiddleware[]): this {
    this.globalMiddleware.push(...middleware);
    return this;
  }

  /**
   * Register named middleware
   */
  middleware(name: string, definition: MiddlewareDefinition): this {
    this.middlewareRegistry.register(name, definition);
    return this;
  }

  /**
   * Register a controller for `'Name@method'` handlers
   */
  controller(ctor: Constructor, name: string = ctor.name): this {
    this.controllers.set(name, ctor);
    return this;
  }

  get<T>(path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    return this.addRoute('GET', path, handler, options);
  }

  post<T>(path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    return this.addRoute('POST', path, handler, options);
  }

  put<T>(path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    return this.addRoute('PUT', path, handler, options);
  }

  patch<T>(path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    return this.addRoute('PATCH', path, handler, options);
  }

  delete<T>(path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    return this.addRoute('DELETE', path, handler, options);
  }

  options<T>(path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    return this.addRoute('OPTIONS', path, handler, options);
  }

  /**
   * Register a route for all methods
   */
  all<T>(path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    return this.addRoute('*', path, handler, options);
  }

  /**
   * Add a route with explicit method(s). A method list registers one route per method.
   */
  addRoute<T>(
    method: RouteMethod | HttpMethod[],
    path: string,
    handler: RouteHandler<T>,
    options: RouteOptions = {}
  ): this {
    const methods = Array.isArray(method) ? method : [method];
    const pattern = normalizePath(this.prefix + path);
    const { regex, parameters } = compilePattern(pattern, this.patterns);

    for (const m of methods) {
      const route: RouteDefinition = {
        method: m,
        pattern,
        regex,
        parameters,
        handler,
        middleware: [...(options.middleware ?? [])],
        name: options.name,
        meta: options.meta,
      };
      this.routes.push(route);

      if (options.name) {
        this.namedRoutes.set(options.name, route);
      }
    }

    return this;
  }

  /**
   * Name the most recently registered route
   */
  name(name: string): this {
    const route = this.routes.at(-1);
    if (route) {
      route.name = name;
      this.namedRoutes.set(name, route);
    }
    return this;
  }

  /**
   * Register routes under a shared prefix and middleware list
   */
  group(
    prefix: string,
    callback: (group: RouteGroup) => void,
    options: { middleware?: RouteMiddleware[] } = {}
  ): this {
    const group = new RouteGroup(prefix, this);
    group.use(...(options.middleware ?? []));
    callback(group);
    return this;
  }

  /**
   * Copy another router's routes under a prefix
   */
  mount(prefix: string, router: Router): this {
    // child templates keep the child's types
    const patterns = this.patterns.merge(router.patterns);

    for (const route of router.routes) {
      const pattern = normalizePath(this.prefix + prefix + route.pattern);
      const { regex, parameters } = compilePattern(pattern, patterns);

      const mounted: RouteDefinition = {
        ...route,
        pattern,
        regex,
        parameters,
        middleware: [...router.globalMiddleware, ...route.middleware],
      };
      this.routes.push(mounted);

      if (route.name) {
        this.namedRoutes.set(route.name, mounted);
      }
    }

    for (const [name, ctor] of router.controllers) {
      if (!this.controllers.has(name)) {
        this.controllers.set(name, ctor);
      }
    }
    for (const [name, definition] of router.middlewareRegistry.entries()) {
      if (!this.middlewareRegistry.has(name)) {
        this.middlewareRegistry.register(name, definition);
      }
    }

    return this;
  }

  /**
   * Match a method and path to a route
   */
  match(method: string, path: string): RouteMatch | null {
    const normalized = normalizePath(path);

    for (const route of this.routes) {
      if (route.method !== '*' && route.method !== method) {
        continue;
      }

      const result = route.regex.exec(normalized);
      if (!result) {
        continue;
      }

      const params: Record<string, string> = {};
      route.parameters.forEach((name, index) => {
        const value = result[index + 1];
        if (value !== undefined) {
          params[name] = value;
        }
      });

      return { route, params, handler: route.handler };
    }

    return null;
  }

  matchRequest(req: BrambleRequest): RouteMatch | null {
    return this.match(req.method, req.path);
  }

  /**
   * Dispatch a request: route middleware first, then the handler
   */
  async handle(req: BrambleRequest, res: BrambleResponse): Promise<Response> {
    const match = this.matchRequest(req);

    if (!match) {
      throw new NotFoundError('Endpoint not found');
    }

    const { route, params } = match;
    req.setParams(params);
    setRouteAttribute(route.pattern, req.method);

    const scoped = req.state.get('logger');
    const logger = scoped instanceof Logger ? scoped.forRoute(route.pattern) : this.logger;
    req.state.set('logger', logger);

    logger.debug('Route matched', {
      method: req.method,
      path: req.path,
      route: route.pattern,
    });

    return await withSpan(
      `route ${req.method} ${route.pattern}`,
      async () => {
        const halted = await this.middlewareRegistry.run(
          [...this.globalMiddleware, ...route.middleware],
          req,
          res,
          this.container
        );
        if (halted) {
          logger.debug('Request halted by middleware', {
            route: route.pattern,
            status: halted.status,
          });
          return halted;
        }

        const result = await this.invoke(route.handler, req, res);
        return toResponse(result, res);
      },
      { attributes: { 'http.route': route.pattern, 'http.request.method': req.method } }
    );
  }

  /**
   * Generate a URL for a named route
   */
  url(
    name: string,
    params: Record<string, string | number> = {},
    query?: Record<string, string | string[]>
  ): string {
    const route = this.namedRoutes.get(name);
    if (!route) {
      throw new RouteNotFoundError(name);
    }
    return buildPath(route.pattern, params, query);
  }

  hasRoute(name: string): boolean {
    return this.namedRoutes.has(name);
  }

  getNamedRoutes(): Map<string, RouteDefinition> {
    return new Map(this.namedRoutes);
  }

  /**
   * Get all registered routes (for debugging/admin)
   */
  getRoutes(): RouteDefinition[] {
    return [...this.routes];
  }

  /**
   * Add a named parameter type for templates registered after this call
   */
  addPattern(name: string, regex: string): this {
    this.patterns.add(name, regex);
    return this;
  }

  getPatterns(): Record<string, string> {
    return this.patterns.all();
  }

  getContainer(): Container {
    return this.container;
  }

  getMiddlewareRegistry(): MiddlewareRegistry {
    return this.middlewareRegistry;
  }

  private async invoke(handler: StoredHandler, req: BrambleRequest, res: BrambleResponse): Promise<unknown> {
    if (typeof handler === 'function') {
      return await handler(req, res);
    }

    if (typeof handler === 'string') {
      const [name, action, ...rest] = handler.split('@');
      if (!name || !action || rest.length > 0) {
        throw new InvalidHandlerError(handler);
      }
      const ctor = this.controllers.get(name);
      if (!ctor) {
        throw new ControllerNotFoundError(name);
      }
      return await this.callAction(ctor, action, req, res);
    }

    const [ctor, action] = handler;
    return await this.callAction(ctor, action, req, res);
  }

  private async callAction(
    ctor: Constructor,
    action: string,
    req: BrambleRequest,
    res: BrambleResponse
  ): Promise<unknown> {
    const instance = this.container.resolve(ctor);
    if (typeof instance !== 'object' || instance === null) {
      throw new ActionNotFoundError(ctor.name, action);
    }

    if (instance instanceof Controller) {
      instance.setContext(req, res, this);
    }

    const method: unknown = Reflect.get(instance, action);
    if (typeof method !== 'function') {
      throw new ActionNotFoundError(ctor.name, action);
    }

    const params: RequestData = { ...req.params, ...req.all() };
    const result: unknown = await method.call(instance, params);
    return result;
  }
}

/**
 * Turn a handler result into a Response
 */
export function toResponse(result: unknown, res: BrambleResponse): Response {
  if (result instanceof Response) {
    return result;
  }
  if (typeof result === 'string') {
    return res.html(result);
  }
  if (result === undefined || result === null) {
    return res.build();
  }
  return res.json(result);
}
