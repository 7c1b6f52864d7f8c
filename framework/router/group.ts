/**
 * Route Group
 *
 * Groups routes with shared prefixes and middleware.
 */

import type { HttpMethod } from '../http/types.ts';
import type { RouteMiddleware } from '../middleware/registry.ts';
import type { RouteHandler, RouteMethod, RouteOptions, Router } from './router.ts';

/**
 * Route group for organizing related routes
 */
export class RouteGroup {
  private router: Router;
  private prefix: string;
  private middleware: RouteMiddleware[] = [];

  constructor(prefix: string, router: Router) {
    this.prefix = prefix;
    this.router = router;
  }

  /**
   * Add middleware to the group
   */
  use(...middleware: RouteMiddleware[]): this {
    this.middleware.push(...middleware);
    return this;
  }

  get<T>(path: string, handler: RouteHandler<T>, options: RouteOptions = {}): this {
    return this.addRoute('GET', path, handler, options);
  }

  post<T>(path: string, handler: RouteHandler<T>, options: RouteOptions = {}): this {
    return this.addRoute('POST', path, handler, options);
  }

  put<T>(path: string, handler: RouteHandler<T>, options: RouteOptions = {}): this {
    return this.addRoute('PUT', path, handler, options);
  }

  patch<T>(path: string, handler: RouteHandler<T>, options: RouteOptions = {}): this {
    return this.addRoute('PATCH', path, handler, options);
  }

  delete<T>(path: string, handler: RouteHandler<T>, options: RouteOptions = {}): this {
    return this.addRoute('DELETE', path, handler, options);
  }

  all<T>(path: string, handler: RouteHandler<T>, options: RouteOptions = {}): this {
    return this.addRoute('*', path, handler, options);
  }

  /**
   * Name the route registered last
   */
  name(name: string): this {
    this.router.name(name);
    return this;
  }

  /**
   * Create a nested group; it inherits this group's middleware
   */
  group(prefix: string, callback: (group: RouteGroup) => void, options: { middleware?: RouteMiddleware[] } = {}): this {
    const nestedGroup = new RouteGroup(this.prefix + prefix, this.router);
    nestedGroup.middleware = [...this.middleware, ...(options.middleware ?? [])];
    callback(nestedGroup);
    return this;
  }

  addRoute<T>(
    method: RouteMethod | HttpMethod[],
    path: string,
    handler: RouteHandler<T>,
    options: RouteOptions = {}
  ): this {
    this.router.addRoute(method, this.prefix + path, handler, {
      ...options,
      middleware: [...this.middleware, ...(options.middleware ?? [])],
    });
    return this;
  }
}
