/**
 * Middleware Pipeline
 *
 * Manages the execution of global middleware in a chain (onion model).
 * Each middleware can:
 * - Inspect/modify request before handler
 * - Short-circuit and return early response
 * - Inspect/modify response after handler
 * - Handle exceptions at any point
 */

import type { BrambleRequest } from '../http/request.ts';
import type { BrambleResponse } from '../http/response.ts';
import type { Middleware, Next } from '../http/types.ts';

/**
 * Innermost step of the chain, usually the router
 */
export type FinalHandler = (req: BrambleRequest, res: BrambleResponse) => Promise<Response>;

/**
 * Middleware pipeline for request processing
 */
export class MiddlewarePipeline {
  private middleware: Middleware[] = [];

  /**
   * Add middleware to the pipeline
   */
  use(middleware: Middleware): this {
    this.middleware.push(middleware);
    return this;
  }

  /**
   * Add middleware at a specific position
   */
  useAt(index: number, middleware: Middleware): this {
    this.middleware.splice(index, 0, middleware);
    return this;
  }

  /**
   * Remove middleware from the pipeline
   */
  remove(middleware: Middleware): this {
    const index = this.middleware.indexOf(middleware);
    if (index !== -1) {
      this.middleware.splice(index, 1);
    }
    return this;
  }

  clear(): this {
    this.middleware = [];
    return this;
  }

  get length(): number {
    return this.middleware.length;
  }

  /**
   * Execute the middleware pipeline around the final handler
   */
  async execute(req: BrambleRequest, res: BrambleResponse, finalHandler: FinalHandler): Promise<Response> {
    const stack = [...this.middleware];

    const dispatch = async (index: number): Promise<Response> => {
      const middleware = stack[index];
      if (!middleware) {
        return await finalHandler(req, res);
      }

      let called = false;
      const next: Next = async () => {
        if (called) {
          throw new Error(`next() called multiple times in ${middleware.name || `middleware[${index}]`}`);
        }
        called = true;
        return await dispatch(index + 1);
      };

      return await middleware(req, res, next);
    };

    return await dispatch(0);
  }

  /**
   * Create a composed middleware function
   */
  compose(): Middleware {
    return async (req, res, next) => {
      return await this.execute(req, res, async () => await next());
    };
  }
}

/**
 * Create a middleware that runs conditionally
 */
export function conditional(
  condition: (req: BrambleRequest) => boolean,
  middleware: Middleware
): Middleware {
  return async (req, res, next) => {
    if (condition(req)) {
      return await middleware(req, res, next);
    }
    return await next();
  };
}

/**
 * Create a middleware that runs for specific paths
 */
export function forPath(pathPrefix: string, middleware: Middleware): Middleware {
  return conditional((req) => req.path.startsWith(pathPrefix), middleware);
}

/**
 * Create a middleware that runs for specific methods
 */
export function forMethods(methods: string[], middleware: Middleware): Middleware {
  const methodSet = new Set(methods.map((m) => m.toUpperCase()));
  return conditional((req) => methodSet.has(req.method), middleware);
}
