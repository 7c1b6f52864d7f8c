/**
 * Layer 2: Middleware Layer
 *
 * Cross-cutting concerns that wrap every request/response cycle.
 * Global middleware follows the onion model; route middleware runs by name
 * before the handler and may halt dispatch.
 */

export {
  MiddlewarePipeline,
  conditional,
  forMethods,
  forPath,
  type FinalHandler,
} from './pipeline.ts';
export {
  MiddlewareRegistry,
  isMiddlewareClass,
  parseMiddlewareSpec,
  type MiddlewareClass,
  type MiddlewareDefinition,
  type MiddlewareHandler,
  type MiddlewareResult,
  type MiddlewareSpec,
  type NamedMiddleware,
  type RouteMiddleware,
} from './registry.ts';
export { loggingMiddleware, type LoggingOptions } from './logging.ts';
