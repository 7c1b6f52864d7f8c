/**
 * Layer 3: Routing Layer
 *
 * Maps incoming request URLs to application code.
 * Supports typed path parameters, named routes, and controller actions.
 *
 * Responsibilities:
 * - Map URLs to handlers in registration order
 * - Extract structured data from URLs
 * - Support URL generation/reversing
 * - Load route files and middleware from disk
 */

export {
  Router,
  toResponse,
  type ActionName,
  type ControllerAction,
  type RouteDefinition,
  type RouteHandler,
  type RouteMatch,
  type RouteMethod,
  type RouteOptions,
  type RouterOptions,
  type UrlGenerator,
} from './router.ts';
export {
  PatternRegistry,
  buildPath,
  compilePattern,
  normalizePath,
  parsePathParams,
  type CompiledPattern,
  type PatternParams,
} from './patterns.ts';
export { RouteGroup } from './group.ts';
export {
  DiscoveryError,
  deriveMiddlewareName,
  discoverMiddleware,
  discoverRoutes,
  featureDirectories,
  type RouteRegistrar,
} from './discovery.ts';
export {
  RoutingError,
  RouteNotFoundError,
  MissingRouteParameterError,
  ControllerNotFoundError,
  ActionNotFoundError,
  InvalidHandlerError,
  InvalidMiddlewareSpecError,
  MiddlewareNotFoundError,
} from './errors.ts';
