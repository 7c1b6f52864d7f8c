/**
 * Bramble Framework
 *
 * A routing and dependency-injection web framework for Node.js.
 * Requests flow down the layers: HTTP, global middleware, router, route
 * middleware, then controllers built by the container.
 *
 * @module bramble
 */

// Application
export { Application, createApp, type ApplicationOptions } from './app.ts';

// Layer 0: Runtime
export { Environment, Lifecycle, type LifecycleHook, type LifecycleOptions } from './runtime/mod.ts';

// Layer 1: HTTP/Server
export {
  Server,
  BrambleRequest,
  BrambleResponse,
  HttpError,
  NotFoundError,
  UnauthorizedError,
  ForbiddenError,
  ValidationError,
  renderError,
  type Envelope,
  type Handler,
  type HandlerResult,
  type HttpMethod,
  type Middleware,
  type Next,
  type RequestData,
  type ServerOptions,
} from './http/mod.ts';

// Layer 2: Middleware
export {
  MiddlewarePipeline,
  MiddlewareRegistry,
  conditional,
  forMethods,
  forPath,
  loggingMiddleware,
  parseMiddlewareSpec,
  type LoggingOptions,
  type MiddlewareDefinition,
  type MiddlewareHandler,
  type MiddlewareResult,
  type NamedMiddleware,
  type RouteMiddleware,
} from './middleware/mod.ts';

// Layer 3: Router
export {
  Router,
  RouteGroup,
  PatternRegistry,
  buildPath,
  discoverMiddleware,
  discoverRoutes,
  RouteNotFoundError,
  MissingRouteParameterError,
  InvalidMiddlewareSpecError,
  MiddlewareNotFoundError,
  type ControllerAction,
  type RouteDefinition,
  type RouteHandler,
  type RouteMatch,
  type RouteOptions,
  type RouteRegistrar,
} from './router/mod.ts';

// Layer 4: Controller
export { Controller, type ValidationSchema } from './controller/mod.ts';

// Layer 5: Container
export {
  Container,
  InjectionToken,
  value,
  CircularDependencyError,
  DependencyResolutionError,
  UnboundTokenError,
  UnresolvableParameterError,
  type Constructor,
  type Token,
} from './container/mod.ts';

// Layer 6: Config
export { Config, ConfigError, loadConfig, type ConfigOptions } from './config/mod.ts';

// Layer 7: Security
export { escapeHtml } from './security/mod.ts';

// Layer 8: Telemetry
export { Logger, getLogger, setLogger, withSpan, type LogLevel, type LogEntry, type RequestScope } from './telemetry/mod.ts';
