/**
 * Layer 1: HTTP/Server Layer
 *
 * First framework-specific abstraction layer, on top of Node's HTTP server.
 * Wraps raw HTTP into rich Request/Response objects.
 *
 * Responsibilities:
 * - Normalize HTTP variations
 * - Parse request data once, whatever the content type
 * - Provide consistent JSON envelopes and error pages
 * - Enable testability (plain Fetch Request/Response in and out)
 */

export { Server, type ServerOptions, type ServerAddress, type FetchHandler } from './server.ts';
export { BrambleRequest, isJsonString, type RequestContext } from './request.ts';
export {
  BrambleResponse,
  formatTimestamp,
  statusName,
  type Envelope,
  type ResponseOptions,
} from './response.ts';
export { HttpError, NotFoundError, UnauthorizedError, ForbiddenError, ValidationError } from './errors.ts';
export { renderError, type ErrorRenderOptions } from './error_pages.ts';
export type {
  Handler,
  HandlerResult,
  Middleware,
  Next,
  HttpMethod,
  RequestData,
  ConnectionInfo,
  CookieOptions,
} from './types.ts';
export { HTTP_METHODS, isHttpMethod } from './types.ts';
