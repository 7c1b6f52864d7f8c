/**
 * HTTP Type Definitions
 */

import type { BrambleRequest } from './request.ts';
import type { BrambleResponse } from './response.ts';

/**
 * HTTP methods supported by Bramble
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';

export const HTTP_METHODS: readonly HttpMethod[] = [
  'GET',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'OPTIONS',
  'HEAD',
];

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

/**
 * What a route handler may return.
 *
 * Response objects pass through, strings are sent as HTML, `undefined`/`null`
 * build whatever the response builder holds, and anything else is sent as JSON.
 */
export type HandlerResult = Response | string | object | null | undefined | void;

/**
 * Route handler function
 */
export type Handler = (
  req: BrambleRequest,
  res: BrambleResponse
) => Promise<HandlerResult> | HandlerResult;

/**
 * Global middleware next function
 */
export type Next = () => Promise<Response>;

/**
 * Global (onion) middleware signature
 */
export type Middleware = (
  req: BrambleRequest,
  res: BrambleResponse,
  next: Next
) => Promise<Response> | Response;

/**
 * Data parsed from a query string or request body
 */
export type RequestData = Record<string, unknown>;

/**
 * Information about the underlying connection, filled in by the server adapter
 */
export interface ConnectionInfo {
  remoteAddress?: string;
}

/**
 * Cookie options
 */
export interface CookieOptions {
  maxAge?: number;
  expires?: Date;
  path?: string;
  domain?: string;
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
}
