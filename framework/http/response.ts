/**
 * Enhanced Response Builder
 *
 * Provides a fluent interface for building HTTP responses
 * with common utilities for JSON, HTML, redirects, etc.
 */

import { readFile, stat } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type { CookieOptions } from './types.ts';

/**
 * Body of an envelope response
 */
export interface Envelope {
  status: string;
  message: string;
  timestamp: string;
  server_time: number;
  data?: unknown;
}

const CONTENT_TYPES: Record<string, string> = {
  '.txt': 'text/plain',
  '.html': 'text/html',
  '.css': 'text/css',
  '.csv': 'text/csv',
  '.js': 'text/javascript',
  '.json': 'application/json',
  '.xml': 'application/xml',
  '.pdf': 'application/pdf',
  '.zip': 'application/zip',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.svg': 'image/svg+xml',
  '.webp': 'image/webp',
};

const ENVELOPE_HEADERS: Record<string, string> = {
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'DENY',
  'X-XSS-Protection': '1; mode=block',
};

export interface ResponseOptions {
  status?: number;
  headers?: Headers | Record<string, string>;
}

/**
 * Response builder for Bramble
 */
export class BrambleResponse {
  private _status: number = 200;
  private _headers: Headers = new Headers();
  private _body: BodyInit | null = null;
  private _cookies: string[] = [];

  constructor(options?: ResponseOptions) {
    if (options?.status) {
      this._status = options.status;
    }
    if (options?.headers) {
      if (options.headers instanceof Headers) {
        options.headers.forEach((value, key) => {
          this._headers.set(key, value);
        });
      } else {
        for (const [key, value] of Object.entries(options.headers)) {
          this._headers.set(key, value);
        }
      }
    }
  }

  /**
   * Set the response status code
   */
  status(code: number): this {
    this._status = code;
    return this;
  }

  /**
   * Status code set so far
   */
  get statusCode(): number {
    return this._status;
  }

  /**
   * Whether a body has been set
   */
  get hasBody(): boolean {
    return this._body !== null;
  }

  /**
   * Location header, if a redirect was configured
   */
  get location(): string | null {
    return this._headers.get('Location');
  }

  /**
   * Set a response header
   */
  header(name: string, value: string): this {
    this._headers.set(name, value);
    return this;
  }

  /**
   * Set multiple headers
   */
  headers(headers: Record<string, string>): this {
    for (const [name, value] of Object.entries(headers)) {
      this._headers.set(name, value);
    }
    return this;
  }

  /**
   * Set the Content-Type header
   */
  type(contentType: string): this {
    this._headers.set('Content-Type', contentType);
    return this;
  }

  /**
   * Set a cookie
   */
  cookie(name: string, value: string, options: CookieOptions = {}): this {
    const parts = [`${encodeURIComponent(name)}=${encodeURIComponent(value)}`];

    if (options.maxAge !== undefined) {
      parts.push(`Max-Age=${options.maxAge}`);
    }
    if (options.expires) {
      parts.push(`Expires=${options.expires.toUTCString()}`);
    }
    if (options.path) {
      parts.push(`Path=${options.path}`);
    }
    if (options.domain) {
      parts.push(`Domain=${options.domain}`);
    }
    if (options.secure) {
      parts.push('Secure');
    }
    if (options.httpOnly) {
      parts.push('HttpOnly');
    }
    if (options.sameSite) {
      parts.push(`SameSite=${options.sameSite}`);
    }

    this._cookies.push(parts.join('; '));
    return this;
  }

  /**
   * Clear a cookie
   */
  clearCookie(name: string, options: CookieOptions = {}): this {
    return this.cookie(name, '', {
      ...options,
      maxAge: 0,
      expires: new Date(0),
    });
  }

  /**
   * Send a JSON response
   */
  json(data: unknown): Response {
    this._headers.set('Content-Type', 'application/json; charset=utf-8');
    this._body = JSON.stringify(data);
    return this.build();
  }

  /**
   * Send an HTML response
   */
  html(content: string): Response {
    this._headers.set('Content-Type', 'text/html; charset=utf-8');
    this._body = content;
    return this.build();
  }

  /**
   * Send a plain text response
   */
  text(content: string): Response {
    this._headers.set('Content-Type', 'text/plain; charset=utf-8');
    this._body = content;
    return this.build();
  }

  /**
   * Send an XML response
   */
  xml(content: string): Response {
    this._headers.set('Content-Type', 'application/xml; charset=utf-8');
    this._body = content;
    return this.build();
  }

  /**
   * Send a redirect response
   */
  redirect(url: string, status: 301 | 302 | 303 | 307 | 308 = 302): Response {
    this._status = status;
    this._headers.set('Location', url);
    return this.build();
  }

  /**
   * Send a stream response
   */
  stream(readable: ReadableStream): Response {
    return new Response(readable, {
      status: this._status,
      headers: this.buildHeaders(),
    });
  }

  /**
   * Send a file as an attachment. A missing file gets a 404 envelope.
   */
  async download(path: string, name?: string, headers: Record<string, string> = {}): Promise<Response> {
    const contents = await readRegularFile(path);
    if (contents === null) {
      return this.error('File not found', 404);
    }

    this.headers({
      'Content-Type': contentTypeFor(path),
      'Content-Disposition': `attachment; filename="${name ?? basename(path)}"`,
      'Content-Length': String(contents.byteLength),
      'Cache-Control': 'no-cache, must-revalidate',
      Pragma: 'no-cache',
    });
    this.headers(headers);
    this._body = contents;
    return this.build();
  }

  /**
   * Send a file for display in the browser
   */
  async file(path: string, name?: string): Promise<Response> {
    const contents = await readRegularFile(path);
    if (contents === null) {
      return this.error('File not found', 404);
    }

    this.headers({
      'Content-Type': contentTypeFor(path),
      'Content-Disposition': `inline; filename="${name ?? basename(path)}"`,
      'Content-Length': String(contents.byteLength),
    });
    this._body = contents;
    return this.build();
  }

  /**
   * Send an empty response
   */
  empty(): Response {
    this._body = null;
    return this.build();
  }

  /**
   * Send a 204 No Content response
   */
  noContent(): Response {
    this._status = 204;
    this._body = null;
    return this.build();
  }

  /**
   * Send a 404 Not Found response
   */
  notFound(message = 'Not Found'): Response {
    this._status = 404;
    return this.json({ error: message });
  }

  /**
   * Send a 400 Bad Request response
   */
  badRequest(message = 'Bad Request'): Response {
    this._status = 400;
    return this.json({ error: message });
  }

  /**
   * Send a 401 Unauthorized response
   */
  unauthorized(message = 'Unauthorized'): Response {
    this._status = 401;
    return this.json({ error: message });
  }

  /**
   * Send a 403 Forbidden response
   */
  forbidden(message = 'Forbidden'): Response {
    this._status = 403;
    return this.json({ error: message });
  }

  /**
   * Send a 500 Internal Server Error response
   */
  serverError(message = 'Internal Server Error'): Response {
    this._status = 500;
    return this.json({ error: message });
  }

  /**
   * Send a JSON envelope: `{ status, message, timestamp, server_time, data? }`.
   *
   * `message` is lifted out of `data`; `data.data` becomes the payload when set,
   * otherwise any remaining fields do.
   */
  envelope(data: Record<string, unknown> = {}, status = this._status): Response {
    const { message, ...rest } = data;

    const body: Envelope = {
      status: statusName(status),
      message: typeof message === 'string' ? message : '',
      timestamp: formatTimestamp(new Date()),
      server_time: Math.floor(Date.now() / 1000),
    };

    if (rest.data !== undefined && rest.data !== null) {
      body.data = rest.data;
    } else if (Object.keys(rest).length > 0) {
      body.data = rest;
    }

    this._status = status;
    this.headers(ENVELOPE_HEADERS);
    this._headers.set('Content-Type', 'application/json; charset=utf-8');
    this._body = JSON.stringify(body, null, 4);
    return this.build();
  }

  /**
   * Envelope with a message and payload
   */
  success(message: string, data: unknown = {}, code = 200): Response {
    return this.envelope({ message, data }, code);
  }

  /**
   * Envelope describing a failure, with optional field errors
   */
  error(message: string, code = 400, errors?: unknown): Response {
    const data: Record<string, unknown> = { message };
    if (errors !== undefined && !isEmpty(errors)) {
      data.errors = errors;
    }
    return this.envelope(data, code);
  }

  /**
   * 422 envelope carrying field errors
   */
  validationError(errors: unknown, message = 'Validation failed'): Response {
    return this.envelope({ message, errors }, 422);
  }

  /**
   * 201 envelope
   */
  created(data: unknown = {}, message = 'Resource created successfully'): Response {
    return this.envelope({ message, data }, 201);
  }

  /**
   * 202 envelope
   */
  accepted(message = 'Request accepted'): Response {
    return this.envelope({ message }, 202);
  }

  /**
   * Build the final Response object
   */
  build(): Response {
    return new Response(this._body, {
      status: this._status,
      headers: this.buildHeaders(),
    });
  }

  /**
   * Build headers including cookies
   */
  private buildHeaders(): Headers {
    const headers = new Headers(this._headers);
    for (const cookie of this._cookies) {
      headers.append('Set-Cookie', cookie);
    }
    return headers;
  }
}

/**
 * Coarse name for a status code class
 */
export function statusName(code: number): string {
  if (code >= 100 && code < 200) return 'Informational';
  if (code >= 200 && code < 300) return 'Success';
  if (code >= 300 && code < 400) return 'Redirect';
  if (code >= 400 && code < 500) return 'Client Error';
  if (code >= 500 && code < 600) return 'Server Error';
  return 'Unknown';
}

/**
 * `YYYY-MM-DD HH:mm:ss` in local time
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function contentTypeFor(path: string): string {
  return CONTENT_TYPES[extname(path).toLowerCase()] ?? 'application/octet-stream';
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * File contents, or null when the path is missing or not a regular file
 */
async function readRegularFile(path: string) {
  try {
    const info = await stat(path);
    if (!info.isFile()) return null;
    return new Uint8Array(await readFile(path));
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}

function isEmpty(value: unknown): boolean {
  if (value === null || value === undefined || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}
