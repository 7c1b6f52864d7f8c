/**
 * Enhanced Request Object
 *
 * Wraps the native Request with request-data parsing and the accessors
 * controllers and middleware need.
 */

import { getLogger, type Logger } from '../telemetry/logger.ts';
import type { ConnectionInfo, RequestData } from './types.ts';

export interface RequestContext {
  params: Record<string, string>;
  query: URLSearchParams;
  state: Map<string, unknown>;
  startTime: number;
  connection: ConnectionInfo;
}

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

/**
 * Request wrapper for Bramble
 */
export class BrambleRequest {
  private _request: Request;
  private _url: URL;
  private _context: RequestContext;
  private _text: string | null = null;
  private _formData: FormData | null = null;
  private _data: RequestData = {};
  private _files = new Map<string, File>();
  private _parsed = false;

  constructor(request: Request, context?: Partial<RequestContext>) {
    this._request = request;
    this._url = new URL(request.url);
    this._context = {
      params: context?.params ?? {},
      query: this._url.searchParams,
      state: context?.state ?? new Map(),
      startTime: context?.startTime ?? performance.now(),
      connection: context?.connection ?? {},
    };
  }

  /**
   * The underlying native Request
   */
  get raw(): Request {
    return this._request;
  }

  get method(): string {
    return this._request.method;
  }

  /**
   * Full URL
   */
  get url(): string {
    return this._request.url;
  }

  /**
   * URL path (without query string)
   */
  get path(): string {
    return this._url.pathname;
  }

  get query(): URLSearchParams {
    return this._context.query;
  }

  /**
   * Route parameters extracted from path
   */
  get params(): Record<string, string> {
    return this._context.params;
  }

  get headers(): Headers {
    return this._request.headers;
  }

  /**
   * Get a specific header value (case-insensitive)
   */
  header(name: string): string | null {
    return this._request.headers.get(name);
  }

  /**
   * Request state for passing data between middleware
   */
  get state(): Map<string, unknown> {
    return this._context.state;
  }

  get startTime(): number {
    return this._context.startTime;
  }

  get isSecure(): boolean {
    return this._url.protocol === 'https:';
  }

  /**
   * Check if request accepts JSON
   */
  get acceptsJson(): boolean {
    const accept = this.header('Accept') ?? '';
    return accept.includes('application/json') || accept.includes('*/*');
  }

  /**
   * Check if request is AJAX/XHR
   */
  get isAjax(): boolean {
    return this.header('X-Requested-With')?.toLowerCase() === 'xmlhttprequest';
  }

  /**
   * Content-Type header as sent
   */
  get contentType(): string | null {
    return this.header('Content-Type');
  }

  /**
   * Media type: Content-Type without parameters, lower-cased
   */
  get mediaType(): string {
    return (this.contentType ?? '').split(';')[0].trim().toLowerCase();
  }

  get hostname(): string {
    return this._url.hostname;
  }

  /**
   * Client IP address (proxy headers first, then the socket)
   */
  get ip(): string {
    return (
      this.header('X-Forwarded-For')?.split(',')[0]?.trim() ||
      this.header('X-Real-IP') ||
      this._context.connection.remoteAddress ||
      '127.0.0.1'
    );
  }

  get userAgent(): string {
    return this.header('User-Agent') ?? '';
  }

  /**
   * Read the request data once: the query string for GET-like methods, the
   * decoded body for POST/PUT/PATCH/DELETE.
   */
  async parse(logger: Logger = getLogger()): Promise<this> {
    if (this._parsed) return this;
    this._parsed = true;

    if (!BODY_METHODS.has(this.method)) {
      this._data = Object.fromEntries(this._url.searchParams);
      return this;
    }

    switch (this.mediaType) {
      case 'application/json':
        this._data = decodeJson(await this.text(), logger);
        break;

      case 'application/x-www-form-urlencoded':
        this._data = Object.fromEntries(new URLSearchParams(await this.text()));
        break;

      case 'multipart/form-data':
        this.collectFormData(await this.formData());
        break;

      default: {
        const raw = await this.text();
        this._data = isJsonString(raw)
          ? decodeJson(raw, logger)
          : Object.fromEntries(new URLSearchParams(raw));
      }
    }

    return this;
  }

  /**
   * Whether parse() has run
   */
  get parsed(): boolean {
    return this._parsed;
  }

  /**
   * All parsed request data
   */
  all(): RequestData {
    return { ...this._data };
  }

  /**
   * A single input value
   */
  input(key: string, defaultValue: unknown = null): unknown {
    return this._data[key] ?? defaultValue;
  }

  /**
   * Key is present and not null
   */
  has(key: string): boolean {
    return this._data[key] !== undefined && this._data[key] !== null;
  }

  hasAll(keys: string[]): boolean {
    return keys.every((key) => this.has(key));
  }

  hasAny(keys: string[]): boolean {
    return keys.some((key) => this.has(key));
  }

  /**
   * Only the given keys that are present
   */
  only(keys: string[]): RequestData {
    const result: RequestData = {};
    for (const key of keys) {
      if (this.has(key)) {
        result[key] = this._data[key];
      }
    }
    return result;
  }

  /**
   * Everything except the given keys
   */
  except(keys: string[]): RequestData {
    const result = this.all();
    for (const key of keys) {
      delete result[key];
    }
    return result;
  }

  /**
   * Uploaded file by field name
   */
  file(key: string): File | null {
    return this._files.get(key) ?? null;
  }

  get files(): Map<string, File> {
    return new Map(this._files);
  }

  hasFile(key?: string): boolean {
    return key === undefined ? this._files.size > 0 : this._files.has(key);
  }

  isMethod(method: string): boolean {
    return this.method === method.toUpperCase();
  }

  /**
   * Body was sent as JSON
   */
  get isJson(): boolean {
    return this.mediaType === 'application/json';
  }

  /**
   * Path lives under /api/
   */
  get isApi(): boolean {
    return this.path.startsWith('/api/');
  }

  get expectsJson(): boolean {
    return this.isJson || this.isApi;
  }

  /**
   * Token from an `Authorization: Bearer ...` header
   */
  bearerToken(): string | null {
    const header = this.header('Authorization');
    if (header && header.startsWith('Bearer ')) {
      return header.slice(7);
    }
    return null;
  }

  /**
   * Raw request body as text (read once, then cached)
   */
  async text(): Promise<string> {
    if (this._text === null) {
      this._text = await this._request.text();
    }
    return this._text;
  }

  /**
   * Request body decoded as JSON
   */
  async json(): Promise<unknown> {
    return JSON.parse(await this.text());
  }

  /**
   * Request body as FormData (read once, then cached)
   */
  async formData(): Promise<FormData> {
    if (this._formData === null) {
      this._formData = await this._request.formData();
    }
    return this._formData;
  }

  /**
   * Get cookies from the request
   */
  get cookies(): Map<string, string> {
    const cookieHeader = this.header('Cookie') ?? '';
    const cookies = new Map<string, string>();

    for (const cookie of cookieHeader.split(';')) {
      const [name, ...rest] = cookie.split('=');
      if (name) {
        cookies.set(name.trim(), rest.join('=').trim());
      }
    }

    return cookies;
  }

  cookie(name: string): string | undefined {
    return this.cookies.get(name);
  }

  /**
   * Set route parameters (used by router)
   */
  setParams(params: Record<string, string>): void {
    this._context.params = params;
  }

  /**
   * Clone the request with optional context overrides
   */
  clone(overrides?: Partial<RequestContext>): BrambleRequest {
    return new BrambleRequest(this._request.clone(), {
      ...this._context,
      ...overrides,
    });
  }

  private collectFormData(form: FormData): void {
    const data: RequestData = {};
    for (const [key, value] of form.entries()) {
      if (typeof value === 'string') {
        data[key] = value;
      } else {
        this._files.set(key, value);
      }
    }
    this._data = data;
  }
}

/**
 * Looks like a JSON object or array
 */
export function isJsonString(value: string): boolean {
  const trimmed = value.trim();
  if (trimmed === '') return false;
  return (
    (trimmed.startsWith('{') && trimmed.endsWith('}')) ||
    (trimmed.startsWith('[') && trimmed.endsWith(']'))
  );
}

/**
 * Decode a JSON body into request data. Bodies that are not an object or
 * array decode to an empty record.
 */
function decodeJson(raw: string, logger: Logger): RequestData {
  if (raw.trim() === '') return {};

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    logger.warn('Malformed JSON request body', {
      reason: error instanceof Error ? error.message : String(error),
    });
    return {};
  }

  if (Array.isArray(decoded)) {
    return Object.fromEntries(decoded.entries());
  }
  if (typeof decoded === 'object' && decoded !== null) {
    return { ...decoded };
  }

  logger.warn('JSON request body is not an object or array', { type: typeof decoded });
  return {};
}
