/**
 * Base Controller
 *
 * Provides common functionality for request handling. The router sets the
 * request context before each action is called.
 */

import { HttpError, ValidationError } from '../http/errors.ts';
import type { BrambleRequest } from '../http/request.ts';
import type { BrambleResponse } from '../http/response.ts';
import type { RequestData } from '../http/types.ts';
import type { UrlGenerator } from '../router/router.ts';

export interface ControllerContext {
  request: BrambleRequest;
  response: BrambleResponse;
  params: Record<string, string>;
  query: URLSearchParams;
  state: Map<string, unknown>;
}

export interface FieldRules {
  type?: 'string' | 'number' | 'boolean' | 'object' | 'array';
  required?: boolean;
  /** Minimum value for numbers, minimum length for strings */
  min?: number;
  /** Maximum value for numbers, maximum length for strings */
  max?: number;
  pattern?: RegExp;
}

export type ValidationSchema = Record<string, FieldRules>;

/**
 * Base controller class
 */
export abstract class Controller {
  protected request!: BrambleRequest;
  protected response!: BrambleResponse;
  protected urls!: UrlGenerator;

  /**
   * Set the request/response context
   */
  setContext(req: BrambleRequest, res: BrambleResponse, urls: UrlGenerator): this {
    this.request = req;
    this.response = res;
    this.urls = urls;
    return this;
  }

  get context(): ControllerContext {
    return {
      request: this.request,
      response: this.response,
      params: this.request.params,
      query: this.request.query,
      state: this.request.state,
    };
  }

  /**
   * Get route parameters
   */
  get params(): Record<string, string> {
    return this.request.params;
  }

  get query(): URLSearchParams {
    return this.request.query;
  }

  queryParam(name: string, defaultValue?: string): string | undefined {
    return this.request.query.get(name) ?? defaultValue;
  }

  /**
   * Get a required route parameter (400 if missing)
   */
  requireParam(name: string): string {
    const value = this.params[name];
    if (!value) {
      throw new HttpError(400, `Required parameter '${name}' is missing`);
    }
    return value;
  }

  // Input

  all(): RequestData {
    return this.request.all();
  }

  input(key: string, defaultValue: unknown = null): unknown {
    return this.request.input(key, defaultValue);
  }

  has(key: string): boolean {
    return this.request.has(key);
  }

  only(keys: string[]): RequestData {
    return this.request.only(keys);
  }

  except(keys: string[]): RequestData {
    return this.request.except(keys);
  }

  file(key: string): File | null {
    return this.request.file(key);
  }

  isJson(): boolean {
    return this.request.isJson;
  }

  isApi(): boolean {
    return this.request.isApi;
  }

  method(): string {
    return this.request.method;
  }

  ip(): string {
    return this.request.ip;
  }

  // Responses

  /**
   * Send a JSON envelope
   */
  json(data: Record<string, unknown> = {}, status = 200): Response {
    return this.response.envelope(data, status);
  }

  success(message: string, data: unknown = {}, code = 200): Response {
    return this.response.success(message, data, code);
  }

  error(message: string, code = 400, errors?: unknown): Response {
    return this.response.error(message, code, errors);
  }

  validationError(errors: unknown, message = 'Validation failed'): Response {
    return this.response.validationError(errors, message);
  }

  created(data: unknown = {}, message = 'Resource created successfully'): Response {
    return this.response.created(data, message);
  }

  notFound(message = 'Resource not found'): Response {
    return this.response.error(message, 404);
  }

  unauthorized(message = 'Unauthorized'): Response {
    return this.response.error(message, 401);
  }

  forbidden(message = 'Forbidden'): Response {
    return this.response.error(message, 403);
  }

  /**
   * Send a file as an attachment
   */
  async download(path: string, name?: string, headers: Record<string, string> = {}): Promise<Response> {
    return await this.response.download(path, name, headers);
  }

  html(content: string, status = 200): Response {
    return this.response.status(status).html(content);
  }

  text(content: string, status = 200): Response {
    return this.response.status(status).text(content);
  }

  redirect(url: string, status: 301 | 302 | 303 | 307 | 308 = 302): Response {
    return this.response.redirect(url, status);
  }

  /**
   * Redirect to a named route
   */
  redirectToRoute(name: string, params: Record<string, string | number> = {}): Response {
    return this.redirect(this.urls.url(name, params));
  }

  /**
   * Redirect to the Referer, or the fallback when there is none
   */
  redirectBack(fallback = '/'): Response {
    return this.redirect(this.request.header('Referer') ?? fallback);
  }

  /**
   * Validate request data against a schema.
   *
   * @throws ValidationError with messages keyed by field
   */
  validate(schema: ValidationSchema, data: RequestData = this.all()): RequestData {
    const errors = validateData(data, schema);
    if (Object.keys(errors).length > 0) {
      throw new ValidationError(errors);
    }
    return data;
  }
}

function typeOf(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

export function validateData(data: RequestData, schema: ValidationSchema): Record<string, string[]> {
  const errors: Record<string, string[]> = {};

  for (const [field, rules] of Object.entries(schema)) {
    const value = data[field];
    const messages: string[] = [];

    if (value === undefined || value === null || value === '') {
      if (rules.required) {
        errors[field] = [`${field} is required`];
      }
      continue;
    }

    if (rules.type && typeOf(value) !== rules.type) {
      messages.push(`${field} must be a ${rules.type}`);
    }

    if (typeof value === 'number') {
      if (rules.min !== undefined && value < rules.min) {
        messages.push(`${field} must be at least ${rules.min}`);
      }
      if (rules.max !== undefined && value > rules.max) {
        messages.push(`${field} must be at most ${rules.max}`);
      }
    }

    if (typeof value === 'string') {
      if (rules.min !== undefined && value.length < rules.min) {
        messages.push(`${field} must be at least ${rules.min} characters`);
      }
      if (rules.max !== undefined && value.length > rules.max) {
        messages.push(`${field} must be at most ${rules.max} characters`);
      }
      if (rules.pattern && !rules.pattern.test(value)) {
        messages.push(`${field} format is invalid`);
      }
    }

    if (messages.length > 0) {
      errors[field] = messages;
    }
  }

  return errors;
}
