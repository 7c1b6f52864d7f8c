/**
 * Error Rendering
 *
 * Turns anything thrown during dispatch into a Response. Clients that expect
 * JSON get an envelope; browsers get an HTML page, either a configured
 * `<status>.html` file or the built-in one.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { escapeHtml } from '../security/sanitize.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { HttpError, ValidationError } from './errors.ts';
import type { BrambleRequest } from './request.ts';
import { BrambleResponse, isMissingFile } from './response.ts';

export interface ErrorRenderOptions {
  /** Show messages and stack traces for unexpected errors */
  debug?: boolean;
  /** Directory holding custom `404.html`, `500.html`, ... pages */
  pagesPath?: string;
  logger?: Logger;
}

/**
 * Render an error thrown while handling `req`
 */
export async function renderError(
  error: unknown,
  req: BrambleRequest,
  options: ErrorRenderOptions = {}
): Promise<Response> {
  const res = new BrambleResponse();

  if (error instanceof ValidationError) {
    if (req.expectsJson) {
      return res.validationError(error.errors, error.message);
    }
    return await htmlError(res, error.status, error.message, options.pagesPath);
  }

  if (error instanceof HttpError) {
    if (req.expectsJson) {
      return res.error(error.message, error.status, error.details);
    }
    return await htmlError(res, error.status, error.message, options.pagesPath);
  }

  const err = error instanceof Error ? error : new Error(String(error));
  const logger = options.logger ?? getLogger();
  logger.error(`Router Error: ${err.message}`, err, { method: req.method, path: req.path });

  if (options.debug) {
    if (req.expectsJson) {
      return res.envelope(
        {
          message: err.message,
          data: { error: err.name, trace: (err.stack ?? '').split('\n').slice(1).map((l) => l.trim()) },
        },
        500
      );
    }
    return res.status(500).html(debugPage(err));
  }

  if (req.expectsJson) {
    return res.error('Internal server error', 500);
  }
  return await htmlError(res, 500, 'Internal Server Error', options.pagesPath);
}

async function htmlError(
  res: BrambleResponse,
  status: number,
  message: string,
  pagesPath?: string
): Promise<Response> {
  const custom = pagesPath ? await readPage(pagesPath, status) : null;
  return res.status(status).html(custom ?? builtInPage(status, message));
}

/**
 * Read `<dir>/<status>.html`, or null when there is none
 */
async function readPage(dir: string, status: number): Promise<string | null> {
  try {
    return await readFile(join(dir, `${status}.html`), 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}

const PAGE_STYLE = `
        body { font-family: Arial, sans-serif; text-align: center; padding: 50px; }
        h1 { color: #dc3545; }
        p { color: #6c757d; }
        a { color: #007bff; text-decoration: none; }`;

function builtInPage(status: number, message: string): string {
  const [title, text] =
    status === 404
      ? ['404 - Page Not Found', 'The requested page could not be found.']
      : status >= 500
        ? [`${status} - Internal Server Error`, 'Something went wrong. Please try again later.']
        : [`${status} - ${escapeHtml(message)}`, escapeHtml(message)];

  return `<!DOCTYPE html>
<html>
<head>
    <title>${title}</title>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <style>${PAGE_STYLE}
    </style>
</head>
<body>
    <h1>${title}</h1>
    <p>${text}</p>
    <a href="/">Return to Home</a>
</body>
</html>`;
}

function debugPage(error: Error): string {
  return `<!DOCTYPE html>
<html>
<head><title>Router Error</title><meta charset="utf-8"></head>
<body>
    <h1>Router Error</h1>
    <p><strong>Message:</strong> ${escapeHtml(error.message)}</p>
    <pre>${escapeHtml(error.stack ?? '')}</pre>
</body>
</html>`;
}
