/**
 * Logging Middleware
 *
 * Request/response logging for monitoring and debugging.
 */

import type { Middleware } from '../http/types.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';

export interface LoggingOptions {
  logRequest?: boolean;
  logResponse?: boolean;
  logHeaders?: boolean;
  excludePaths?: string[];
}

const DEFAULT_OPTIONS: Required<LoggingOptions> = {
  logRequest: true,
  logResponse: true,
  logHeaders: false,
  excludePaths: ['/health', '/ready', '/favicon.ico'],
};

/**
 * Create logging middleware
 */
export function loggingMiddleware(logger: Logger = getLogger(), options: LoggingOptions = {}): Middleware {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const http = logger.child({ component: 'http' });

  return async (req, _res, next) => {
    if (opts.excludePaths.some((path) => req.path.startsWith(path))) {
      return await next();
    }

    const startTime = performance.now();

    if (opts.logRequest) {
      http.info('Request', {
        method: req.method,
        path: req.path,
        ip: req.ip,
        ...(opts.logHeaders ? { headers: Object.fromEntries(req.headers.entries()) } : {}),
      });
    }

    const response = await next();
    const duration = Math.round((performance.now() - startTime) * 100) / 100;

    if (opts.logResponse) {
      const context = { method: req.method, path: req.path, status: response.status, duration };
      if (response.status >= 500) {
        http.error('Response', undefined, context);
      } else if (response.status >= 400) {
        http.warn('Response', context);
      } else {
        http.info('Response', context);
      }
    }

    return response;
  };
}

