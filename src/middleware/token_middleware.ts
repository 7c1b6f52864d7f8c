/**
 * Bearer token check against `auth.token`
 */

import { Config, type BrambleRequest, type BrambleResponse, type MiddlewareHandler } from '../../framework/mod.ts';

export default class TokenMiddleware implements MiddlewareHandler {
  static inject = [Config];

  constructor(private config: Config) {}

  handle(req: BrambleRequest, res: BrambleResponse): boolean | Response {
    const expected = this.config.get<string | undefined>('auth.token');
    if (!expected) {
      return true;
    }
    if (req.bearerToken() !== expected) {
      return res.status(401).envelope({ message: 'Invalid or missing token' });
    }
    return true;
  }
}
