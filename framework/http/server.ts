/**
 * HTTP Server
 *
 * Runs a Fetch-style handler on Node's HTTP server through
 * `@hono/node-server`.
 */

import type { Server as NetServer } from 'node:net';
import { serve } from '@hono/node-server';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import type { ConnectionInfo } from './types.ts';

export type FetchHandler = (request: Request, connection: ConnectionInfo) => Promise<Response>;

export interface ServerOptions {
  port?: number;
  hostname?: string;
  logger?: Logger;
}

export interface ServerAddress {
  port: number;
  hostname: string;
}

/**
 * HTTP server for Bramble applications
 */
export class Server {
  private handler: FetchHandler;
  private port: number;
  private hostname: string;
  private logger: Logger;
  private server: NetServer | null = null;

  constructor(handler: FetchHandler, options: ServerOptions = {}) {
    this.handler = handler;
    this.port = options.port ?? 8000;
    this.hostname = options.hostname ?? '0.0.0.0';
    this.logger = options.logger ?? getLogger();
  }

  get listening(): boolean {
    return this.server !== null;
  }

  /**
   * Start listening; resolves once the port is bound
   */
  async listen(): Promise<ServerAddress> {
    if (this.server) {
      throw new Error('Server is already listening');
    }

    return await new Promise<ServerAddress>((resolve, reject) => {
      const server: NetServer = serve(
        {
          fetch: (request, env) =>
            this.handler(request, { remoteAddress: env.incoming.socket.remoteAddress }),
          port: this.port,
          hostname: this.hostname,
        },
        (info) => {
          this.logger.debug('HTTP server bound', { address: info.address, port: info.port });
          resolve({ port: info.port, hostname: this.hostname });
        }
      );
      server.once('error', reject);
      this.server = server;
    });
  }

  /**
   * Stop accepting connections and wait for open ones to finish
   */
  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error?: Error) => (error ? reject(error) : resolve()));
    });
  }
}
