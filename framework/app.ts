/**
 * Application Class
 *
 * The main entry point for building Bramble applications.
 * Owns the configuration, logger, container, router and global middleware,
 * and turns Fetch requests into responses.
 */

import { SpanKind } from '@opentelemetry/api';
import { Config, loadConfig, type ConfigOptions } from './config/config.ts';
import { Container, type Factory } from './container/container.ts';
import type { AbstractConstructor, Constructor, Dependency, Token } from './container/token.ts';
import { renderError } from './http/error_pages.ts';
import { BrambleRequest } from './http/request.ts';
import { BrambleResponse } from './http/response.ts';
import { Server, type ServerAddress } from './http/server.ts';
import type { ConnectionInfo, HttpMethod, Middleware } from './http/types.ts';
import { MiddlewarePipeline } from './middleware/pipeline.ts';
import type { MiddlewareDefinition, RouteMiddleware } from './middleware/registry.ts';
import { discoverMiddleware, discoverRoutes, featureDirectories } from './router/discovery.ts';
import type { RouteGroup } from './router/group.ts';
import { Router, type RouteHandler, type RouteMethod, type RouteOptions } from './router/router.ts';
import { Lifecycle } from './runtime/lifecycle.ts';
import { getLogger, isLogLevel, Logger } from './telemetry/logger.ts';
import { recordSpanException, withSpan } from './telemetry/tracing.ts';

export interface ApplicationOptions {
  /** Options applied over whatever init() loads */
  config?: ConfigOptions;
  /** Config file read by init() when it is called without one */
  configPath?: string;
  logger?: Logger;
  container?: Container;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * Main Application class
 */
export class Application {
  private appOptions: ApplicationOptions;
  private config: Config;
  private logger: Logger;
  private container: Container;
  private router: Router;
  private pipeline: MiddlewarePipeline;
  private lifecycle: Lifecycle;
  private server: Server | null = null;
  private initialized = false;

  constructor(options: ApplicationOptions = {}) {
    this.appOptions = options;
    this.config = new Config(options.config);
    this.logger = options.logger ?? getLogger();
    this.container = options.container ?? new Container();
    this.router = new Router({
      container: this.container,
      logger: this.logger.child({ component: 'router' }),
    });
    this.pipeline = new MiddlewarePipeline();
    this.lifecycle = new Lifecycle({ logger: this.logger });

    this.container
      .instance(Config, this.config)
      .instance(Logger, this.logger)
      .instance(Router, this.router)
      .instance(Container, this.container)
      .instance(Application, this);
  }

  /**
   * Load configuration, then discover middleware and routes
   */
  async init(configPath?: string): Promise<this> {
    if (this.initialized) return this;

    const config = (await loadConfig(configPath ?? this.appOptions.configPath)).merge(this.appOptions.config ?? {});
    this.config = config;
    this.container.instance(Config, config);

    const logLevel = config.get<unknown>('logLevel');
    if (isLogLevel(logLevel)) {
      this.logger.setLevel(logLevel);
    }

    await this.discover();

    this.initialized = true;
    this.logger.info('Application initialized', {
      env: config.get<string>('env'),
      routes: this.router.getRoutes().length,
    });

    return this;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  private async discover(): Promise<void> {
    const routeDirs = stringList(this.config.get<unknown>('routing.routes'));
    const middlewareDirs = stringList(this.config.get<unknown>('routing.middleware'));

    const features = this.config.get<unknown>('routing.features');
    if (typeof features === 'string') {
      middlewareDirs.push(...(await featureDirectories(features, 'middleware')));
      routeDirs.push(...(await featureDirectories(features, 'routes')));
    }

    await discoverMiddleware(this.router.getMiddlewareRegistry(), middlewareDirs, this.logger);
    await discoverRoutes(this.router, routeDirs, this.logger);
  }

  // Routes

  get<T>(path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    this.router.get(path, handler, options);
    return this;
  }

  post<T>(path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    this.router.post(path, handler, options);
    return this;
  }

  put<T>(path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    this.router.put(path, handler, options);
    return this;
  }

  patch<T>(path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    this.router.patch(path, handler, options);
    return this;
  }

  delete<T>(path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    this.router.delete(path, handler, options);
    return this;
  }

  options<T>(path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    this.router.options(path, handler, options);
    return this;
  }

  all<T>(path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    this.router.all(path, handler, options);
    return this;
  }

  addRoute<T>(method: RouteMethod | HttpMethod[], path: string, handler: RouteHandler<T>, options?: RouteOptions): this {
    this.router.addRoute(method, path, handler, options);
    return this;
  }

  group(prefix: string, callback: (group: RouteGroup) => void, options?: { middleware?: RouteMiddleware[] }): this {
    this.router.group(prefix, callback, options);
    return this;
  }

  /**
   * Name the most recently registered route
   */
  name(name: string): this {
    this.router.name(name);
    return this;
  }

  url(name: string, params?: Record<string, string | number>, query?: Record<string, string | string[]>): string {
    return this.router.url(name, params, query);
  }

  // Middleware

  /**
   * Add global middleware around every request
   */
  use(middleware: Middleware): this {
    this.pipeline.use(middleware);
    return this;
  }

  /**
   * Register named route middleware
   */
  middleware(name: string, definition: MiddlewareDefinition): this {
    this.router.middleware(name, definition);
    return this;
  }

  controller(ctor: Constructor, name?: string): this {
    this.router.controller(ctor, name);
    return this;
  }

  // Container

  bind<T>(abstract: Token<T>, concrete: Token<T>): this {
    this.container.bind(abstract, concrete);
    return this;
  }

  singleton<T>(abstract: Token<T>, concrete?: Token<T>): this {
    this.container.singleton(abstract, concrete);
    return this;
  }

  factory<T>(abstract: Token<T>, factory: Factory<T>): this {
    this.container.factory(abstract, factory);
    return this;
  }

  instance<T>(token: Token<T>, value: T): this {
    this.container.instance(token, value);
    return this;
  }

  register<T>(ctor: Constructor<T> | AbstractConstructor<T>, deps: readonly Dependency[]): this {
    this.container.register(ctor, deps);
    return this;
  }

  resolve<T>(token: Token<T>): T {
    return this.container.resolve(token);
  }

  // Accessors

  getConfig(): Config {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  getRouter(): Router {
    return this.router;
  }

  getContainer(): Container {
    return this.container;
  }

  getPipeline(): MiddlewarePipeline {
    return this.pipeline;
  }

  getLifecycle(): Lifecycle {
    return this.lifecycle;
  }

  // Dispatch

  /**
   * Turn a Fetch request into a response. Errors never escape: they are
   * rendered as JSON or HTML depending on the request.
   */
  async handle(request: Request, connection: ConnectionInfo = {}): Promise<Response> {
    const req = new BrambleRequest(request, { connection });
    const res = new BrambleResponse();

    const requestId = req.header('X-Request-Id') ?? crypto.randomUUID();
    const logger = this.logger.forRequest({
      requestId,
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    req.state.set('requestId', requestId);
    req.state.set('logger', logger);

    return await withSpan(
      req.method,
      async (span) => {
        const fail = async (error: unknown): Promise<Response> => {
          recordSpanException(span, error);
          return await renderError(error, req, {
            debug: this.config.get<boolean>('debug', false),
            pagesPath: this.config.get<string | undefined>('errors.pagesPath'),
            logger,
          });
        };

        try {
          await req.parse(logger);
          // dispatch errors are rendered inside the chain so global middleware sees them
          return await this.pipeline.execute(req, res, async (r, s) => {
            try {
              return await this.router.handle(r, s);
            } catch (error) {
              return await fail(error);
            }
          });
        } catch (error) {
          return await fail(error);
        }
      },
      {
        kind: SpanKind.SERVER,
        attributes: { 'http.request.method': req.method, 'url.path': req.path },
      }
    );
  }

  /**
   * Start the HTTP server. Runs init() first if needed.
   */
  async listen(port?: number, hostname?: string): Promise<ServerAddress> {
    if (!this.initialized) {
      await this.init();
    }

    const server = new Server((request, connection) => this.handle(request, connection), {
      port: port ?? this.config.get<number>('port', 8000),
      hostname: hostname ?? this.config.get<string>('host', '0.0.0.0'),
      logger: this.logger,
    });

    await this.lifecycle.emitStart();
    const address = await server.listen();
    this.server = server;

    this.lifecycle.onShutdown(async () => {
      await this.stop();
    });
    this.lifecycle.attachSignals();
    await this.lifecycle.emitReady();

    this.logger.info(`Server listening on http://${address.hostname}:${address.port}`);
    return address;
  }

  /**
   * Stop the server without running shutdown hooks
   */
  async stop(): Promise<void> {
    if (this.server) {
      await this.server.close();
      this.server = null;
      this.logger.info('Server stopped');
    }
  }

  /**
   * Run the shutdown hooks (which stop the server)
   */
  async shutdown(reason?: string): Promise<void> {
    await this.lifecycle.shutdown(reason);
  }
}

/**
 * Create a new application instance
 */
export function createApp(options?: ApplicationOptions): Application {
  return new Application(options);
}
