/**
 * Process Lifecycle Management
 *
 * Handles application startup, shutdown, and signal handling.
 * Provides hooks for graceful shutdown of resources.
 */

import { getLogger, type Logger } from '../telemetry/logger.ts';

export type LifecycleHook = () => Promise<void> | void;

export interface LifecycleEvents {
  onStart: LifecycleHook[];
  onReady: LifecycleHook[];
  onShutdown: LifecycleHook[];
  onError: ((error: Error) => void)[];
}

export interface LifecycleOptions {
  /** Milliseconds before a stuck shutdown exits the process (default 30000) */
  shutdownTimeout?: number;
  logger?: Logger;
}

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * Lifecycle manager
 */
export class Lifecycle {
  private events: LifecycleEvents = {
    onStart: [],
    onReady: [],
    onShutdown: [],
    onError: [],
  };

  private abortController = new AbortController();
  private isShuttingDown = false;
  private shutdownTimeout: number;
  private logger: Logger;
  private signalHandlers = new Map<NodeJS.Signals, () => void>();

  constructor(options: LifecycleOptions = {}) {
    this.shutdownTimeout = options.shutdownTimeout ?? 30000;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Aborted when shutdown begins
   */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get shuttingDown(): boolean {
    return this.isShuttingDown;
  }

  onStart(hook: LifecycleHook): void {
    this.events.onStart.push(hook);
  }

  onReady(hook: LifecycleHook): void {
    this.events.onReady.push(hook);
  }

  /**
   * Register a hook to run on graceful shutdown. Hooks run last-registered first.
   */
  onShutdown(hook: LifecycleHook): void {
    this.events.onShutdown.push(hook);
  }

  onError(handler: (error: Error) => void): void {
    this.events.onError.push(handler);
  }

  async emitStart(): Promise<void> {
    for (const hook of this.events.onStart) {
      await hook();
    }
  }

  async emitReady(): Promise<void> {
    for (const hook of this.events.onReady) {
      await hook();
    }
  }

  /**
   * Trigger graceful shutdown
   */
  async shutdown(reason?: string): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    this.logger.info(`Shutting down${reason ? `: ${reason}` : ''}`);
    this.abortController.abort();

    const forceShutdown = setTimeout(() => {
      this.logger.error('Shutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, this.shutdownTimeout);
    forceShutdown.unref();

    try {
      for (const hook of [...this.events.onShutdown].reverse()) {
        try {
          await hook();
        } catch (error) {
          this.logger.error('Error during shutdown', error);
          this.handleError(error instanceof Error ? error : new Error(String(error)));
        }
      }
      this.logger.info('Shutdown complete');
    } finally {
      clearTimeout(forceShutdown);
      this.detachSignals();
    }
  }

  handleError(error: Error): void {
    for (const handler of this.events.onError) {
      handler(error);
    }
  }

  /**
   * Shut down on SIGINT and SIGTERM
   */
  attachSignals(): void {
    for (const signal of SHUTDOWN_SIGNALS) {
      if (this.signalHandlers.has(signal)) continue;

      const handler = () => {
        this.shutdown(`Received ${signal}`).catch((error: unknown) => {
          this.logger.error('Shutdown failed', error);
          process.exitCode = 1;
        });
      };
      this.signalHandlers.set(signal, handler);
      process.on(signal, handler);
    }
  }

  detachSignals(): void {
    for (const [signal, handler] of this.signalHandlers) {
      process.off(signal, handler);
    }
    this.signalHandlers.clear();
  }
}
