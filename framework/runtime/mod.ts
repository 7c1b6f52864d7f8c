/**
 * Layer 0: Runtime & Execution Environment
 *
 * The bridge between the operating system and application code.
 *
 * This layer defines:
 * - Environment detection (NODE_ENV, .env files)
 * - Process lifecycle (Startup, shutdown, signals)
 */

export { Environment, type EnvironmentInfo, type EnvironmentMode } from './environment.ts';
export { Lifecycle, type LifecycleEvents, type LifecycleHook, type LifecycleOptions } from './lifecycle.ts';
