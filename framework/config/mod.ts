/**
 * Layer 6: Configuration & Environment Management
 *
 * Manage settings and environment-specific configuration.
 *
 * Responsibilities:
 * - Separate configuration from code
 * - Enable environment-specific behavior
 * - Configure logging and route discovery
 */

export {
  Config,
  ConfigError,
  DEFAULT_CONFIG_PATHS,
  configFromEnvironment,
  loadConfig,
  type ConfigOptions,
  type RoutingOptions,
} from './config.ts';
