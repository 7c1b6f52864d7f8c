/**
 * Configuration Management
 *
 * Loads and manages application configuration from a JSON file and the
 * environment. Environment variables win over file values.
 */

import { readFile } from 'node:fs/promises';
import { Environment } from '../runtime/environment.ts';
import { isLogLevel, type LogLevel } from '../telemetry/logger.ts';

export interface RoutingOptions {
  /** Directories whose modules register routes */
  routes?: string[];
  /** Directories searched for `*_middleware.ts` files */
  middleware?: string[];
  /** Root of feature directories, each with optional `routes/` and `middleware/` */
  features?: string;
}

export interface ConfigOptions {
  port?: number;
  host?: string;
  env?: string;
  debug?: boolean;
  logLevel?: LogLevel;
  url?: string;
  errors?: {
    /** Directory holding `<status>.html` pages */
    pagesPath?: string;
  };
  routing?: RoutingOptions;
  [key: string]: unknown;
}

const DEFAULT_CONFIG: ConfigOptions = {
  port: 8000,
  host: '0.0.0.0',
  env: 'development',
  debug: false,
  url: 'http://localhost:8000',
  errors: {},
  routing: {
    routes: [],
    middleware: [],
  },
};

/**
 * Default file locations, read under the `bramble` key
 */
export const DEFAULT_CONFIG_PATHS = ['./config/app.json', './config.json'];

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration manager
 */
export class Config {
  private config: ConfigOptions;

  constructor(options: ConfigOptions = {}) {
    this.config = mergeConfig(mergeConfig({}, DEFAULT_CONFIG), options);
  }

  /**
   * Get a configuration value by dotted path
   */
  get<T>(key: string, defaultValue?: T): T {
    const value = getNestedValue(this.config, key);
    return (value ?? defaultValue) as T;
  }

  /**
   * Set a configuration value by dotted path
   */
  set(key: string, value: unknown): void {
    setNestedValue(this.config, key, value);
  }

  /**
   * Deep-merge options over the current values
   */
  merge(options: ConfigOptions): this {
    this.config = mergeConfig(this.config, options);
    return this;
  }

  has(key: string): boolean {
    return getNestedValue(this.config, key) !== undefined;
  }

  all(): ConfigOptions {
    return { ...this.config };
  }

  /**
   * Configuration with the section named after `env` merged over it
   */
  forEnv(env: string): ConfigOptions {
    const envConfig = this.config[env];
    if (isRecord(envConfig)) {
      return mergeConfig(this.config, envConfig);
    }
    return this.config;
  }
}

function mergeConfig(base: Record<string, unknown>, override: Record<string, unknown>): ConfigOptions {
  const result: ConfigOptions = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;

    const current = base[key];
    result[key] = isRecord(value) ? mergeConfig(isRecord(current) ? current : {}, value) : value;
  }

  return result;
}

function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const key of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[last] = value;
}

async function readJson(path: string): Promise<unknown | undefined> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw new ConfigError(`Cannot read config file ${path}`, { cause: error });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in config file ${path}`, { cause: error });
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Values taken from `PORT`, `HOST`, `NODE_ENV`, `DEBUG`, `LOG_LEVEL` and `APP_URL`
 */
export function configFromEnvironment(): ConfigOptions {
  const envConfig: ConfigOptions = {};

  const port = Environment.get('PORT');
  if (port !== undefined) {
    const parsed = Number.parseInt(port, 10);
    if (Number.isNaN(parsed)) {
      throw new ConfigError(`PORT must be a number, got '${port}'`);
    }
    envConfig.port = parsed;
  }

  envConfig.host = Environment.get('HOST');
  envConfig.env = Environment.get('NODE_ENV');
  envConfig.url = Environment.get('APP_URL');

  const debug = Environment.get('DEBUG');
  if (debug !== undefined) {
    envConfig.debug = debug === 'true' || debug === '1';
  }

  const logLevel = Environment.get('LOG_LEVEL');
  if (isLogLevel(logLevel)) {
    envConfig.logLevel = logLevel;
  }

  return envConfig;
}

/**
 * Load configuration from a config file and the environment.
 *
 * An explicit path must exist and holds the options at its top level. Without
 * one, the default locations are tried and their `bramble` section is used.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  let fileConfig: ConfigOptions = {};

  if (configPath) {
    const parsed = await readJson(configPath);
    if (parsed === undefined) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
    }
    fileConfig = parsed;
  } else {
    for (const path of DEFAULT_CONFIG_PATHS) {
      const parsed = await readJson(path);
      if (isRecord(parsed) && isRecord(parsed.bramble)) {
        fileConfig = parsed.bramble;
        break;
      }
    }
  }

  const config = new Config(fileConfig);
  for (const [key, value] of Object.entries(configFromEnvironment())) {
    if (value !== undefined) {
      config.set(key, value);
    }
  }

  return config;
}
