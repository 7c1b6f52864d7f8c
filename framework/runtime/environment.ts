/**
 * Environment Detection
 *
 * Reads `process.env`, optionally seeded from a `.env` file. The mode comes
 * from NODE_ENV.
 */

import dotenv from 'dotenv';

export type EnvironmentMode = 'development' | 'production' | 'test';

export interface EnvironmentInfo {
  mode: EnvironmentMode;
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
}

function toMode(value: string | undefined): EnvironmentMode {
  switch (value) {
    case 'production':
    case 'test':
      return value;
    default:
      return 'development';
  }
}

/**
 * Environment detection and information
 */
export class Environment {
  private static _instance: Environment | undefined;
  private _info: EnvironmentInfo;

  private constructor() {
    this._info = detectEnvironment();
  }

  static get instance(): Environment {
    if (!Environment._instance) {
      Environment._instance = new Environment();
    }
    return Environment._instance;
  }

  /**
   * Drop the cached instance so the next access re-reads `process.env`
   */
  static reset(): void {
    Environment._instance = undefined;
  }

  get info(): EnvironmentInfo {
    return this._info;
  }

  /**
   * Load variables from a `.env` file. Variables already set are kept.
   *
   * @returns the names that were read from the file; empty when there is no file
   */
  static loadDotenv(path = '.env'): string[] {
    const result = dotenv.config({ path });
    Environment.reset();
    return Object.keys(result.parsed ?? {});
  }

  /**
   * Get an environment variable with optional default
   */
  static get(key: string, defaultValue?: string): string | undefined {
    return process.env[key] ?? defaultValue;
  }

  /**
   * Get a required environment variable (throws if not set)
   */
  static require(key: string): string {
    const value = process.env[key];
    if (value === undefined) {
      throw new Error(`Required environment variable ${key} is not set`);
    }
    return value;
  }

  static set(key: string, value: string): void {
    process.env[key] = value;
  }

  /**
   * Get all environment variables as an object
   */
  static all(): Record<string, string> {
    const vars: Record<string, string> = {};
    for (const [key, value] of Object.entries(process.env)) {
      if (value !== undefined) {
        vars[key] = value;
      }
    }
    return vars;
  }

  static isDevelopment(): boolean {
    return Environment.instance.info.isDevelopment;
  }

  static isProduction(): boolean {
    return Environment.instance.info.isProduction;
  }

  static isTest(): boolean {
    return Environment.instance.info.isTest;
  }
}

function detectEnvironment(): EnvironmentInfo {
  const mode = toMode(process.env.NODE_ENV);

  return {
    mode,
    isDevelopment: mode === 'development',
    isProduction: mode === 'production',
    isTest: mode === 'test',
  };
}
