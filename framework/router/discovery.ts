/**
 * Route and Middleware Discovery
 *
 * Loads route files and middleware classes from directories. A route file's
 * default export is a function that registers routes on the router it is
 * given; a middleware file's default export is the middleware itself,
 * registered under a name derived from the file name.
 */

import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { MiddlewareDefinition, MiddlewareRegistry } from '../middleware/registry.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import type { Router } from './router.ts';

export type RouteRegistrar = (router: Router) => void | Promise<void>;

const MODULE_EXTENSIONS = new Set(['.ts', '.mts', '.js', '.mjs']);

const MIDDLEWARE_FILE = /(_middleware|Middleware)\.(ts|mts|js|mjs)$/;

export class DiscoveryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DiscoveryError';
  }
}

/**
 * Import every module in the given directories and let it register routes.
 * Files load in alphabetical order; missing directories are skipped.
 *
 * @returns the files that were loaded
 */
export async function discoverRoutes(
  router: Router,
  directories: string[],
  logger: Logger = getLogger()
): Promise<string[]> {
  const loaded: string[] = [];

  for (const directory of directories) {
    for (const file of await listModules(directory, logger)) {
      const register = await importDefault(file);
      if (!isRouteRegistrar(register)) {
        throw new DiscoveryError(`${file} must default-export a function that registers routes`);
      }
      await register(router);
      loaded.push(file);
    }
  }

  logger.debug('Routes discovered', { files: loaded.length, routes: router.getRoutes().length });
  return loaded;
}

/**
 * Register the default export of every `*_middleware` / `*Middleware` file
 *
 * @returns the registered names
 */
export async function discoverMiddleware(
  registry: MiddlewareRegistry,
  directories: string[],
  logger: Logger = getLogger()
): Promise<string[]> {
  const names: string[] = [];

  for (const directory of directories) {
    const files = (await listModules(directory, logger)).filter((file) => MIDDLEWARE_FILE.test(file));

    for (const file of files) {
      const definition = await importDefault(file);
      if (!isMiddlewareDefinition(definition)) {
        throw new DiscoveryError(`${file} must default-export a middleware function or class`);
      }
      const name = deriveMiddlewareName(basename(file));
      registry.register(name, definition);
      names.push(name);
    }
  }

  logger.debug('Middleware discovered', { names });
  return names;
}

/**
 * Middleware name for a file or class name:
 * `AuthMiddleware` → `auth`, `CustomAuthMiddleware` → `custom-auth`,
 * `custom_auth_middleware.ts` → `custom-auth`. Every capital after the
 * first starts a word, so `APIKeyMiddleware` → `a-p-i-key`.
 */
export function deriveMiddlewareName(fileName: string): string {
  const stem = fileName.replace(/\.[^.]+$/, '').replace(/[-_]?middleware$/i, '');
  return stem
    .replace(/(?<!^)[A-Z]/g, '-$&')
    .replace(/[-_]+/g, '-')
    .toLowerCase();
}

/**
 * `<root>/<feature>/<sub>` for every feature directory that has one
 */
export async function featureDirectories(root: string, sub: string): Promise<string[]> {
  const entries = await readDirectory(resolve(root));
  const directories: string[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const candidate = join(resolve(root), entry.name, sub);
    if (await isDirectory(candidate)) {
      directories.push(candidate);
    }
  }

  return directories;
}

async function listModules(directory: string, logger: Logger): Promise<string[]> {
  const absolute = resolve(directory);
  if (!(await isDirectory(absolute))) {
    logger.debug('Discovery directory not found, skipping', { directory: absolute });
    return [];
  }

  return (await readDirectory(absolute))
    .filter((entry) => entry.isFile() && isModuleFile(entry.name))
    .map((entry) => join(absolute, entry.name));
}

function isModuleFile(name: string): boolean {
  return MODULE_EXTENSIONS.has(extname(name)) && !name.endsWith('.d.ts');
}

/**
 * Directory entries sorted by name; empty when the directory does not exist
 */
async function readDirectory(directory: string): Promise<Dirent[]> {
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    if (isMissingPath(error)) return [];
    throw error;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isMissingPath(error)) return false;
    throw error;
  }
}

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

async function importDefault(file: string): Promise<unknown> {
  const mod: unknown = await import(pathToFileURL(file).href);
  return typeof mod === 'object' && mod !== null ? Reflect.get(mod, 'default') : undefined;
}

function isRouteRegistrar(value: unknown): value is RouteRegistrar {
  return typeof value === 'function';
}

function isMiddlewareDefinition(value: unknown): value is MiddlewareDefinition {
  return typeof value === 'function';
}
