/**
 * Route Pattern Compiler
 *
 * Path templates use `{name}` or `{name:type}` placeholders. A type is either
 * a registered name (`number`, `slug`, ...) or a digit count, so `{code:6}`
 * matches six alphanumerics. Everything else in the template is literal.
 */

import { escapeRegex } from '../security/sanitize.ts';
import { MissingRouteParameterError } from './errors.ts';

export type PatternParams = Record<string, string>;

export interface CompiledPattern {
  regex: RegExp;
  parameters: string[];
}

/**
 * Placeholder: `{name}` or `{name:type}`
 */
const PLACEHOLDER = /\{([a-zA-Z0-9_]+)(?::([a-zA-Z0-9_]+))?\}/g;

/**
 * Capture group for `{name}` and unknown types
 */
const DEFAULT_SEGMENT = '[a-zA-Z0-9_-]+';

const DEFAULT_PATTERNS: Record<string, string> = {
  id: '[A-Z0-9]{8}',
  uuid: '[a-zA-Z0-9-]{36}',
  string: '[a-zA-Z]+',
  alpha: '[a-zA-Z]+',
  alphanum: '[a-zA-Z0-9]+',
  slug: '[a-zA-Z0-9-_]+',
  number: '[0-9]+',
  year: '[0-9]{4}',
  month: '[0-9]{1,2}',
  day: '[0-9]{1,2}',
  code: '[A-Z0-9]{6}',
  token: '[a-zA-Z0-9]{16}',
  phone: '[0-9-+]+',
  any: '.*',
};

/**
 * Named parameter types available to route templates
 */
export class PatternRegistry {
  private patterns = new Map<string, string>(Object.entries(DEFAULT_PATTERNS));

  /**
   * Add or override a named type. The regex must not contain capture groups.
   */
  add(name: string, regex: string): this {
    this.patterns.set(name, regex);
    return this;
  }

  get(name: string): string | undefined {
    return this.patterns.get(name);
  }

  all(): Record<string, string> {
    return Object.fromEntries(this.patterns);
  }

  /**
   * A new registry with this one's types, overridden by `other`'s
   */
  merge(other: PatternRegistry): PatternRegistry {
    const merged = new PatternRegistry();
    for (const [name, regex] of [...this.patterns, ...other.patterns]) {
      merged.add(name, regex);
    }
    return merged;
  }
}

/**
 * Compile a route template into an anchored regular expression
 */
export function compilePattern(template: string, registry: PatternRegistry): CompiledPattern {
  const parameters: string[] = [];
  let source = '';
  let last = 0;

  for (const match of template.matchAll(PLACEHOLDER)) {
    const [placeholder, name, type] = match;
    const index = match.index ?? 0;

    source += escapeRegex(template.slice(last, index));
    source += `(${segmentFor(type, registry)})`;
    parameters.push(name);
    last = index + placeholder.length;
  }
  source += escapeRegex(template.slice(last));

  return { regex: new RegExp(`^${source}$`), parameters };
}

function segmentFor(type: string | undefined, registry: PatternRegistry): string {
  if (type === undefined) return DEFAULT_SEGMENT;

  const named = registry.get(type);
  if (named !== undefined) return named;

  if (/^[0-9]+$/.test(type)) return `[a-zA-Z0-9]{${type}}`;

  return DEFAULT_SEGMENT;
}

/**
 * Strip trailing slashes; the empty path becomes `/`
 */
export function normalizePath(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  return trimmed === '' ? '/' : trimmed;
}

/**
 * Build a URL from a template and parameters.
 * Parameters without a placeholder are ignored.
 */
export function buildPath(
  template: string,
  params: Record<string, string | number> = {},
  query?: Record<string, string | string[]>
): string {
  const missing: string[] = [];

  let url = template.replace(PLACEHOLDER, (_placeholder, name: string) => {
    const value = params[name];
    if (value === undefined) {
      missing.push(name);
      return '';
    }
    return encodeURIComponent(String(value));
  });

  if (missing.length > 0) {
    throw new MissingRouteParameterError(template, missing);
  }

  if (query && Object.keys(query).length > 0) {
    const searchParams = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (Array.isArray(value)) {
        for (const v of value) {
          searchParams.append(key, v);
        }
      } else {
        searchParams.append(key, value);
      }
    }
    url += '?' + searchParams.toString();
  }

  return url;
}

/**
 * Parameter names in a template, in order
 */
export function parsePathParams(template: string): string[] {
  return Array.from(template.matchAll(PLACEHOLDER), (match) => match[1]);
}
