/**
 * Injection Tokens
 *
 * Anything the container can resolve: a class, an abstract class, a typed
 * token standing in for an interface, or a plain string name.
 */

export type Constructor<T = unknown> = new (...args: never[]) => T;

export type AbstractConstructor<T = unknown> = abstract new (...args: never[]) => T;

/**
 * Typed key for values that have no runtime class (interfaces, config objects)
 *
 * ```ts
 * const UserRepository = new InjectionToken<UserRepository>('UserRepository');
 * container.bind(UserRepository, InMemoryUserRepository);
 * ```
 */
export class InjectionToken<T> {
  declare readonly __type?: T;

  constructor(readonly description: string) {}

  toString(): string {
    return `InjectionToken(${this.description})`;
  }
}

export type Token<T = unknown> = Constructor<T> | AbstractConstructor<T> | InjectionToken<T> | string;

/**
 * A literal constructor argument, for scalar parameters
 */
export interface ValueDependency {
  readonly kind: 'value';
  readonly value: unknown;
}

export type Dependency = Token | ValueDependency;

/**
 * Supply a literal argument in a dependency list
 *
 * ```ts
 * container.register(Mailer, [SmtpTransport, value(3)]);
 * ```
 */
export function value(literal: unknown): ValueDependency {
  return { kind: 'value', value: literal };
}

export function isValueDependency(dep: unknown): dep is ValueDependency {
  return typeof dep === 'object' && dep !== null && 'kind' in dep && dep.kind === 'value';
}

export function isConstructor(token: unknown): token is Constructor {
  return typeof token === 'function';
}

export function isDependency(dep: unknown): dep is Dependency {
  return (
    typeof dep === 'string' ||
    typeof dep === 'function' ||
    dep instanceof InjectionToken ||
    isValueDependency(dep)
  );
}

/**
 * Human-readable name for error messages
 */
export function tokenName(token: Token): string {
  if (typeof token === 'string') return token;
  if (token instanceof InjectionToken) return token.description;
  return token.name || '<anonymous class>';
}
