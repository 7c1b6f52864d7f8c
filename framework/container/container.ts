/**
 * Dependency Injection Container
 *
 * Builds classes from their declared constructor dependencies. Dependencies are
 * declared explicitly, either with `container.register(Class, [deps])` or a
 * static `inject` array on the class:
 *
 * ```ts
 * class UserController extends Controller {
 *   static inject = [UserRepository, value(20)];
 *   constructor(private users: UserRepository, private pageSize: number) { super(); }
 * }
 * ```
 *
 * Resolution order for a token: cached instance, factory, binding (followed
 * recursively), then construction. Cycles are reported with their full path.
 */

import {
  CircularDependencyError,
  ContainerError,
  DependencyResolutionError,
  UnboundTokenError,
  UnresolvableParameterError,
} from './errors.ts';
import {
  InjectionToken,
  isDependency,
  isValueDependency,
  tokenName,
  type AbstractConstructor,
  type Constructor,
  type Dependency,
  type Token,
} from './token.ts';

export type Factory<T> = (container: Container) => T;

export class Container {
  private bindings = new Map<Token, Token>();
  private factories = new Map<Token, Factory<unknown>>();
  private singletons = new Set<Token>();
  private instances = new Map<Token, unknown>();
  private dependencies = new Map<Token, readonly Dependency[]>();
  private resolving: Token[] = [];

  /**
   * Bind an abstract token to a concrete class or another token
   */
  bind<T>(abstract: Token<T>, concrete: Token<T>): this {
    this.bindings.set(abstract, concrete);
    return this;
  }

  /**
   * Register a factory function for a token
   */
  factory<T>(abstract: Token<T>, factory: Factory<T>): this {
    this.factories.set(abstract, factory);
    return this;
  }

  /**
   * Like bind(), but the first resolved instance is reused
   */
  singleton<T>(abstract: Token<T>, concrete: Token<T> = abstract): this {
    if (concrete !== abstract) {
      this.bind(abstract, concrete);
    }
    this.singletons.add(abstract);
    this.instances.delete(abstract);
    return this;
  }

  /**
   * Store a prebuilt value for a token
   */
  instance<T>(token: Token<T>, instance: T): this {
    this.instances.set(token, instance);
    return this;
  }

  /**
   * Declare the constructor dependencies of a class
   */
  register<T>(ctor: Constructor<T> | AbstractConstructor<T>, deps: readonly Dependency[]): this {
    this.dependencies.set(ctor, deps);
    return this;
  }

  /**
   * Whether the token can be resolved without an UnboundTokenError
   */
  has(token: Token): boolean {
    return (
      this.instances.has(token) ||
      this.factories.has(token) ||
      this.bindings.has(token) ||
      typeof token === 'function'
    );
  }

  /**
   * Resolve a token to an instance
   */
  resolve<T>(token: Token<T>): T {
    if (this.instances.has(token)) {
      return this.instances.get(token) as T;
    }

    if (this.resolving.includes(token)) {
      throw new CircularDependencyError([...this.resolving, token].map(tokenName));
    }

    this.resolving.push(token);
    try {
      const instance = this.build(token);
      if (this.singletons.has(token)) {
        this.instances.set(token, instance);
      }
      return instance as T;
    } finally {
      this.resolving.pop();
    }
  }

  private build(token: Token): unknown {
    const factory = this.factories.get(token);
    if (factory) {
      return factory(this);
    }

    const concrete = this.bindings.get(token);
    if (concrete !== undefined) {
      return this.resolve(concrete);
    }

    if (typeof token === 'string' || token instanceof InjectionToken) {
      throw new UnboundTokenError(tokenName(token));
    }

    return this.construct(token);
  }

  private construct(ctor: Constructor | AbstractConstructor): unknown {
    const deps = this.dependenciesOf(ctor);

    // Function.length stops at the first parameter with a default value.
    if (deps.length < ctor.length) {
      throw new UnresolvableParameterError(tokenName(ctor), ctor.length, deps.length);
    }

    const args = deps.map((dep) => {
      if (isValueDependency(dep)) {
        return dep.value;
      }
      try {
        return this.resolve(dep);
      } catch (error) {
        if (error instanceof CircularDependencyError) throw error;
        throw new DependencyResolutionError(tokenName(dep), tokenName(ctor), error);
      }
    });

    return Reflect.construct(ctor, args);
  }

  private dependenciesOf(ctor: Constructor | AbstractConstructor): readonly Dependency[] {
    const registered = this.dependencies.get(ctor);
    if (registered) {
      return registered;
    }

    const declared: unknown = Reflect.get(ctor, 'inject');
    if (declared === undefined) {
      return [];
    }
    if (!Array.isArray(declared) || !declared.every(isDependency)) {
      throw new ContainerError(
        `${tokenName(ctor)}.inject must be an array of tokens or value() entries`
      );
    }
    return declared;
  }
}
