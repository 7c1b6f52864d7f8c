/**
 * Container Errors
 */

export class ContainerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ContainerError';
  }
}

/**
 * An interface token or string name with nothing bound to it
 */
export class UnboundTokenError extends ContainerError {
  constructor(readonly token: string) {
    super(
      `Cannot instantiate ${token}. ` +
        `Register a binding with container.bind('${token}', ConcreteClass) or a factory`
    );
    this.name = 'UnboundTokenError';
  }
}

/**
 * A class declares fewer dependencies than it has required constructor parameters
 */
export class UnresolvableParameterError extends ContainerError {
  constructor(
    readonly className: string,
    readonly required: number,
    readonly declared: number
  ) {
    super(
      `Cannot resolve constructor parameters of ${className}: ` +
        `${required} required, ${declared} declared. ` +
        `List them in a static inject array or container.register(), ` +
        `or give the remaining parameters default values`
    );
    this.name = 'UnresolvableParameterError';
  }
}

/**
 * Resolution of a nested dependency failed
 */
export class DependencyResolutionError extends ContainerError {
  constructor(
    readonly dependency: string,
    readonly dependent: string,
    cause: unknown
  ) {
    super(
      `Cannot resolve dependency ${dependency} for ${dependent}: ` +
        (cause instanceof Error ? cause.message : String(cause)),
      { cause }
    );
    this.name = 'DependencyResolutionError';
  }
}

/**
 * A token depends on itself, directly or through other tokens
 */
export class CircularDependencyError extends ContainerError {
  constructor(readonly path: string[]) {
    super(`Circular dependency detected: ${path.join(' -> ')}`);
    this.name = 'CircularDependencyError';
  }
}
