/**
 * Routing Errors
 *
 * Raised for programming mistakes in route tables: unknown names, missing
 * parameters, dangling controller references. They surface as 500s when
 * thrown during dispatch.
 */

export class RoutingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RoutingError';
  }
}

/**
 * No route registered under the given name
 */
export class RouteNotFoundError extends RoutingError {
  constructor(readonly routeName: string) {
    super(`Route '${routeName}' not found`);
    this.name = 'RouteNotFoundError';
  }
}

/**
 * A URL was built without a value for every placeholder
 */
export class MissingRouteParameterError extends RoutingError {
  constructor(
    readonly template: string,
    readonly missing: string[]
  ) {
    super(`Missing parameters for route '${template}': ${missing.join(', ')}`);
    this.name = 'MissingRouteParameterError';
  }
}

export class ControllerNotFoundError extends RoutingError {
  constructor(readonly controller: string) {
    super(`Controller not found: ${controller}. Register it with router.controller()`);
    this.name = 'ControllerNotFoundError';
  }
}

export class ActionNotFoundError extends RoutingError {
  constructor(
    readonly controller: string,
    readonly action: string
  ) {
    super(`Method ${action} not found in ${controller}`);
    this.name = 'ActionNotFoundError';
  }
}

export class InvalidHandlerError extends RoutingError {
  constructor(readonly handler: string) {
    super(`Invalid handler: ${handler}. Expected 'Controller@method'`);
    this.name = 'InvalidHandlerError';
  }
}

export class MiddlewareNotFoundError extends RoutingError {
  constructor(readonly middleware: string) {
    super(`Middleware '${middleware}' not found`);
    this.name = 'MiddlewareNotFoundError';
  }
}

/**
 * A route middleware entry that is not `name` or `name:p1:p2`
 */
export class InvalidMiddlewareSpecError extends RoutingError {
  constructor(readonly spec: string) {
    super(`Invalid middleware spec '${spec}': missing name`);
    this.name = 'InvalidMiddlewareSpecError';
  }
}
