/**
 * Layer 5: Service Container
 *
 * Builds controllers, middleware and services from their declared
 * dependencies.
 */

export { Container, type Factory } from './container.ts';
export {
  InjectionToken,
  isConstructor,
  tokenName,
  value,
  type AbstractConstructor,
  type Constructor,
  type Dependency,
  type Token,
  type ValueDependency,
} from './token.ts';
export {
  ContainerError,
  CircularDependencyError,
  DependencyResolutionError,
  UnboundTokenError,
  UnresolvableParameterError,
} from './errors.ts';
