/**
 * Infrastructure Layer - backend abstraction, routing model and the Kubernetes backend
 */

export {
  type Infrastructure,
  type InfrastructureResult,
  getConfigsOfApp,
  getStatusChange,
  baseTraefikIngressRoute,
} from './infrastructure';
export { createInfrastructure } from './factory';
export { AppLocks } from './app-locks';
export {
  TraefikIngressRoute,
  middlewareRef,
  middlewareSpec,
  type TraefikMiddleware,
  type TraefikRoute,
} from './traefik/ingress-route';
export { TraefikRouterRule, type RuleExpression, type MatcherName } from './traefik/router-rule';
export * from './kubernetes';
