/**
 * Backend-agnostic model of the Traefik routing attached to a service
 */

import type { AppName } from '../../domain/types/app-name';
import { TraefikRouterRule } from './router-rule';

/**
 * Either a reference to an existing middleware or an inline middleware that is materialized
 * next to the route. `spec` is the middleware's spec object as Traefik expects it.
 */
export type TraefikMiddleware =
  | { type: 'ref'; name: string }
  | { type: 'spec'; name: string; spec: Record<string, unknown> };

export const middlewareRef = (name: string): TraefikMiddleware => ({ type: 'ref', name });

export const middlewareSpec = (name: string, spec: Record<string, unknown>): TraefikMiddleware => ({
  type: 'spec',
  name,
  spec,
});

export interface TraefikRoute {
  rule: TraefikRouterRule;
  middlewares: TraefikMiddleware[];
  tlsResolver?: string;
}

export class TraefikIngressRoute {
  constructor(
    readonly entryPoints: readonly string[],
    readonly routes: readonly TraefikRoute[],
  ) {}

  static empty(): TraefikIngressRoute {
    return new TraefikIngressRoute([], []);
  }

  static withRule(rule: TraefikRouterRule): TraefikIngressRoute {
    return new TraefikIngressRoute([], [{ rule, middlewares: [] }]);
  }

  /**
   * Route under `/{app}/{service}/` that strips the prefix before the request reaches the service
   */
  static withDefaults(appName: AppName, serviceName: string): TraefikIngressRoute {
    const prefix = `/${appName.toString()}/${serviceName}/`;

    return new TraefikIngressRoute(
      ['web'],
      [
        {
          rule: TraefikRouterRule.pathPrefixRule([appName.toString(), serviceName]),
          middlewares: [
            middlewareSpec(`${appName.toString()}-${serviceName}-middleware`, {
              stripPrefix: { prefixes: [prefix] },
            }),
          ],
        },
      ],
    );
  }

  isEmpty(): boolean {
    return this.routes.length === 0;
  }

  /**
   * Restricts every route to the hosts of the base route's first rule so services are served
   * on the same host as the deployer. Entry points and TLS resolver are inherited when missing.
   */
  withBaseRoute(base: TraefikIngressRoute): TraefikIngressRoute {
    const [baseRoute] = base.routes;
    if (!baseRoute) {
      return this;
    }

    const hosts = baseRoute.rule.hosts();
    const hostRule = hosts.length > 0 ? TraefikRouterRule.hostRule(hosts) : undefined;

    return new TraefikIngressRoute(
      this.entryPoints.length > 0 ? this.entryPoints : base.entryPoints,
      this.routes.map((route) => {
        const tlsResolver = route.tlsResolver ?? baseRoute.tlsResolver;
        return {
          rule: hostRule ? hostRule.and(route.rule) : route.rule,
          middlewares: route.middlewares,
          ...(tlsResolver !== undefined && { tlsResolver }),
        };
      }),
    );
  }

  /**
   * TLS resolver of the first route that declares one
   */
  tlsResolver(): string | undefined {
    return this.routes.find((route) => route.tlsResolver !== undefined)?.tlsResolver;
  }
}
