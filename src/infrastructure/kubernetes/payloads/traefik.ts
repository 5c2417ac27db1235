/**
 * Traefik IngressRoute and Middleware payloads
 *
 * See https://doc.traefik.io/traefik/routing/providers/kubernetes-crd/
 */

import type { AppName } from '../../../domain/types/app-name';
import { normalizeIfAppName } from '../../../domain/types/app-name';
import { Failure, Success, type Result } from '../../../domain/types/result';
import { TRAEFIK_ENTRY_POINTS_ANNOTATION } from '../../../domain/labels';
import type { DeployableService } from '../../../deployment/deployment-unit';
import { InvariantViolationError, ValidationError } from '../../../errors';
import {
  TraefikIngressRoute,
  middlewareRef,
  type TraefikMiddleware,
  type TraefikRoute,
} from '../../traefik/ingress-route';
import { TraefikRouterRule } from '../../traefik/router-rule';
import { TRAEFIK_API_VERSION, type IngressRoute, type Middleware } from '../crds';
import { ingressRouteName, namespaceName, serviceLabels } from './names';

/**
 * Name under which a middleware is referenced from a route
 */
export function resolveMiddlewareName(middleware: TraefikMiddleware): string {
  switch (middleware.type) {
    case 'ref':
      return middleware.name;
    case 'spec':
      return normalizeIfAppName(middleware.name);
  }
}

/**
 * One IngressRoute per service with a rule entry per route, all pointing at the service's port
 */
export function ingressRoutePayload(appName: AppName, service: DeployableService): IngressRoute {
  const { serviceName, containerType, port } = service.config;
  const { entryPoints, routes } = service.ingressRoute;

  if (routes.length === 0) {
    throw new InvariantViolationError(
      `Service ${serviceName} of ${appName.toString()} has no routes to expose`,
      'ingress-route-has-routes',
      { appName: appName.toString(), serviceName },
    );
  }

  const certResolver = service.ingressRoute.tlsResolver();

  return {
    apiVersion: TRAEFIK_API_VERSION,
    kind: 'IngressRoute',
    metadata: {
      name: ingressRouteName(appName, serviceName),
      namespace: namespaceName(appName),
      labels: serviceLabels(appName, serviceName, containerType),
      annotations: {
        [TRAEFIK_ENTRY_POINTS_ANNOTATION]: entryPoints.length > 0 ? entryPoints.join(',') : 'web',
      },
    },
    spec: {
      ...(entryPoints.length > 0 && { entryPoints: [...entryPoints] }),
      routes: routes.map((route) => ({
        kind: 'Rule',
        match: route.rule.toString(),
        services: [{ kind: 'Service', name: serviceName, port }],
        middlewares: route.middlewares.map((middleware) => ({
          name: resolveMiddlewareName(middleware),
        })),
      })),
      ...(certResolver !== undefined && { tls: { certResolver } }),
    },
  };
}

/**
 * Materializes the inline middlewares of all routes of a service, once per distinct name
 */
export function middlewarePayload(appName: AppName, service: DeployableService): Middleware[] {
  const middlewares = new Map<string, Middleware>();

  for (const route of service.ingressRoute.routes) {
    for (const middleware of route.middlewares) {
      if (middleware.type !== 'spec') {
        continue;
      }
      const name = resolveMiddlewareName(middleware);
      if (middlewares.has(name)) {
        continue;
      }
      middlewares.set(name, {
        apiVersion: TRAEFIK_API_VERSION,
        kind: 'Middleware',
        metadata: { name, namespace: namespaceName(appName) },
        spec: middleware.spec,
      });
    }
  }

  return [...middlewares.values()];
}

/**
 * Converts an IngressRoute read from the cluster back into the routing model. Such objects
 * may have been edited by hand, so problems are reported instead of thrown.
 */
export function ingressRouteFromKubernetes(
  ingressRoute: IngressRoute,
): Result<TraefikIngressRoute, ValidationError> {
  const name = ingressRoute.metadata.name ?? '<unnamed>';
  const specRoutes = ingressRoute.spec.routes ?? [];

  if (specRoutes.length === 0) {
    return Failure(new ValidationError(`IngressRoute ${name} does not declare any route`, 'spec.routes'));
  }

  const tlsResolver = ingressRoute.spec.tls?.certResolver;
  const routes: TraefikRoute[] = [];
  for (const specRoute of specRoutes) {
    const rule = TraefikRouterRule.parse(specRoute.match);
    if (!rule.ok) {
      return Failure(
        new ValidationError(
          `IngressRoute ${name} has an invalid match rule: ${rule.error.message}`,
          'spec.routes.match',
          specRoute.match,
        ),
      );
    }

    routes.push({
      rule: rule.value,
      middlewares: (specRoute.middlewares ?? []).map((middleware) => middlewareRef(middleware.name)),
      ...(tlsResolver !== undefined && { tlsResolver }),
    });
  }

  return Success(new TraefikIngressRoute(ingressRoute.spec.entryPoints ?? [], routes));
}
