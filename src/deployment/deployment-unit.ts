/**
 * Deployment descriptors handed to an infrastructure backend
 */

import type { AppName } from '../domain/types/app-name';
import type { ServiceConfig } from '../domain/types/service';
import { DATE_ANNOTATION, IMAGE_HASH_ANNOTATION } from '../domain/labels';
import { TraefikIngressRoute } from '../infrastructure/traefik/ingress-route';

/**
 * Decides whether a redeploy recreates the service's pods
 */
export type DeploymentStrategy =
  /** Recreate only when the image digest differs from the previous deployment */
  | { type: 'redeploy-on-image-update'; imageId: string }
  | { type: 'redeploy-never' }
  | { type: 'redeploy-always' };

export const redeployOnImageUpdate = (imageId: string): DeploymentStrategy => ({
  type: 'redeploy-on-image-update',
  imageId,
});

export const redeployNever = (): DeploymentStrategy => ({ type: 'redeploy-never' });

export const redeployAlways = (): DeploymentStrategy => ({ type: 'redeploy-always' });

/**
 * Pod template annotations that make the orchestrator recreate pods according to `strategy`.
 * `redeploy-always` stamps the current time so every deployment changes the template.
 */
export function podTemplateAnnotations(strategy: DeploymentStrategy): Record<string, string> {
  switch (strategy.type) {
    case 'redeploy-on-image-update':
      return { [IMAGE_HASH_ANNOTATION]: strategy.imageId };
    case 'redeploy-never':
      return {};
    case 'redeploy-always':
      return { [DATE_ANNOTATION]: new Date().toISOString() };
  }
}

/**
 * A service ready to be deployed
 */
export interface DeployableService {
  config: ServiceConfig;
  strategy: DeploymentStrategy;
  ingressRoute: TraefikIngressRoute;
  /** Paths that are backed by persistent storage */
  declaredVolumes: string[];
}

export interface DeployableServiceOptions {
  strategy?: DeploymentStrategy;
  ingressRoute?: TraefikIngressRoute;
  declaredVolumes?: string[];
}

/**
 * Builds a deployable service; without an explicit route the service is exposed under
 * `/{app}/{service}/`
 */
export function createDeployableService(
  appName: AppName,
  config: ServiceConfig,
  options: DeployableServiceOptions = {},
): DeployableService {
  return {
    config,
    strategy: options.strategy ?? redeployAlways(),
    ingressRoute:
      options.ingressRoute ?? TraefikIngressRoute.withDefaults(appName, config.serviceName),
    declaredVolumes: options.declaredVolumes ?? [],
  };
}

export interface RegistryCredentials {
  username: string;
  password: string;
}

/**
 * All services of one application deployed in a single pass
 */
export interface DeploymentUnit {
  appName: AppName;
  services: DeployableService[];
  /** Registry host → credentials used to pull the services' images */
  imagePullCredentials?: Record<string, RegistryCredentials>;
}

export const hasImagePullCredentials = (unit: DeploymentUnit): boolean =>
  unit.imagePullCredentials !== undefined && Object.keys(unit.imagePullCredentials).length > 0;
