/**
 * Backend abstraction
 *
 * Every orchestration backend implements `Infrastructure`. Operations never throw; failures
 * are reported as `Failure(ApplicationError)`. `undefined` values mean "not applicable"
 * (no logs, no such service), never a transient fault.
 */

import type { AppName } from '../domain/types/app-name';
import { Success, type Result } from '../domain/types/result';
import type {
  ContainerConfig,
  Service,
  ServiceConfig,
  ServiceStatus,
} from '../domain/types/service';
import type { DeploymentUnit } from '../deployment/deployment-unit';
import type { ApplicationError } from '../errors';
import type { TraefikIngressRoute } from './traefik/ingress-route';

export type InfrastructureResult<T> = Promise<Result<T, ApplicationError>>;

export interface Infrastructure {
  /** Services of all applications keyed by raw application name, read from the backend */
  getServices: () => InfrastructureResult<Map<string, Service[]>>;

  /**
   * Deploys every service of the unit. Services reach their siblings by service name and a
   * redeploy replaces the previous instance of a service.
   */
  deployServices: (
    statusId: string,
    deploymentUnit: DeploymentUnit,
    containerConfig: ContainerConfig,
  ) => InfrastructureResult<Service[]>;

  /** Services changed by a still running asynchronous deployment */
  getStatusChange?: (statusId: string) => InfrastructureResult<Service[] | undefined>;

  /** Tears the application down and returns exactly the services that were stopped */
  stopServices: (statusId: string, appName: AppName) => InfrastructureResult<Service[]>;

  getLogs: (
    appName: AppName,
    serviceName: string,
    from: Date | undefined,
    limit: number,
  ) => InfrastructureResult<Array<[Date, string]> | undefined>;

  changeStatus: (
    appName: AppName,
    serviceName: string,
    status: ServiceStatus,
  ) => InfrastructureResult<Service | undefined>;

  /** Route through which the deployer itself is reachable, so services can share its host */
  baseTraefikIngressRoute?: () => InfrastructureResult<TraefikIngressRoute | undefined>;
}

/**
 * Configurations of the application's own services; companions are left out
 */
export async function getConfigsOfApp(
  infrastructure: Infrastructure,
  appName: AppName,
): InfrastructureResult<ServiceConfig[]> {
  const services = await infrastructure.getServices();
  if (!services.ok) {
    return services;
  }

  return Success(
    (services.value.get(appName.toString()) ?? [])
      .filter((service) => service.containerType === 'instance' || service.containerType === 'replica')
      .map((service) => service.config),
  );
}

export async function getStatusChange(
  infrastructure: Infrastructure,
  statusId: string,
): InfrastructureResult<Service[] | undefined> {
  if (infrastructure.getStatusChange === undefined) {
    return Success(undefined);
  }
  return infrastructure.getStatusChange(statusId);
}

export async function baseTraefikIngressRoute(
  infrastructure: Infrastructure,
): InfrastructureResult<TraefikIngressRoute | undefined> {
  if (infrastructure.baseTraefikIngressRoute === undefined) {
    return Success(undefined);
  }
  return infrastructure.baseTraefikIngressRoute();
}
