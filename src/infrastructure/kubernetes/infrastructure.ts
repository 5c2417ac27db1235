/**
 * Kubernetes backend
 *
 * Every application lives in its own namespace. Services are deployments plus a Kubernetes
 * service named after them, which gives siblings name resolution; Traefik IngressRoutes make
 * them reachable from outside.
 */

import type { V1PersistentVolumeClaim, V1Pod, V1Secret } from '@kubernetes/client-node';
import type { Logger } from 'pino';
import type { AppName } from '../../domain/types/app-name';
import { Failure, Success, type Result } from '../../domain/types/result';
import type { ContainerConfig, Service, ServiceStatus } from '../../domain/types/service';
import {
  hasImagePullCredentials,
  type DeployableService,
  type DeploymentUnit,
  type RegistryCredentials,
} from '../../deployment/deployment-unit';
import type { KubernetesConfig } from '../../config';
import { normalizeError, type ApplicationError } from '../../errors';
import { createTimer } from '../../lib/logger';
import type { TraefikIngressRoute } from '../traefik/ingress-route';
import { AppLocks } from '../app-locks';
import type { Infrastructure, InfrastructureResult } from '../infrastructure';
import type { KubernetesClient } from './client';
import {
  deploymentName,
  deploymentPayload,
  deploymentReplicasPayload,
  groupFilesByDirectory,
  imagePullSecretPayload,
  ingressRouteFromKubernetes,
  ingressRouteName,
  ingressRoutePayload,
  labelSelectorOf,
  managedLabelSelector,
  middlewarePayload,
  namespaceName,
  namespacePayload,
  persistentVolumeClaimLabels,
  persistentVolumeClaimPayload,
  secretsPayload,
  serviceLabelSelector,
  servicePayload,
} from './payloads';
import { parseTimestampedLog, selectLogLines, sinceSeconds } from './pod-logs';
import { serviceFromDeployment, servicesByApp } from './service-mapper';

const sameSecretData = (
  stored: Readonly<Record<string, string>> | undefined,
  desired: Readonly<Record<string, string>> | undefined,
): boolean => {
  const storedKeys = Object.keys(stored ?? {}).sort();
  const desiredKeys = Object.keys(desired ?? {}).sort();
  return (
    storedKeys.length === desiredKeys.length &&
    storedKeys.every(
      (key, index) => key === desiredKeys[index] && stored?.[key] === desired?.[key],
    )
  );
};

const byName = (a: V1PersistentVolumeClaim, b: V1PersistentVolumeClaim): number =>
  (a.metadata?.name ?? '').localeCompare(b.metadata?.name ?? '');

const createdAt = (pod: V1Pod): number =>
  pod.metadata?.creationTimestamp !== undefined
    ? new Date(pod.metadata.creationTimestamp).getTime()
    : 0;

export class KubernetesInfrastructure implements Infrastructure {
  private readonly logger: Logger;
  private readonly locks = new AppLocks();

  constructor(
    private readonly client: KubernetesClient,
    private readonly config: KubernetesConfig,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'KubernetesInfrastructure' });
  }

  async getServices(): InfrastructureResult<Map<string, Service[]>> {
    const deployments = await this.client.listDeployments(managedLabelSelector());
    if (!deployments.ok) {
      this.logger.error({ error: deployments.error }, 'Failed to list deployments');
      return deployments;
    }

    return Success(servicesByApp(deployments.value));
  }

  async deployServices(
    statusId: string,
    deploymentUnit: DeploymentUnit,
    containerConfig: ContainerConfig,
  ): InfrastructureResult<Service[]> {
    const { appName } = deploymentUnit;
    const timer = createTimer(this.logger, 'deployServices', {
      statusId,
      appName: appName.toString(),
      services: deploymentUnit.services.map((service) => service.config.serviceName),
    });

    const result = await this.locks.withLock<Result<Service[], ApplicationError>>(
      appName.toNamespaceId(),
      async () => {
        try {
          return await this.deploy(deploymentUnit, containerConfig);
        } catch (error) {
          return Failure(normalizeError(error, `Failed to deploy ${appName.toString()}`));
        }
      },
    );

    if (result.ok) {
      timer.end();
    } else {
      timer.error(result.error);
    }
    return result;
  }

  async stopServices(statusId: string, appName: AppName): InfrastructureResult<Service[]> {
    const namespace = namespaceName(appName);
    const log = this.logger.child({ statusId, appName: appName.toString() });

    return this.locks.withLock<Result<Service[], ApplicationError>>(appName.toNamespaceId(), async () => {
      const deployments = await this.client.listDeployments(managedLabelSelector(), namespace);
      if (!deployments.ok) {
        return deployments;
      }
      const services = [...servicesByApp(deployments.value).values()].flat();

      const deleted = await this.client.deleteNamespace(namespace);
      if (!deleted.ok) {
        log.error({ error: deleted.error }, 'Failed to delete namespace');
        return deleted;
      }
      if (!deleted.value) {
        log.info('Application is not deployed, nothing to stop');
        return Success([]);
      }

      log.info({ services: services.map((service) => service.serviceName) }, 'Application stopped');
      return Success(services);
    });
  }

  async getLogs(
    appName: AppName,
    serviceName: string,
    from: Date | undefined,
    limit: number,
  ): InfrastructureResult<Array<[Date, string]> | undefined> {
    const namespace = namespaceName(appName);
    const pods = await this.client.listPods(namespace, serviceLabelSelector(appName, serviceName));
    if (!pods.ok) {
      return pods;
    }

    const [pod] = [...pods.value].sort((a, b) => createdAt(b) - createdAt(a));
    const podName = pod?.metadata?.name;
    if (podName === undefined) {
      this.logger.debug({ appName: appName.toString(), serviceName }, 'No pod to read logs from');
      return Success(undefined);
    }

    const text = await this.client.readPodLog(namespace, podName, sinceSeconds(from));
    if (!text.ok) {
      // 400 while the container is still being created
      return text.error.isNotFound || text.error.statusCode === 400 ? Success(undefined) : text;
    }

    return Success(selectLogLines(parseTimestampedLog(text.value), from, limit));
  }

  async changeStatus(
    appName: AppName,
    serviceName: string,
    status: ServiceStatus,
  ): InfrastructureResult<Service | undefined> {
    return this.locks.withLock<Result<Service | undefined, ApplicationError>>(
      appName.toNamespaceId(),
      async () => {
        const deployments = await this.client.listDeployments(
          serviceLabelSelector(appName, serviceName),
          namespaceName(appName),
        );
        if (!deployments.ok) {
          return deployments;
        }

        const service = deployments.value
          .map((deployment) => serviceFromDeployment(deployment))
          .find((candidate): candidate is Service => candidate !== undefined);
        if (service === undefined) {
          return Success(undefined);
        }

        const replicas = status === 'paused' ? 0 : 1;
        const scaled = await this.client.scaleDeployment(
          deploymentReplicasPayload(appName, service, replicas),
        );
        if (!scaled.ok) {
          return scaled;
        }
        if (scaled.value === undefined) {
          return Success(undefined);
        }

        this.logger.info({ appName: appName.toString(), serviceName, status }, 'Service status changed');
        const changed: Service = { ...service, status };
        return Success(changed);
      },
    );
  }

  async baseTraefikIngressRoute(): InfrastructureResult<TraefikIngressRoute | undefined> {
    const reference = this.config.runtime.baseIngressRoute;
    if (reference === undefined) {
      return Success(undefined);
    }

    const stored = await this.client.readIngressRoute(reference.namespace, reference.name);
    if (!stored.ok) {
      return stored;
    }
    if (stored.value === undefined) {
      this.logger.warn(reference, 'Configured base IngressRoute does not exist');
      return Success(undefined);
    }

    return ingressRouteFromKubernetes(stored.value);
  }

  private async deploy(
    deploymentUnit: DeploymentUnit,
    containerConfig: ContainerConfig,
  ): InfrastructureResult<Service[]> {
    const { appName, imagePullCredentials } = deploymentUnit;

    // Throws for files that cannot be mounted, before anything is written
    for (const service of deploymentUnit.services) {
      groupFilesByDirectory(Object.keys(service.config.files ?? {}));
    }

    const base = await this.baseTraefikIngressRoute();
    if (!base.ok) {
      return base;
    }

    const namespace = await this.client.applyNamespace(namespacePayload(appName, this.config));
    if (!namespace.ok) {
      return namespace;
    }

    const useImagePullSecret = hasImagePullCredentials(deploymentUnit);
    if (useImagePullSecret && imagePullCredentials !== undefined) {
      const secret = await this.ensureImagePullSecret(appName, imagePullCredentials);
      if (!secret.ok) {
        return secret;
      }
    }

    const baseRoute = base.value;
    const services: Service[] = [];
    for (const service of deploymentUnit.services) {
      const deployable =
        baseRoute !== undefined
          ? { ...service, ingressRoute: service.ingressRoute.withBaseRoute(baseRoute) }
          : service;

      const deployed = await this.deployService(appName, deployable, containerConfig, useImagePullSecret);
      if (!deployed.ok) {
        return deployed;
      }
      services.push(deployed.value);
    }

    return Success(services);
  }

  private async deployService(
    appName: AppName,
    service: DeployableService,
    containerConfig: ContainerConfig,
    useImagePullSecret: boolean,
  ): InfrastructureResult<Service> {
    const { config } = service;
    const log = this.logger.child({ appName: appName.toString(), serviceName: config.serviceName });

    const files = config.files ?? {};
    if (Object.keys(files).length > 0) {
      const secret = await this.client.applySecret(secretsPayload(appName, config, files));
      if (!secret.ok) {
        return secret;
      }
    }

    const claims = await this.persistentVolumeClaims(appName, service);
    if (!claims.ok) {
      return claims;
    }

    const deployment = await this.client.applyDeployment(
      deploymentPayload(appName, service, containerConfig, useImagePullSecret, claims.value),
    );
    if (!deployment.ok) {
      return deployment;
    }

    const endpoint = await this.client.applyService(servicePayload(appName, config));
    if (!endpoint.ok) {
      return endpoint;
    }

    if (!service.ingressRoute.isEmpty()) {
      for (const middleware of middlewarePayload(appName, service)) {
        const applied = await this.client.applyMiddleware(middleware);
        if (!applied.ok) {
          return applied;
        }
      }

      const route = await this.client.applyIngressRoute(ingressRoutePayload(appName, service));
      if (!route.ok) {
        return route;
      }
    } else {
      // A previous deployment may have exposed the service
      const removed = await this.client.deleteIngressRoute(
        namespaceName(appName),
        ingressRouteName(appName, config.serviceName),
      );
      if (!removed.ok) {
        return removed;
      }
    }

    log.debug({ strategy: service.strategy.type }, 'Service deployed');

    const startedAt = deployment.value.metadata?.creationTimestamp;
    const realized: Service = {
      id: deployment.value.metadata?.uid ?? deploymentName(appName, config.serviceName),
      serviceName: config.serviceName,
      containerType: config.containerType,
      status: 'running',
      ...(startedAt !== undefined && { startedAt: new Date(startedAt) }),
      config,
    };
    return Success(realized);
  }

  /**
   * Claims backing the declared volumes of a service. Claim names are generated, so existing
   * claims are looked up by label and only missing ones are created.
   */
  private async persistentVolumeClaims(
    appName: AppName,
    service: DeployableService,
  ): InfrastructureResult<Map<string, V1PersistentVolumeClaim>> {
    const { storageClass, storageSize } = this.config.runtime.storage;
    const namespace = namespaceName(appName);
    const claims = new Map<string, V1PersistentVolumeClaim>();

    for (const declaredVolume of service.declaredVolumes) {
      const labels = persistentVolumeClaimLabels(appName, service.config.serviceName, declaredVolume);
      const existing = await this.client.listPersistentVolumeClaims(namespace, labelSelectorOf(labels));
      if (!existing.ok) {
        return existing;
      }

      const [claim] = [...existing.value].sort(byName);
      if (claim !== undefined) {
        claims.set(declaredVolume, claim);
        continue;
      }

      const created = await this.client.createPersistentVolumeClaim(
        persistentVolumeClaimPayload(appName, service.config, storageSize, storageClass, declaredVolume),
      );
      if (!created.ok) {
        return created;
      }
      this.logger.info(
        { appName: appName.toString(), declaredVolume, claim: created.value.metadata?.name },
        'Persistent volume claim created',
      );
      claims.set(declaredVolume, created.value);
    }

    return Success(claims);
  }

  /**
   * The pull secret is immutable: it is left alone when unchanged and recreated otherwise
   */
  private async ensureImagePullSecret(
    appName: AppName,
    credentials: Readonly<Record<string, RegistryCredentials>>,
  ): InfrastructureResult<V1Secret> {
    const payload = imagePullSecretPayload(appName, credentials);
    const namespace = namespaceName(appName);
    const name = payload.metadata?.name ?? '';

    const stored = await this.client.readSecret(namespace, name);
    if (!stored.ok) {
      return stored;
    }

    if (stored.value !== undefined) {
      if (sameSecretData(stored.value.data, payload.data)) {
        return Success(stored.value);
      }

      this.logger.info({ appName: appName.toString() }, 'Image pull credentials changed, recreating secret');
      const deleted = await this.client.deleteSecret(namespace, name);
      if (!deleted.ok) {
        return deleted;
      }
    }

    return this.client.createSecret(payload);
  }
}
