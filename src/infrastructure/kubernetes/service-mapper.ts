/**
 * Reads realized services back from the deployments the deployer created
 */

import type { V1Deployment } from '@kubernetes/client-node';
import { z } from 'zod';
import {
  DEFAULT_SERVICE_PORT,
  isContainerType,
  type EnvironmentVariable,
  type Service,
} from '../../domain/types/service';
import {
  APP_NAME_LABEL,
  CONTAINER_TYPE_LABEL,
  IMAGE_LABEL,
  REPLICATED_ENV_LABEL,
  SERVICE_NAME_LABEL,
} from '../../domain/labels';

const ReplicatedEnvironmentSchema = z.record(
  z.object({
    value: z.string(),
    templated: z.boolean().default(false),
    replicate: z.boolean().default(true),
  }),
);

/**
 * Restores the replicated variables recorded on a deployment; anything unreadable is dropped
 */
export function environmentFromAnnotation(annotation: string | undefined): EnvironmentVariable[] | undefined {
  if (annotation === undefined) {
    return undefined;
  }

  let document: unknown;
  try {
    document = JSON.parse(annotation);
  } catch {
    return undefined;
  }

  const parsed = ReplicatedEnvironmentSchema.safeParse(document);
  if (!parsed.success) {
    return undefined;
  }

  return Object.entries(parsed.data).map(([key, variable]) => ({ key, ...variable }));
}

/**
 * Raw application name a deployment belongs to
 */
export const appNameOfDeployment = (deployment: V1Deployment): string | undefined =>
  deployment.metadata?.labels?.[APP_NAME_LABEL];

/**
 * Maps a deployment to the service it runs, `undefined` for deployments not created by the deployer
 */
export function serviceFromDeployment(deployment: V1Deployment): Service | undefined {
  const metadata = deployment.metadata;
  const serviceName = metadata?.labels?.[SERVICE_NAME_LABEL];
  const containerType = metadata?.labels?.[CONTAINER_TYPE_LABEL];
  if (serviceName === undefined || containerType === undefined || !isContainerType(containerType)) {
    return undefined;
  }

  const container = deployment.spec?.template.spec?.containers[0];
  const image = metadata?.annotations?.[IMAGE_LABEL] ?? container?.image ?? '';
  const env = environmentFromAnnotation(metadata?.annotations?.[REPLICATED_ENV_LABEL]);
  const startedAt = metadata?.creationTimestamp;

  return {
    id: metadata?.uid ?? metadata?.name ?? serviceName,
    serviceName,
    containerType,
    status: deployment.spec?.replicas === 0 ? 'paused' : 'running',
    ...(startedAt !== undefined && { startedAt: new Date(startedAt) }),
    config: {
      serviceName,
      image,
      port: container?.ports?.[0]?.containerPort ?? DEFAULT_SERVICE_PORT,
      containerType,
      ...(env !== undefined && { env }),
    },
  };
}

/**
 * Groups the services of managed deployments by raw application name
 */
export function servicesByApp(deployments: readonly V1Deployment[]): Map<string, Service[]> {
  const services = new Map<string, Service[]>();

  for (const deployment of deployments) {
    const appName = appNameOfDeployment(deployment);
    const service = serviceFromDeployment(deployment);
    if (appName === undefined || service === undefined) {
      continue;
    }
    services.set(appName, [...(services.get(appName) ?? []), service]);
  }

  return services;
}
