/**
 * Deployment payloads
 *
 * See https://kubernetes.io/docs/concepts/workloads/controllers/deployment/
 */

import type {
  V1Container,
  V1Deployment,
  V1PersistentVolumeClaim,
  V1Volume,
  V1VolumeMount,
} from '@kubernetes/client-node';
import type { AppName } from '../../../domain/types/app-name';
import {
  replicatedEnvironmentToJson,
  type ContainerConfig,
  type ContainerType,
} from '../../../domain/types/service';
import { IMAGE_LABEL, REPLICATED_ENV_LABEL, STORAGE_TYPE_LABEL } from '../../../domain/labels';
import { podTemplateAnnotations, type DeployableService } from '../../../deployment/deployment-unit';
import { InvariantViolationError } from '../../../errors';
import {
  deploymentName,
  fileName,
  fileSecretName,
  imagePullSecretName,
  namespaceName,
  parentDirectory,
  secretNameFromFileName,
  secretNameFromPath,
  serviceLabels,
} from './names';

/**
 * Declared volume path → claim bound to it
 */
export type PersistentVolumeMap = ReadonlyMap<string, V1PersistentVolumeClaim>;

/**
 * Groups file paths by their parent directory, both levels sorted
 */
export function groupFilesByDirectory(paths: readonly string[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();

  for (const path of [...paths].sort()) {
    const directory = parentDirectory(path);
    if (secretNameFromPath(directory) === '') {
      throw new InvariantViolationError(
        `File ${path} must be placed in a directory below the root`,
        'file-parent-directory',
        { path },
      );
    }
    groups.set(directory, [...(groups.get(directory) ?? []), path]);
  }

  return new Map([...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

function fileVolumes(
  appName: AppName,
  service: DeployableService,
): { volumes: V1Volume[]; volumeMounts: V1VolumeMount[] } {
  const groups = groupFilesByDirectory(Object.keys(service.config.files ?? {}));
  const secretName = fileSecretName(appName, service.config.serviceName);

  const volumes: V1Volume[] = [];
  const volumeMounts: V1VolumeMount[] = [];
  for (const [directory, paths] of groups) {
    const name = secretNameFromPath(directory);
    volumes.push({
      name,
      secret: {
        secretName,
        items: paths.map((path) => ({ key: secretNameFromFileName(path), path: fileName(path) })),
      },
    });
    volumeMounts.push({ name, mountPath: directory });
  }

  return { volumes, volumeMounts };
}

const persistentVolumeName = (claim: V1PersistentVolumeClaim): string =>
  `${claim.metadata?.labels?.[STORAGE_TYPE_LABEL] ?? 'default'}-volume`;

function persistentVolumes(
  service: DeployableService,
  persistentVolumeMap: PersistentVolumeMap | undefined,
): { volumes: V1Volume[]; volumeMounts: V1VolumeMount[] } {
  const volumes: V1Volume[] = [];
  const volumeMounts: V1VolumeMount[] = [];

  for (const path of service.declaredVolumes) {
    const claim = persistentVolumeMap?.get(path);
    if (!claim) {
      continue;
    }
    const name = persistentVolumeName(claim);
    volumes.push({
      name,
      persistentVolumeClaim: { claimName: claim.metadata?.name ?? '' },
    });
    volumeMounts.push({ name, mountPath: path });
  }

  return { volumes, volumeMounts };
}

function deploymentAnnotations(service: DeployableService): Record<string, string> {
  const replicatedEnv = replicatedEnvironmentToJson(service.config.env ?? []);

  return {
    [IMAGE_LABEL]: service.config.image,
    ...(replicatedEnv !== undefined && { [REPLICATED_ENV_LABEL]: JSON.stringify(replicatedEnv) }),
  };
}

/**
 * Creates the deployment of one service. The pod template carries the redeploy annotations
 * so that the deployment controller notices when pods have to be recreated.
 */
export function deploymentPayload(
  appName: AppName,
  service: DeployableService,
  containerConfig: ContainerConfig,
  useImagePullSecret: boolean,
  persistentVolumeMap?: PersistentVolumeMap,
): V1Deployment {
  const { serviceName, containerType, image, port, env } = service.config;
  const labels = serviceLabels(appName, serviceName, containerType);

  const files = fileVolumes(appName, service);
  const persistent = persistentVolumes(service, persistentVolumeMap);
  const volumes = [...files.volumes, ...persistent.volumes];
  const volumeMounts = [...files.volumeMounts, ...persistent.volumeMounts];

  const container: V1Container = {
    name: serviceName,
    image,
    imagePullPolicy: 'Always',
    ports: [{ containerPort: port }],
    ...(env !== undefined && {
      env: env.map((variable) => ({ name: variable.key, value: variable.value })),
    }),
    ...(volumeMounts.length > 0 && { volumeMounts }),
    ...(containerConfig.memoryLimit !== undefined && {
      resources: { limits: { memory: String(containerConfig.memoryLimit) } },
    }),
  };

  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: {
      name: deploymentName(appName, serviceName),
      namespace: namespaceName(appName),
      labels: { ...labels },
      annotations: deploymentAnnotations(service),
    },
    spec: {
      replicas: 1,
      selector: { matchLabels: { ...labels } },
      template: {
        metadata: {
          labels: { ...labels },
          annotations: podTemplateAnnotations(service.strategy),
        },
        spec: {
          containers: [container],
          ...(volumes.length > 0 && { volumes }),
          ...(useImagePullSecret && {
            imagePullSecrets: [{ name: imagePullSecretName(appName) }],
          }),
        },
      },
    },
  };
}

/**
 * Identity and replica count of a deployment, e.g. to pause a service. The client copies
 * `spec.replicas` onto the stored deployment and leaves its other fields as they are.
 */
export function deploymentReplicasPayload(
  appName: AppName,
  service: { serviceName: string; containerType: ContainerType },
  replicas: number,
): V1Deployment {
  const labels = serviceLabels(appName, service.serviceName, service.containerType);

  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: {
      name: deploymentName(appName, service.serviceName),
      namespace: namespaceName(appName),
      labels: { ...labels },
    },
    spec: {
      replicas,
      selector: { matchLabels: { ...labels } },
      template: {},
    },
  };
}
