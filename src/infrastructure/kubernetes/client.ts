/**
 * Kubernetes Client - narrow port over the API server
 *
 * Only the calls the deployer needs. Writes are upserts: the object is read, created when
 * missing and otherwise replaced carrying the stored resource version.
 */

import * as k8s from '@kubernetes/client-node';
import type {
  V1Deployment,
  V1Namespace,
  V1PersistentVolumeClaim,
  V1Pod,
  V1Secret,
  V1Service,
} from '@kubernetes/client-node';
import type { Logger } from 'pino';
import { z } from 'zod';
import { Failure, Success, type Result } from '../../domain/types/result';
import type { KubernetesRuntimeConfig } from '../../config';
import { KubernetesError } from '../../errors';
import {
  IngressRouteSchema,
  TRAEFIK_GROUP,
  TRAEFIK_VERSION,
  type IngressRoute,
  type Middleware,
} from './crds';

export type KubernetesResult<T> = Result<T, KubernetesError>;

export interface KubernetesClient {
  applyNamespace: (namespace: V1Namespace) => Promise<KubernetesResult<V1Namespace>>;
  /** Resolves to `false` when the namespace did not exist */
  deleteNamespace: (name: string) => Promise<KubernetesResult<boolean>>;

  readSecret: (namespace: string, name: string) => Promise<KubernetesResult<V1Secret | undefined>>;
  applySecret: (secret: V1Secret) => Promise<KubernetesResult<V1Secret>>;
  createSecret: (secret: V1Secret) => Promise<KubernetesResult<V1Secret>>;
  deleteSecret: (namespace: string, name: string) => Promise<KubernetesResult<void>>;

  listPersistentVolumeClaims: (
    namespace: string,
    labelSelector: string,
  ) => Promise<KubernetesResult<V1PersistentVolumeClaim[]>>;
  createPersistentVolumeClaim: (
    claim: V1PersistentVolumeClaim,
  ) => Promise<KubernetesResult<V1PersistentVolumeClaim>>;

  applyDeployment: (deployment: V1Deployment) => Promise<KubernetesResult<V1Deployment>>;
  /** Sets the stored deployment's replica count; `undefined` when there is no such deployment */
  scaleDeployment: (deployment: V1Deployment) => Promise<KubernetesResult<V1Deployment | undefined>>;
  /** Lists deployments in `namespace`, or in all namespaces when it is omitted */
  listDeployments: (labelSelector: string, namespace?: string) => Promise<KubernetesResult<V1Deployment[]>>;

  applyService: (service: V1Service) => Promise<KubernetesResult<V1Service>>;

  listPods: (namespace: string, labelSelector: string) => Promise<KubernetesResult<V1Pod[]>>;
  readPodLog: (
    namespace: string,
    podName: string,
    sinceSeconds?: number,
  ) => Promise<KubernetesResult<string>>;

  applyIngressRoute: (ingressRoute: IngressRoute) => Promise<KubernetesResult<void>>;
  applyMiddleware: (middleware: Middleware) => Promise<KubernetesResult<void>>;
  /** Resolves to `false` when there was no such IngressRoute */
  deleteIngressRoute: (namespace: string, name: string) => Promise<KubernetesResult<boolean>>;
  readIngressRoute: (
    namespace: string,
    name: string,
  ) => Promise<KubernetesResult<IngressRoute | undefined>>;
}

interface HttpError extends Error {
  statusCode?: number;
  body?: unknown;
}

function isHttpError(error: unknown): error is HttpError {
  return error instanceof Error && 'statusCode' in error;
}

const StatusBodySchema = z.object({ message: z.string() });

const StoredObjectSchema = z.object({
  metadata: z.object({ resourceVersion: z.string().optional() }).optional(),
});

/**
 * Converts client-node errors, whose HTTP errors carry the API server's `Status` as body
 */
export function toKubernetesError(
  error: unknown,
  operation: string,
  resource?: string,
  namespace?: string,
): KubernetesError {
  if (isHttpError(error)) {
    const status = StatusBodySchema.safeParse(error.body);
    const reason = status.success ? status.data.message : error.message;
    return new KubernetesError(
      `Failed to ${operation}: ${reason}`,
      error.statusCode === 404 ? 'K8S_NOT_FOUND' : 'K8S_API_ERROR',
      error.statusCode,
      resource,
      namespace,
      error,
    );
  }

  return new KubernetesError(
    `Failed to ${operation}: ${error instanceof Error ? error.message : String(error)}`,
    'K8S_UNKNOWN',
    undefined,
    resource,
    namespace,
    error,
  );
}

interface Target {
  kind: string;
  name: string;
  namespace?: string;
}

const targetName = ({ kind, name, namespace }: Target): string =>
  namespace !== undefined ? `${kind} ${namespace}/${name}` : `${kind} ${name}`;

/**
 * Create a Kubernetes client for the configured cluster
 */
export const createKubernetesClient = (
  logger: Logger,
  runtimeConfig: Pick<KubernetesRuntimeConfig, 'kubeconfig' | 'context'> = {},
): KubernetesClient => {
  const log = logger.child({ component: 'KubernetesClient' });
  const kc = new k8s.KubeConfig();

  if (runtimeConfig.kubeconfig !== undefined) {
    kc.loadFromFile(runtimeConfig.kubeconfig);
  } else {
    kc.loadFromDefault();
  }
  if (runtimeConfig.context !== undefined) {
    kc.setCurrentContext(runtimeConfig.context);
  }

  const coreApi = kc.makeApiClient(k8s.CoreV1Api);
  const appsApi = kc.makeApiClient(k8s.AppsV1Api);
  const customObjectsApi = kc.makeApiClient(k8s.CustomObjectsApi);

  async function call<T>(
    operation: string,
    target: Target,
    request: () => Promise<{ body: T }>,
  ): Promise<KubernetesResult<T>> {
    try {
      const { body } = await request();
      return Success(body);
    } catch (error) {
      return Failure(
        toKubernetesError(error, `${operation} ${targetName(target)}`, target.kind, target.namespace),
      );
    }
  }

  async function read<T>(
    target: Target,
    request: () => Promise<{ body: T }>,
  ): Promise<KubernetesResult<T | undefined>> {
    const result = await call('read', target, request);
    if (!result.ok && result.error.isNotFound) {
      return Success(undefined);
    }
    return result;
  }

  async function upsert<T>(
    target: Target,
    readStored: () => Promise<{ body: T }>,
    create: () => Promise<{ body: T }>,
    replace: (stored: T) => Promise<{ body: T }>,
  ): Promise<KubernetesResult<T>> {
    const stored = await read(target, readStored);
    if (!stored.ok) {
      return stored;
    }

    if (stored.value === undefined) {
      log.debug({ target: targetName(target) }, 'Creating object');
      return call('create', target, create);
    }

    const existing = stored.value;
    log.debug({ target: targetName(target) }, 'Replacing object');
    return call('replace', target, () => replace(existing));
  }

  const metadataOf = (object: { metadata?: k8s.V1ObjectMeta }): { name: string; namespace: string } => ({
    name: object.metadata?.name ?? '',
    namespace: object.metadata?.namespace ?? '',
  });

  const resourceVersionOf = (stored: unknown): string | undefined => {
    const parsed = StoredObjectSchema.safeParse(stored);
    return parsed.success ? parsed.data.metadata?.resourceVersion : undefined;
  };

  const withResourceVersion = <T extends { metadata?: k8s.V1ObjectMeta }>(
    object: T,
    resourceVersion: string | undefined,
  ): T => ({
    ...object,
    metadata: {
      ...object.metadata,
      ...(resourceVersion !== undefined && { resourceVersion }),
    },
  });

  async function applyCustomObject(
    plural: string,
    kind: string,
    object: IngressRoute | Middleware,
  ): Promise<KubernetesResult<void>> {
    const name = object.metadata.name ?? '';
    const namespace = object.metadata.namespace ?? '';
    const result = await upsert<object>(
      { kind, name, namespace },
      () => customObjectsApi.getNamespacedCustomObject(TRAEFIK_GROUP, TRAEFIK_VERSION, namespace, plural, name),
      () => customObjectsApi.createNamespacedCustomObject(TRAEFIK_GROUP, TRAEFIK_VERSION, namespace, plural, object),
      (stored) =>
        customObjectsApi.replaceNamespacedCustomObject(
          TRAEFIK_GROUP,
          TRAEFIK_VERSION,
          namespace,
          plural,
          name,
          withResourceVersion(object, resourceVersionOf(stored)),
        ),
    );
    return result.ok ? Success(undefined) : result;
  }

  return {
    async applyNamespace(namespace) {
      const { name } = metadataOf(namespace);
      return upsert(
        { kind: 'Namespace', name },
        () => coreApi.readNamespace(name),
        () => coreApi.createNamespace(namespace),
        (stored) =>
          coreApi.replaceNamespace(name, withResourceVersion(namespace, stored.metadata?.resourceVersion)),
      );
    },

    async deleteNamespace(name) {
      const target = { kind: 'Namespace', name };
      const result = await call('delete', target, () => coreApi.deleteNamespace(name));
      if (result.ok) {
        log.info({ namespace: name }, 'Namespace deleted');
        return Success(true);
      }
      return result.error.isNotFound ? Success(false) : result;
    },

    async readSecret(namespace, name) {
      return read({ kind: 'Secret', name, namespace }, () => coreApi.readNamespacedSecret(name, namespace));
    },

    async applySecret(secret) {
      const { name, namespace } = metadataOf(secret);
      return upsert(
        { kind: 'Secret', name, namespace },
        () => coreApi.readNamespacedSecret(name, namespace),
        () => coreApi.createNamespacedSecret(namespace, secret),
        (stored) =>
          coreApi.replaceNamespacedSecret(
            name,
            namespace,
            withResourceVersion(secret, stored.metadata?.resourceVersion),
          ),
      );
    },

    async createSecret(secret) {
      const { name, namespace } = metadataOf(secret);
      return call('create', { kind: 'Secret', name, namespace }, () =>
        coreApi.createNamespacedSecret(namespace, secret),
      );
    },

    async deleteSecret(namespace, name) {
      const result = await call('delete', { kind: 'Secret', name, namespace }, () =>
        coreApi.deleteNamespacedSecret(name, namespace),
      );
      return result.ok ? Success(undefined) : result;
    },

    async listPersistentVolumeClaims(namespace, labelSelector) {
      const result = await call(
        'list',
        { kind: 'PersistentVolumeClaim', name: labelSelector, namespace },
        () =>
          coreApi.listNamespacedPersistentVolumeClaim(
            namespace,
            undefined,
            undefined,
            undefined,
            undefined,
            labelSelector,
          ),
      );
      return result.ok ? Success(result.value.items) : result;
    },

    async createPersistentVolumeClaim(claim) {
      const namespace = claim.metadata?.namespace ?? '';
      const name = claim.metadata?.generateName ?? '';
      return call('create', { kind: 'PersistentVolumeClaim', name, namespace }, () =>
        coreApi.createNamespacedPersistentVolumeClaim(namespace, claim),
      );
    },

    async applyDeployment(deployment) {
      const { name, namespace } = metadataOf(deployment);
      return upsert(
        { kind: 'Deployment', name, namespace },
        () => appsApi.readNamespacedDeployment(name, namespace),
        () => appsApi.createNamespacedDeployment(namespace, deployment),
        (stored) =>
          appsApi.replaceNamespacedDeployment(
            name,
            namespace,
            withResourceVersion(deployment, stored.metadata?.resourceVersion),
          ),
      );
    },

    async scaleDeployment(deployment) {
      const { name, namespace } = metadataOf(deployment);
      const target = { kind: 'Deployment', name, namespace };
      const stored = await read(target, () => appsApi.readNamespacedDeployment(name, namespace));
      if (!stored.ok || stored.value === undefined) {
        return stored;
      }

      const existing = stored.value;
      const replicas = deployment.spec?.replicas;
      log.debug({ target: targetName(target), replicas }, 'Scaling deployment');
      return call('scale', target, () =>
        appsApi.replaceNamespacedDeployment(name, namespace, {
          ...existing,
          ...(existing.spec !== undefined && { spec: { ...existing.spec, replicas } }),
        }),
      );
    },

    async listDeployments(labelSelector, namespace) {
      const target = { kind: 'Deployment', name: labelSelector, ...(namespace !== undefined && { namespace }) };
      const result = await call('list', target, () =>
        namespace !== undefined
          ? appsApi.listNamespacedDeployment(namespace, undefined, undefined, undefined, undefined, labelSelector)
          : appsApi.listDeploymentForAllNamespaces(undefined, undefined, undefined, labelSelector),
      );
      return result.ok ? Success(result.value.items) : result;
    },

    async applyService(service) {
      const { name, namespace } = metadataOf(service);
      return upsert(
        { kind: 'Service', name, namespace },
        () => coreApi.readNamespacedService(name, namespace),
        () => coreApi.createNamespacedService(namespace, service),
        (stored) => {
          // Allocated cluster IPs are immutable and must be carried over
          const { clusterIP, clusterIPs } = stored.spec ?? {};
          return coreApi.replaceNamespacedService(name, namespace, {
            ...withResourceVersion(service, stored.metadata?.resourceVersion),
            spec: {
              ...service.spec,
              ...(clusterIP !== undefined && { clusterIP }),
              ...(clusterIPs !== undefined && { clusterIPs }),
            },
          });
        },
      );
    },

    async listPods(namespace, labelSelector) {
      const result = await call('list', { kind: 'Pod', name: labelSelector, namespace }, () =>
        coreApi.listNamespacedPod(namespace, undefined, undefined, undefined, undefined, labelSelector),
      );
      return result.ok ? Success(result.value.items) : result;
    },

    async readPodLog(namespace, podName, sinceSeconds) {
      return call('read log of', { kind: 'Pod', name: podName, namespace }, () =>
        coreApi.readNamespacedPodLog(
          podName,
          namespace,
          undefined,
          false,
          undefined,
          undefined,
          undefined,
          false,
          sinceSeconds,
          undefined,
          true,
        ),
      );
    },

    async applyIngressRoute(ingressRoute) {
      return applyCustomObject('ingressroutes', 'IngressRoute', ingressRoute);
    },

    async applyMiddleware(middleware) {
      return applyCustomObject('middlewares', 'Middleware', middleware);
    },

    async deleteIngressRoute(namespace, name) {
      const result = await call('delete', { kind: 'IngressRoute', name, namespace }, () =>
        customObjectsApi.deleteNamespacedCustomObject(TRAEFIK_GROUP, TRAEFIK_VERSION, namespace, 'ingressroutes', name),
      );
      if (result.ok) {
        log.info({ namespace, name }, 'IngressRoute deleted');
        return Success(true);
      }
      return result.error.isNotFound ? Success(false) : result;
    },

    async readIngressRoute(namespace, name) {
      const target = { kind: 'IngressRoute', name, namespace };
      const result = await read<object>(target, () =>
        customObjectsApi.getNamespacedCustomObject(TRAEFIK_GROUP, TRAEFIK_VERSION, namespace, 'ingressroutes', name),
      );
      if (!result.ok) {
        return result;
      }
      if (result.value === undefined) {
        return Success(undefined);
      }

      const parsed = IngressRouteSchema.safeParse(result.value);
      if (!parsed.success) {
        log.warn({ target: targetName(target), issues: parsed.error.issues }, 'Unexpected IngressRoute shape');
        return Failure(
          new KubernetesError(
            `IngressRoute ${namespace}/${name} does not match the expected shape`,
            'K8S_INVALID_OBJECT',
            undefined,
            'IngressRoute',
            namespace,
          ),
        );
      }
      return Success(parsed.data);
    },
  };
};
