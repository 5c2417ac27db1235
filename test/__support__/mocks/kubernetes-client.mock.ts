/**
 * In-memory stand-in for the API server behind the `KubernetesClient` port.
 * Objects are stored per kind as `namespace/name`; deleting a namespace deletes its content.
 */

import type {
  V1Deployment,
  V1Namespace,
  V1ObjectMeta,
  V1PersistentVolumeClaim,
  V1Pod,
  V1Secret,
  V1Service,
} from '@kubernetes/client-node';
import { Failure, Success } from '../../../src/domain/types/result';
import { KubernetesError } from '../../../src/errors';
import type { KubernetesClient, KubernetesResult } from '../../../src/infrastructure/kubernetes/client';
import type { IngressRoute, Middleware } from '../../../src/infrastructure/kubernetes/crds';

export const FAKE_CREATION_TIMESTAMP = new Date('2024-05-01T10:00:00.000Z');

type Method = keyof KubernetesClient;

const keyOf = (namespace: string | undefined, name: string | undefined): string =>
  `${namespace ?? ''}/${name ?? ''}`;

export function matchesSelector(labels: Readonly<Record<string, string>> | undefined, selector: string): boolean {
  return selector.split(',').every((term) => {
    const [key = '', value] = term.split('=');
    return value === undefined ? labels?.[key] !== undefined : labels?.[key] === value;
  });
}

const notFound = (kind: string, name: string): KubernetesError =>
  new KubernetesError(`${kind} "${name}" not found`, 'K8S_NOT_FOUND', 404, kind);

export class InMemoryKubernetesClient implements KubernetesClient {
  readonly namespaces = new Map<string, V1Namespace>();
  readonly secrets = new Map<string, V1Secret>();
  readonly claims = new Map<string, V1PersistentVolumeClaim>();
  readonly deployments = new Map<string, V1Deployment>();
  readonly services = new Map<string, V1Service>();
  readonly ingressRoutes = new Map<string, IngressRoute>();
  readonly middlewares = new Map<string, Middleware>();
  readonly pods = new Map<string, V1Pod>();
  /** `namespace/pod` → raw log text */
  readonly podLogs = new Map<string, string>();
  /** Every call as `method target`, in order */
  readonly calls: string[] = [];

  private readonly failures = new Map<Method, KubernetesError>();
  private sequence = 0;

  /** Makes the next call of `method` fail with `error` */
  failNext(method: Method, error: KubernetesError): void {
    this.failures.set(method, error);
  }

  async applyNamespace(namespace: V1Namespace): Promise<KubernetesResult<V1Namespace>> {
    const name = namespace.metadata?.name ?? '';
    const failure = this.record('applyNamespace', name);
    if (failure) {
      return Failure(failure);
    }
    return Success(this.upsert(this.namespaces, name, namespace));
  }

  async deleteNamespace(name: string): Promise<KubernetesResult<boolean>> {
    const failure = this.record('deleteNamespace', name);
    if (failure) {
      return Failure(failure);
    }
    if (!this.namespaces.delete(name)) {
      return Success(false);
    }

    const stores: Array<Map<string, unknown>> = [
      this.secrets,
      this.claims,
      this.deployments,
      this.services,
      this.ingressRoutes,
      this.middlewares,
      this.pods,
      this.podLogs,
    ];
    for (const store of stores) {
      for (const key of [...store.keys()]) {
        if (key.startsWith(`${name}/`)) {
          store.delete(key);
        }
      }
    }
    return Success(true);
  }

  async readSecret(namespace: string, name: string): Promise<KubernetesResult<V1Secret | undefined>> {
    const failure = this.record('readSecret', keyOf(namespace, name));
    if (failure) {
      return Failure(failure);
    }
    return Success(this.secrets.get(keyOf(namespace, name)));
  }

  async applySecret(secret: V1Secret): Promise<KubernetesResult<V1Secret>> {
    const key = keyOf(secret.metadata?.namespace, secret.metadata?.name);
    const failure = this.record('applySecret', key) ?? this.requireNamespace(secret.metadata);
    if (failure) {
      return Failure(failure);
    }
    return Success(this.upsert(this.secrets, key, secret));
  }

  async createSecret(secret: V1Secret): Promise<KubernetesResult<V1Secret>> {
    const key = keyOf(secret.metadata?.namespace, secret.metadata?.name);
    const failure = this.record('createSecret', key) ?? this.requireNamespace(secret.metadata);
    if (failure) {
      return Failure(failure);
    }
    if (this.secrets.has(key)) {
      return Failure(new KubernetesError(`Secret "${key}" already exists`, 'K8S_API_ERROR', 409, 'Secret'));
    }
    return Success(this.upsert(this.secrets, key, secret));
  }

  async deleteSecret(namespace: string, name: string): Promise<KubernetesResult<void>> {
    const key = keyOf(namespace, name);
    const failure = this.record('deleteSecret', key);
    if (failure) {
      return Failure(failure);
    }
    if (!this.secrets.delete(key)) {
      return Failure(notFound('Secret', key));
    }
    return Success(undefined);
  }

  async listPersistentVolumeClaims(
    namespace: string,
    labelSelector: string,
  ): Promise<KubernetesResult<V1PersistentVolumeClaim[]>> {
    const failure = this.record('listPersistentVolumeClaims', `${namespace} ${labelSelector}`);
    if (failure) {
      return Failure(failure);
    }
    return Success(this.list(this.claims, labelSelector, namespace));
  }

  async createPersistentVolumeClaim(
    claim: V1PersistentVolumeClaim,
  ): Promise<KubernetesResult<V1PersistentVolumeClaim>> {
    const name = `${claim.metadata?.generateName ?? ''}${String(this.sequence + 1).padStart(5, '0')}`;
    const key = keyOf(claim.metadata?.namespace, name);
    const failure = this.record('createPersistentVolumeClaim', key) ?? this.requireNamespace(claim.metadata);
    if (failure) {
      return Failure(failure);
    }
    return Success(this.upsert(this.claims, key, { ...claim, metadata: { ...claim.metadata, name } }));
  }

  async applyDeployment(deployment: V1Deployment): Promise<KubernetesResult<V1Deployment>> {
    const key = keyOf(deployment.metadata?.namespace, deployment.metadata?.name);
    const failure = this.record('applyDeployment', key) ?? this.requireNamespace(deployment.metadata);
    if (failure) {
      return Failure(failure);
    }
    return Success(this.upsert(this.deployments, key, deployment));
  }

  async scaleDeployment(deployment: V1Deployment): Promise<KubernetesResult<V1Deployment | undefined>> {
    const key = keyOf(deployment.metadata?.namespace, deployment.metadata?.name);
    const failure = this.record('scaleDeployment', key);
    if (failure) {
      return Failure(failure);
    }

    const stored = this.deployments.get(key);
    if (stored === undefined || stored.spec === undefined) {
      return Success(undefined);
    }
    const scaled: V1Deployment = { ...stored, spec: { ...stored.spec, replicas: deployment.spec?.replicas } };
    this.deployments.set(key, scaled);
    return Success(structuredClone(scaled));
  }

  async listDeployments(labelSelector: string, namespace?: string): Promise<KubernetesResult<V1Deployment[]>> {
    const failure = this.record('listDeployments', `${namespace ?? '*'} ${labelSelector}`);
    if (failure) {
      return Failure(failure);
    }
    return Success(this.list(this.deployments, labelSelector, namespace));
  }

  async applyService(service: V1Service): Promise<KubernetesResult<V1Service>> {
    const key = keyOf(service.metadata?.namespace, service.metadata?.name);
    const failure = this.record('applyService', key) ?? this.requireNamespace(service.metadata);
    if (failure) {
      return Failure(failure);
    }
    return Success(this.upsert(this.services, key, service));
  }

  async listPods(namespace: string, labelSelector: string): Promise<KubernetesResult<V1Pod[]>> {
    const failure = this.record('listPods', `${namespace} ${labelSelector}`);
    if (failure) {
      return Failure(failure);
    }
    return Success(this.list(this.pods, labelSelector, namespace));
  }

  async readPodLog(namespace: string, podName: string, sinceSeconds?: number): Promise<KubernetesResult<string>> {
    const key = keyOf(namespace, podName);
    const failure = this.record('readPodLog', sinceSeconds !== undefined ? `${key} ${sinceSeconds}` : key);
    if (failure) {
      return Failure(failure);
    }
    const log = this.podLogs.get(key);
    return log !== undefined ? Success(log) : Failure(notFound('Pod', key));
  }

  async applyIngressRoute(ingressRoute: IngressRoute): Promise<KubernetesResult<void>> {
    const key = keyOf(ingressRoute.metadata.namespace, ingressRoute.metadata.name);
    const failure = this.record('applyIngressRoute', key) ?? this.requireNamespace(ingressRoute.metadata);
    if (failure) {
      return Failure(failure);
    }
    this.ingressRoutes.set(key, structuredClone(ingressRoute));
    return Success(undefined);
  }

  async applyMiddleware(middleware: Middleware): Promise<KubernetesResult<void>> {
    const key = keyOf(middleware.metadata.namespace, middleware.metadata.name);
    const failure = this.record('applyMiddleware', key) ?? this.requireNamespace(middleware.metadata);
    if (failure) {
      return Failure(failure);
    }
    this.middlewares.set(key, structuredClone(middleware));
    return Success(undefined);
  }

  async deleteIngressRoute(namespace: string, name: string): Promise<KubernetesResult<boolean>> {
    const key = keyOf(namespace, name);
    const failure = this.record('deleteIngressRoute', key);
    if (failure) {
      return Failure(failure);
    }
    return Success(this.ingressRoutes.delete(key));
  }

  async readIngressRoute(namespace: string, name: string): Promise<KubernetesResult<IngressRoute | undefined>> {
    const key = keyOf(namespace, name);
    const failure = this.record('readIngressRoute', key);
    if (failure) {
      return Failure(failure);
    }
    const route = this.ingressRoutes.get(key);
    return Success(route !== undefined ? structuredClone(route) : undefined);
  }

  private record(method: Method, target: string): KubernetesError | undefined {
    this.calls.push(`${method} ${target}`);
    const failure = this.failures.get(method);
    this.failures.delete(method);
    return failure;
  }

  private requireNamespace(metadata: { namespace?: string } | undefined): KubernetesError | undefined {
    const namespace = metadata?.namespace ?? '';
    return this.namespaces.has(namespace) ? undefined : notFound('Namespace', namespace);
  }

  /**
   * Stores a copy, keeping uid and creation time of an object that already exists
   */
  private upsert<T extends { metadata?: V1ObjectMeta }>(store: Map<string, T>, key: string, object: T): T {
    const existing = store.get(key);
    this.sequence++;
    const stored: T = {
      ...structuredClone(object),
      metadata: {
        ...object.metadata,
        uid: existing?.metadata?.uid ?? `uid-${this.sequence}`,
        resourceVersion: String(this.sequence),
        creationTimestamp: existing?.metadata?.creationTimestamp ?? FAKE_CREATION_TIMESTAMP,
      },
    };
    store.set(key, stored);
    return structuredClone(stored);
  }

  private list<T extends { metadata?: V1ObjectMeta }>(
    store: Map<string, T>,
    labelSelector: string,
    namespace: string | undefined,
  ): T[] {
    return [...store.entries()]
      .filter(([key]) => namespace === undefined || key.startsWith(`${namespace}/`))
      .filter(([, object]) => matchesSelector(object.metadata?.labels, labelSelector))
      .map(([, object]) => structuredClone(object));
  }
}
