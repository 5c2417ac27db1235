/**
 * Kubernetes infrastructure
 */

export {
  type KubernetesClient,
  type KubernetesResult,
  createKubernetesClient,
  toKubernetesError,
} from './client';
export { KubernetesInfrastructure } from './infrastructure';
export { serviceFromDeployment, servicesByApp, environmentFromAnnotation } from './service-mapper';
export { parseTimestampedLog, selectLogLines, type LogLine } from './pod-logs';
export * from './crds';
export * from './payloads';
