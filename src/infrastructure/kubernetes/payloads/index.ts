/**
 * Resource synthesis - pure functions from deployment descriptors to Kubernetes payloads
 */

export * from './names';
export { namespacePayload } from './namespace';
export {
  deploymentPayload,
  deploymentReplicasPayload,
  groupFilesByDirectory,
  type PersistentVolumeMap,
} from './deployment';
export { secretsPayload, imagePullSecretPayload, dockerConfigJson } from './secrets';
export { servicePayload } from './service';
export {
  persistentVolumeClaimPayload,
  persistentVolumeClaimLabels,
  storageType,
} from './persistent-volume';
export {
  ingressRoutePayload,
  middlewarePayload,
  resolveMiddlewareName,
  ingressRouteFromKubernetes,
} from './traefik';
