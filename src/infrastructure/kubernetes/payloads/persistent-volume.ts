import type { V1PersistentVolumeClaim } from '@kubernetes/client-node';
import type { AppName } from '../../../domain/types/app-name';
import type { ServiceConfig } from '../../../domain/types/service';
import { APP_NAME_LABEL, SERVICE_NAME_LABEL, STORAGE_TYPE_LABEL } from '../../../domain/labels';
import { namespaceName, persistentVolumeClaimPrefix } from './names';

/**
 * Storage type of a declared volume: its last path segment, `default` when there is none
 */
export const storageType = (declaredVolume: string): string =>
  declaredVolume.split('/').pop() || 'default';

/**
 * Labels a claim is looked up by. Claim names are generated by the API server, so existing
 * claims can only be found through these labels.
 */
export const persistentVolumeClaimLabels = (
  appName: AppName,
  serviceName: string,
  declaredVolume: string,
): Record<string, string> => ({
  [APP_NAME_LABEL]: appName.toString(),
  [SERVICE_NAME_LABEL]: serviceName,
  [STORAGE_TYPE_LABEL]: storageType(declaredVolume),
});

export function persistentVolumeClaimPayload(
  appName: AppName,
  serviceConfig: ServiceConfig,
  storageSize: number,
  storageClass: string,
  declaredVolume: string,
): V1PersistentVolumeClaim {
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: {
      generateName: persistentVolumeClaimPrefix(appName, serviceConfig.serviceName),
      namespace: namespaceName(appName),
      labels: persistentVolumeClaimLabels(appName, serviceConfig.serviceName, declaredVolume),
    },
    spec: {
      storageClassName: storageClass,
      accessModes: ['ReadWriteOnce'],
      resources: {
        requests: { storage: String(storageSize) },
      },
    },
  };
}
