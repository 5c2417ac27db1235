import type { V1Namespace } from '@kubernetes/client-node';
import type { AppName } from '../../../domain/types/app-name';
import { APP_NAME_LABEL } from '../../../domain/labels';
import { namespaceAnnotations, type Config } from '../../../config';
import { namespaceName } from './names';

/**
 * Creates a payload for the [namespace](https://kubernetes.io/docs/tasks/administer-cluster/namespaces/)
 * isolating one application
 */
export function namespacePayload(appName: AppName, config: Config): V1Namespace {
  const annotations = namespaceAnnotations(config);

  return {
    apiVersion: 'v1',
    kind: 'Namespace',
    metadata: {
      name: namespaceName(appName),
      labels: { [APP_NAME_LABEL]: appName.toString() },
      ...(Object.keys(annotations).length > 0 && { annotations: { ...annotations } }),
    },
  };
}
