import type { V1Service } from '@kubernetes/client-node';
import type { AppName } from '../../../domain/types/app-name';
import type { ServiceConfig } from '../../../domain/types/service';
import { namespaceName, serviceLabels } from './names';

/**
 * Creates the [service](https://kubernetes.io/docs/concepts/services-networking/service/) that
 * makes a deployment resolvable by its service name within the application's namespace
 */
export function servicePayload(appName: AppName, serviceConfig: ServiceConfig): V1Service {
  const labels = serviceLabels(appName, serviceConfig.serviceName, serviceConfig.containerType);

  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: serviceConfig.serviceName,
      namespace: namespaceName(appName),
      labels: { ...labels },
    },
    spec: {
      ports: [
        {
          name: serviceConfig.serviceName,
          port: serviceConfig.port,
          targetPort: serviceConfig.port,
        },
      ],
      selector: { ...labels },
    },
  };
}
