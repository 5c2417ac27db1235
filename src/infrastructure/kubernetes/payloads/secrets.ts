/**
 * Secret payloads, see https://kubernetes.io/docs/concepts/configuration/secret/
 */

import type { V1Secret } from '@kubernetes/client-node';
import type { AppName } from '../../../domain/types/app-name';
import type { ServiceConfig } from '../../../domain/types/service';
import { APP_NAME_LABEL } from '../../../domain/labels';
import type { RegistryCredentials } from '../../../deployment/deployment-unit';
import {
  fileSecretName,
  imagePullSecretName,
  namespaceName,
  secretNameFromFileName,
  serviceLabels,
} from './names';

const toBase64 = (value: string): string => Buffer.from(value, 'utf-8').toString('base64');

/**
 * One secret holding every mounted file of a service, keyed like the volume items that mount them
 */
export function secretsPayload(
  appName: AppName,
  serviceConfig: ServiceConfig,
  files: Readonly<Record<string, string>>,
): V1Secret {
  const data = Object.fromEntries(
    Object.keys(files)
      .sort()
      .map((path): [string, string] => [secretNameFromFileName(path), toBase64(files[path] ?? '')]),
  );

  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: {
      name: fileSecretName(appName, serviceConfig.serviceName),
      namespace: namespaceName(appName),
      labels: serviceLabels(appName, serviceConfig.serviceName, serviceConfig.containerType),
    },
    type: 'Opaque',
    data,
  };
}

/**
 * Renders the `.dockerconfigjson` document for the given registries
 */
export function dockerConfigJson(credentials: Readonly<Record<string, RegistryCredentials>>): string {
  const auths: Record<string, RegistryCredentials> = {};
  for (const registry of Object.keys(credentials).sort()) {
    const entry = credentials[registry];
    if (entry) {
      auths[registry] = { username: entry.username, password: entry.password };
    }
  }
  return JSON.stringify({ auths });
}

/**
 * Immutable pull secret shared by all services of the application
 */
export function imagePullSecretPayload(
  appName: AppName,
  credentials: Readonly<Record<string, RegistryCredentials>>,
): V1Secret {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: {
      name: imagePullSecretName(appName),
      namespace: namespaceName(appName),
      labels: { [APP_NAME_LABEL]: appName.toString() },
    },
    immutable: true,
    type: 'kubernetes.io/dockerconfigjson',
    data: { '.dockerconfigjson': toBase64(dockerConfigJson(credentials)) },
  };
}
