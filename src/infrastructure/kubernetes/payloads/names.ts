/**
 * Object names and label sets of the synthesized resources.
 * All names derive from the normalized application name; labels keep the raw one.
 */

import { posix } from 'node:path';
import type { AppName } from '../../../domain/types/app-name';
import type { ContainerType } from '../../../domain/types/service';
import { APP_NAME_LABEL, CONTAINER_TYPE_LABEL, SERVICE_NAME_LABEL } from '../../../domain/labels';

export const namespaceName = (appName: AppName): string => appName.toNamespaceId();

export const deploymentName = (appName: AppName, serviceName: string): string =>
  `${appName.toNamespaceId()}-${serviceName}-deployment`;

export const fileSecretName = (appName: AppName, serviceName: string): string =>
  `${appName.toNamespaceId()}-${serviceName}-secret`;

export const imagePullSecretName = (appName: AppName): string =>
  `${appName.toNamespaceId()}-image-pull-secret`;

export const ingressRouteName = (appName: AppName, serviceName: string): string =>
  `${appName.toNamespaceId()}-${serviceName}-ingress-route`;

export const persistentVolumeClaimPrefix = (appName: AppName, serviceName: string): string =>
  `${appName.toNamespaceId()}-${serviceName}-pvc-`;

/**
 * Volume name for a directory: `/etc/my.app/conf` → `etc-my-app-conf`
 */
export const secretNameFromPath = (path: string): string =>
  path
    .split('/')
    .filter((component) => component !== '' && component !== '.' && component !== '..')
    .map((component) => component.replace(/\./g, '-'))
    .join('-');

/**
 * Secret key for a file: `/etc/mysql/my.cnf` → `my-cnf`
 */
export const secretNameFromFileName = (path: string): string =>
  posix.basename(path).replace(/\./g, '-');

export const parentDirectory = (path: string): string => posix.dirname(path);

export const fileName = (path: string): string => posix.basename(path);

/**
 * Labels identifying a service; doubles as the selector of its deployment and service
 */
export const serviceLabels = (
  appName: AppName,
  serviceName: string,
  containerType: ContainerType,
): Record<string, string> => ({
  [APP_NAME_LABEL]: appName.toString(),
  [SERVICE_NAME_LABEL]: serviceName,
  [CONTAINER_TYPE_LABEL]: containerType,
});

export const appLabelSelector = (appName: AppName): string =>
  labelSelectorOf({ [APP_NAME_LABEL]: appName.toString() });

export const serviceLabelSelector = (appName: AppName, serviceName: string): string =>
  labelSelectorOf({ [APP_NAME_LABEL]: appName.toString(), [SERVICE_NAME_LABEL]: serviceName });

/**
 * Equality-based selector matching every label of `labels`
 */
export const labelSelectorOf = (labels: Readonly<Record<string, string>>): string =>
  Object.entries(labels)
    .map(([key, value]) => `${key}=${value}`)
    .join(',');

/** Matches every object the deployer manages, whatever the application */
export const managedLabelSelector = (): string => APP_NAME_LABEL;
