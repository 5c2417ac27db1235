/**
 * Label and annotation keys written on every object the deployer manages
 */

const LABEL_PREFIX = 'preview.servant';

export const APP_NAME_LABEL = `${LABEL_PREFIX}/app-name`;
export const SERVICE_NAME_LABEL = `${LABEL_PREFIX}/service-name`;
export const CONTAINER_TYPE_LABEL = `${LABEL_PREFIX}/container-type`;
export const IMAGE_LABEL = `${LABEL_PREFIX}/image`;
export const REPLICATED_ENV_LABEL = `${LABEL_PREFIX}/replicated-env`;
export const STORAGE_TYPE_LABEL = `${LABEL_PREFIX}/storage-type`;

// Pod template annotations driving pod recreation
export const IMAGE_HASH_ANNOTATION = 'imageHash';
export const DATE_ANNOTATION = 'date';

export const TRAEFIK_ENTRY_POINTS_ANNOTATION = 'traefik.ingress.kubernetes.io/router.entrypoints';
