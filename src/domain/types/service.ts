/**
 * Service models shared by every infrastructure backend
 */

export const CONTAINER_TYPES = ['instance', 'replica', 'app-companion', 'service-companion'] as const;

/**
 * Role of a container within an application.
 * Companions are infrastructure that is deployed alongside but not part of the app's configuration set.
 */
export type ContainerType = (typeof CONTAINER_TYPES)[number];

export const isContainerType = (value: string): value is ContainerType =>
  (CONTAINER_TYPES as readonly string[]).includes(value);

export type ServiceStatus = 'running' | 'paused';

export interface EnvironmentVariable {
  key: string;
  value: string;
  /** Value contains template expressions that are rendered per replica */
  templated: boolean;
  /** Variable is copied onto replicas of this service */
  replicate: boolean;
}

export interface ServiceConfig {
  serviceName: string;
  image: string;
  port: number;
  containerType: ContainerType;
  env?: EnvironmentVariable[];
  /** Absolute mount path → file content */
  files?: Record<string, string>;
}

/**
 * A service as reported by the backend
 */
export interface Service {
  id: string;
  serviceName: string;
  containerType: ContainerType;
  status: ServiceStatus;
  startedAt?: Date;
  config: ServiceConfig;
}

/**
 * Backend-wide container defaults
 */
export interface ContainerConfig {
  /** Memory ceiling in bytes */
  memoryLimit?: number;
}

export const DEFAULT_SERVICE_PORT = 80;

export const createServiceConfig = (
  serviceName: string,
  image: string,
  overrides: Partial<Omit<ServiceConfig, 'serviceName' | 'image'>> = {},
): ServiceConfig => ({
  serviceName,
  image,
  port: DEFAULT_SERVICE_PORT,
  containerType: 'instance',
  ...overrides,
});

export const createEnvironmentVariable = (
  key: string,
  value: string,
  options: { templated?: boolean; replicate?: boolean } = {},
): EnvironmentVariable => ({
  key,
  value,
  templated: options.templated ?? false,
  replicate: options.replicate ?? false,
});

export interface ReplicatedVariable {
  value: string;
  templated: boolean;
  replicate: boolean;
}

/**
 * JSON summary of the replicated variables, or undefined when nothing is replicated
 */
export const replicatedEnvironmentToJson = (
  env: readonly EnvironmentVariable[],
): Record<string, ReplicatedVariable> | undefined => {
  const replicated = env.filter((variable) => variable.replicate);
  if (replicated.length === 0) {
    return undefined;
  }

  return Object.fromEntries(
    replicated.map((variable): [string, ReplicatedVariable] => [
      variable.key,
      { value: variable.value, templated: variable.templated, replicate: variable.replicate },
    ]),
  );
};
