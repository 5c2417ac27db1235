/**
 * Domain Types - Unified exports
 */

export { Success, Failure, isOk, isFail, type Result } from './result';
export { AppName, normalizeAppName, normalizeIfAppName } from './app-name';
export {
  CONTAINER_TYPES,
  DEFAULT_SERVICE_PORT,
  isContainerType,
  createServiceConfig,
  createEnvironmentVariable,
  replicatedEnvironmentToJson,
  type ContainerType,
  type ServiceStatus,
  type EnvironmentVariable,
  type ServiceConfig,
  type Service,
  type ContainerConfig,
  type ReplicatedVariable,
} from './service';
