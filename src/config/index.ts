/**
 * Configuration - public exports
 */

export {
  ConfigSchema,
  parseByteSize,
  type Config,
  type RuntimeConfig,
  type KubernetesRuntimeConfig,
  type KubernetesConfig,
} from './schema';
export { parseConfig, loadConfig, containerConfig, namespaceAnnotations } from './loader';
