import type { Logger } from 'pino';
import type { Config } from '../config';
import { Failure, Success, type Result } from '../domain/types/result';
import { ConfigurationError } from '../errors';
import type { Infrastructure } from './infrastructure';
import { createKubernetesClient, type KubernetesClient } from './kubernetes/client';
import { KubernetesInfrastructure } from './kubernetes/infrastructure';

/**
 * Creates the backend selected by `runtime.type`. Only Kubernetes is provided by this package;
 * a client can be passed in to talk to something other than the configured cluster.
 */
export function createInfrastructure(
  config: Config,
  logger: Logger,
  client?: KubernetesClient,
): Result<Infrastructure, ConfigurationError> {
  const { runtime } = config;

  switch (runtime.type) {
    case 'Kubernetes': {
      const kubernetesClient = client ?? createKubernetesClient(logger, runtime);
      logger.info(
        { runtime: runtime.type, context: runtime.context, storageClass: runtime.storage.storageClass },
        'Kubernetes infrastructure created',
      );
      return Success(new KubernetesInfrastructure(kubernetesClient, { ...config, runtime }, logger));
    }
    case 'Docker':
      return Failure(
        new ConfigurationError(
          'The Docker runtime is not supported by this deployer, use the Kubernetes runtime',
          'runtime.type',
        ),
      );
  }
}
