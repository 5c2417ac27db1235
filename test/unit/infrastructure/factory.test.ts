import { describe, it, expect } from '@jest/globals';
import { createInfrastructure } from '../../../src/infrastructure/factory';
import { KubernetesInfrastructure } from '../../../src/infrastructure/kubernetes/infrastructure';
import { ConfigurationError } from '../../../src/errors';
import { InMemoryKubernetesClient } from '../../__support__/mocks/kubernetes-client.mock';
import { createMockLogger } from '../../__support__/mocks/logger.mock';
import { appName, testConfig } from '../../__support__/utilities/test-helpers';

describe('createInfrastructure', () => {
  it('should create the Kubernetes backend on the given client', async () => {
    const client = new InMemoryKubernetesClient();

    const result = createInfrastructure(testConfig(), createMockLogger(), client);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toBeInstanceOf(KubernetesInfrastructure);
    await result.value.stopServices('status-1', appName('master'));
    expect(client.calls).toEqual(['listDeployments master preview.servant/app-name', 'deleteNamespace master']);
  });

  it('should refuse the Docker runtime', () => {
    const result = createInfrastructure(testConfig({ runtime: { type: 'Docker' } }), createMockLogger());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ConfigurationError);
    expect(result.error.configKey).toBe('runtime.type');
  });
});
