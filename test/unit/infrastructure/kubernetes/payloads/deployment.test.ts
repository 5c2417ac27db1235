import { describe, it, expect, jest, afterEach } from '@jest/globals';
import type { V1PersistentVolumeClaim } from '@kubernetes/client-node';
import {
  deploymentPayload,
  deploymentReplicasPayload,
  groupFilesByDirectory,
} from '../../../../../src/infrastructure/kubernetes/payloads/deployment';
import { createEnvironmentVariable, createServiceConfig } from '../../../../../src/domain/types/service';
import {
  createDeployableService,
  redeployAlways,
  redeployNever,
  redeployOnImageUpdate,
} from '../../../../../src/deployment/deployment-unit';
import { InvariantViolationError } from '../../../../../src/errors';
import { appName } from '../../../../__support__/utilities/test-helpers';

const master = appName('master');

const masterLabels = {
  'preview.servant/app-name': 'master',
  'preview.servant/service-name': 'db',
  'preview.servant/container-type': 'instance',
};

const claim = (name: string, storageType?: string): V1PersistentVolumeClaim => ({
  metadata: {
    name,
    labels: storageType !== undefined ? { 'preview.servant/storage-type': storageType } : {},
  },
});

describe('groupFilesByDirectory', () => {
  it('should produce one group per parent directory', () => {
    const groups = groupFilesByDirectory([
      '/etc/mysql/my.cnf',
      '/etc/mysql/conf.d/server.cnf',
      '/etc/mysql/debian.cnf',
      '/etc/mysql/conf.d/client.cnf',
    ]);

    expect([...groups.entries()]).toEqual([
      ['/etc/mysql', ['/etc/mysql/debian.cnf', '/etc/mysql/my.cnf']],
      ['/etc/mysql/conf.d', ['/etc/mysql/conf.d/client.cnf', '/etc/mysql/conf.d/server.cnf']],
    ]);
  });

  it('should reject files placed directly below the root', () => {
    expect(() => groupFilesByDirectory(['/my.cnf'])).toThrow(InvariantViolationError);
  });
});

describe('deploymentPayload', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should synthesize the deployment of master/db', () => {
    const service = createDeployableService(master, createServiceConfig('db', 'mariadb:10.3.17'), {
      strategy: redeployOnImageUpdate('sha256:0123abcd'),
    });

    expect(deploymentPayload(master, service, {}, false)).toEqual({
      apiVersion: 'apps/v1',
      kind: 'Deployment',
      metadata: {
        name: 'master-db-deployment',
        namespace: 'master',
        labels: masterLabels,
        annotations: { 'preview.servant/image': 'mariadb:10.3.17' },
      },
      spec: {
        replicas: 1,
        selector: { matchLabels: masterLabels },
        template: {
          metadata: {
            labels: masterLabels,
            annotations: { imageHash: 'sha256:0123abcd' },
          },
          spec: {
            containers: [
              {
                name: 'db',
                image: 'mariadb:10.3.17',
                imagePullPolicy: 'Always',
                ports: [{ containerPort: 80 }],
              },
            ],
          },
        },
      },
    });
  });

  it('should use normalized names and the raw label for MY-APP', () => {
    const myApp = appName('MY-APP');
    const payload = deploymentPayload(
      myApp,
      createDeployableService(myApp, createServiceConfig('db', 'mariadb:10.3.17'), { strategy: redeployNever() }),
      {},
      false,
    );

    expect(payload.metadata?.name).toBe('my-app-db-deployment');
    expect(payload.metadata?.namespace).toBe('my-app');
    expect(payload.metadata?.labels?.['preview.servant/app-name']).toBe('MY-APP');
    expect(payload.spec?.selector.matchLabels).toEqual(payload.metadata?.labels);
    expect(payload.spec?.template.metadata?.labels).toEqual(payload.metadata?.labels);
  });

  it('should map the environment and record replicated variables', () => {
    const service = createDeployableService(
      master,
      createServiceConfig('db', 'mariadb:10.3.17', {
        env: [
          createEnvironmentVariable('MYSQL_USER', 'admin'),
          createEnvironmentVariable('MYSQL_PASSWORD', 'test-secret', { replicate: true }),
        ],
      }),
      { strategy: redeployNever() },
    );

    const payload = deploymentPayload(master, service, {}, false);

    expect(payload.spec?.template.spec?.containers[0]?.env).toEqual([
      { name: 'MYSQL_USER', value: 'admin' },
      { name: 'MYSQL_PASSWORD', value: 'test-secret' },
    ]);
    expect(payload.metadata?.annotations).toEqual({
      'preview.servant/image': 'mariadb:10.3.17',
      'preview.servant/replicated-env':
        '{"MYSQL_PASSWORD":{"value":"test-secret","templated":false,"replicate":true}}',
    });
  });

  it('should mount one secret volume per parent directory', () => {
    const service = createDeployableService(
      master,
      createServiceConfig('db', 'mariadb:10.3.17', {
        files: {
          '/etc/mysql/my.cnf': 'a',
          '/etc/mysql/conf.d/extra.cnf': 'b',
          '/etc/mysql/other.cnf': 'c',
        },
      }),
      { strategy: redeployNever() },
    );

    const payload = deploymentPayload(master, service, {}, false);

    expect(payload.spec?.template.spec?.volumes).toEqual([
      {
        name: 'etc-mysql',
        secret: {
          secretName: 'master-db-secret',
          items: [
            { key: 'my-cnf', path: 'my.cnf' },
            { key: 'other-cnf', path: 'other.cnf' },
          ],
        },
      },
      {
        name: 'etc-mysql-conf-d',
        secret: {
          secretName: 'master-db-secret',
          items: [{ key: 'extra-cnf', path: 'extra.cnf' }],
        },
      },
    ]);
    expect(payload.spec?.template.spec?.containers[0]?.volumeMounts).toEqual([
      { name: 'etc-mysql', mountPath: '/etc/mysql' },
      { name: 'etc-mysql-conf-d', mountPath: '/etc/mysql/conf.d' },
    ]);
  });

  it('should mount bound claims even without files', () => {
    const service = createDeployableService(master, createServiceConfig('db', 'mariadb:10.3.17'), {
      strategy: redeployNever(),
      declaredVolumes: ['/var/lib/mysql', '/var/log/mysql', '/unbound'],
    });
    const claims = new Map([
      ['/var/lib/mysql', claim('master-db-pvc-abcde', 'mysql')],
      ['/var/log/mysql', claim('master-db-pvc-fghij')],
    ]);

    const payload = deploymentPayload(master, service, {}, false, claims);

    expect(payload.spec?.template.spec?.volumes).toEqual([
      { name: 'mysql-volume', persistentVolumeClaim: { claimName: 'master-db-pvc-abcde' } },
      { name: 'default-volume', persistentVolumeClaim: { claimName: 'master-db-pvc-fghij' } },
    ]);
    expect(payload.spec?.template.spec?.containers[0]?.volumeMounts).toEqual([
      { name: 'mysql-volume', mountPath: '/var/lib/mysql' },
      { name: 'default-volume', mountPath: '/var/log/mysql' },
    ]);
  });

  it('should apply the memory limit and the pull secret', () => {
    const service = createDeployableService(master, createServiceConfig('db', 'mariadb:10.3.17'), {
      strategy: redeployNever(),
    });

    const payload = deploymentPayload(master, service, { memoryLimit: 536870912 }, true);

    expect(payload.spec?.template.spec?.containers[0]?.resources).toEqual({
      limits: { memory: '536870912' },
    });
    expect(payload.spec?.template.spec?.imagePullSecrets).toEqual([{ name: 'master-image-pull-secret' }]);
  });

  it('should omit optional fields', () => {
    const service = createDeployableService(master, createServiceConfig('db', 'mariadb:10.3.17'), {
      strategy: redeployNever(),
    });

    const payload = deploymentPayload(master, service, {}, false);
    const podSpec = payload.spec?.template.spec;

    expect(podSpec).not.toHaveProperty('volumes');
    expect(podSpec).not.toHaveProperty('imagePullSecrets');
    expect(podSpec?.containers[0]).not.toHaveProperty('env');
    expect(podSpec?.containers[0]).not.toHaveProperty('volumeMounts');
    expect(podSpec?.containers[0]).not.toHaveProperty('resources');
    expect(payload.spec?.template.metadata?.annotations).toEqual({});
  });

  it('should be deterministic for strategies other than redeploy-always', () => {
    const service = createDeployableService(
      master,
      createServiceConfig('db', 'mariadb:10.3.17', { files: { '/etc/b/x.cnf': 'x', '/etc/a/y.cnf': 'y' } }),
      { strategy: redeployOnImageUpdate('sha256:0123abcd') },
    );

    expect(JSON.stringify(deploymentPayload(master, service, {}, true))).toBe(
      JSON.stringify(deploymentPayload(master, service, {}, true)),
    );
  });

  it('should differ only in the date annotation when redeploying always', () => {
    const service = createDeployableService(master, createServiceConfig('db', 'mariadb:10.3.17'), {
      strategy: redeployAlways(),
    });

    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-03-01T12:00:00.000Z'));
    const first = deploymentPayload(master, service, {}, false);
    jest.setSystemTime(new Date('2024-03-01T12:00:05.000Z'));
    const second = deploymentPayload(master, service, {}, false);

    expect(first.spec?.template.metadata?.annotations).toEqual({ date: '2024-03-01T12:00:00.000Z' });
    expect(second.spec?.template.metadata?.annotations).toEqual({ date: '2024-03-01T12:00:05.000Z' });
    expect(JSON.stringify(first).replace('2024-03-01T12:00:00.000Z', '2024-03-01T12:00:05.000Z')).toBe(
      JSON.stringify(second),
    );
  });
});

describe('deploymentReplicasPayload', () => {
  it('should only carry identity and replica count', () => {
    expect(deploymentReplicasPayload(master, { serviceName: 'db', containerType: 'instance' }, 0)).toEqual({
      apiVersion: 'apps/v1',
      kind: 'Deployment',
      metadata: { name: 'master-db-deployment', namespace: 'master', labels: masterLabels },
      spec: {
        replicas: 0,
        selector: { matchLabels: masterLabels },
        template: {},
      },
    });
  });
});
