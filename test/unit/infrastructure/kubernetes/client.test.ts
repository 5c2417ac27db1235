import { describe, it, expect } from '@jest/globals';
import { toKubernetesError } from '../../../../src/infrastructure/kubernetes/client';
import { KubernetesError } from '../../../../src/errors';

const httpError = (statusCode: number, body: unknown): Error =>
  Object.assign(new Error('HTTP request failed'), { statusCode, body });

describe('toKubernetesError', () => {
  it('should use the message of the Status returned by the API server', () => {
    const error = toKubernetesError(
      httpError(404, { kind: 'Status', message: 'namespaces "master" not found' }),
      'read namespace',
      'Namespace',
    );

    expect(error).toBeInstanceOf(KubernetesError);
    expect(error.message).toBe('Failed to read namespace: namespaces "master" not found');
    expect(error.code).toBe('K8S_NOT_FOUND');
    expect(error.statusCode).toBe(404);
    expect(error.isNotFound).toBe(true);
    expect(error.resource).toBe('Namespace');
  });

  it('should fall back to the error message when the body is not a Status', () => {
    const error = toKubernetesError(httpError(409, 'conflict'), 'create secret', 'Secret', 'master');

    expect(error.message).toBe('Failed to create secret: HTTP request failed');
    expect(error.code).toBe('K8S_API_ERROR');
    expect(error.isConflict).toBe(true);
    expect(error.namespace).toBe('master');
  });

  it('should wrap errors without a status code', () => {
    const cause = new Error('connect ECONNREFUSED');
    const error = toKubernetesError(cause, 'list deployments');

    expect(error.message).toBe('Failed to list deployments: connect ECONNREFUSED');
    expect(error.code).toBe('K8S_UNKNOWN');
    expect(error.statusCode).toBeUndefined();
    expect(error.cause).toBe(cause);
    expect(toKubernetesError('timeout', 'list pods').message).toBe('Failed to list pods: timeout');
  });
});
