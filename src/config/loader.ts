/**
 * Configuration loading from plain objects or YAML files
 */

import { readFile } from 'node:fs/promises';
import * as yaml from 'js-yaml';
import { ConfigSchema, type Config } from './schema';
import type { ContainerConfig } from '../domain/types/service';
import { Failure, Success, type Result } from '../domain/types/result';
import { ConfigurationError } from '../errors';

export function parseConfig(input: unknown): Result<Config, ConfigurationError> {
  const parsed = ConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const violations = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return Failure(
      new ConfigurationError(
        `Invalid configuration: ${violations.map((v) => `${v.path}: ${v.message}`).join('; ')}`,
        violations[0]?.path,
        violations,
      ),
    );
  }
  return Success(parsed.data);
}

export async function loadConfig(path: string): Promise<Result<Config, ConfigurationError>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    return Failure(
      new ConfigurationError(
        `Cannot read configuration file ${path}: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        undefined,
        { path },
      ),
    );
  }

  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    return Failure(
      new ConfigurationError(
        `Configuration file ${path} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        undefined,
        { path },
      ),
    );
  }

  return parseConfig(document);
}

export const containerConfig = (config: Config): ContainerConfig =>
  config.containers.memoryLimit !== undefined ? { memoryLimit: config.containers.memoryLimit } : {};

/**
 * Namespace annotations configured for the Kubernetes runtime, empty for other runtimes
 */
export const namespaceAnnotations = (config: Config): Record<string, string> =>
  config.runtime.type === 'Kubernetes' ? config.runtime.annotations.namespace : {};
