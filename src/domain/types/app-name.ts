/**
 * Application name - the tenant scope every preview service belongs to
 */

import { Failure, Success, type Result } from './result';
import { ValidationError } from '../../errors';

const APP_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Lowercases an identifier so the orchestrator accepts it as an object name.
 * Kubernetes DNS label names forbid upper case letters.
 */
export const normalizeAppName = (name: string): string => name.toLowerCase();

export class AppName {
  private constructor(private readonly name: string) {}

  static fromString(name: string): Result<AppName, ValidationError> {
    if (!APP_NAME_PATTERN.test(name)) {
      return Failure(
        new ValidationError(
          `Invalid application name "${name}": only letters, digits, "-" and "_" are allowed`,
          'appName',
          name,
        ),
      );
    }
    return Success(new AppName(name));
  }

  static isValid(name: string): boolean {
    return APP_NAME_PATTERN.test(name);
  }

  static master(): AppName {
    return new AppName('master');
  }

  /**
   * Name used for namespaces and every other object name on the cluster
   */
  toNamespaceId(): string {
    return normalizeAppName(this.name);
  }

  equals(other: AppName): boolean {
    return this.name === other.name;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Normalizes `name` when it is itself a valid application name, otherwise returns it unchanged.
 * Inline middleware names are often derived from application names.
 */
export const normalizeIfAppName = (name: string): string =>
  AppName.isValid(name) ? normalizeAppName(name) : name;
