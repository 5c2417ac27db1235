/**
 * Runtime Configuration Schema
 *
 * Zod schema for the backend-wide settings, loaded once at startup.
 */

import { z } from 'zod';

const CONSTANTS = {
  DEFAULTS: {
    STORAGE_CLASS: 'local-path',
    STORAGE_SIZE: '2g',
  },
} as const;

const BYTE_SIZE_PATTERN = /^(\d+(?:\.\d+)?)\s*([kmgtp]?)(i?)b?$/i;

const UNIT_EXPONENTS: Record<string, number> = { '': 0, k: 1, m: 2, g: 3, t: 4, p: 5 };

/**
 * Parses sizes such as `512m`, `2Gi` or `1.5 GB` into bytes.
 * Units with an `i` are powers of 1024, all others powers of 1000.
 */
export function parseByteSize(value: string): number | undefined {
  const match = BYTE_SIZE_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }

  const [, amount = '', unit = '', binary = ''] = match;
  const exponent = UNIT_EXPONENTS[unit.toLowerCase()] ?? 0;
  const base = binary !== '' ? 1024 : 1000;
  return Math.round(Number(amount) * base ** exponent);
}

const ByteSizeSchema = z
  .union([z.number().int().nonnegative(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'number') {
      return value;
    }
    const bytes = parseByteSize(value);
    if (bytes === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid byte size "${value}"` });
      return z.NEVER;
    }
    return bytes;
  });

const KubernetesRuntimeSchema = z.object({
  type: z.literal('Kubernetes'),
  kubeconfig: z.string().optional(),
  context: z.string().optional(),
  annotations: z
    .object({
      namespace: z.record(z.string()).default({}),
    })
    .default({}),
  storage: z
    .object({
      storageClass: z.string().min(1).default(CONSTANTS.DEFAULTS.STORAGE_CLASS),
      storageSize: ByteSizeSchema.default(CONSTANTS.DEFAULTS.STORAGE_SIZE),
    })
    .default({}),
  /** IngressRoute through which the deployer itself is reachable */
  baseIngressRoute: z
    .object({
      namespace: z.string().min(1),
      name: z.string().min(1),
    })
    .optional(),
});

const DockerRuntimeSchema = z.object({
  type: z.literal('Docker'),
});

export const ConfigSchema = z.object({
  runtime: z
    .discriminatedUnion('type', [KubernetesRuntimeSchema, DockerRuntimeSchema])
    .default({ type: 'Kubernetes' }),
  containers: z
    .object({
      memoryLimit: ByteSizeSchema.optional(),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RuntimeConfig = Config['runtime'];
export type KubernetesRuntimeConfig = z.infer<typeof KubernetesRuntimeSchema>;

/** Configuration whose runtime has been narrowed to Kubernetes */
export type KubernetesConfig = Omit<Config, 'runtime'> & { runtime: KubernetesRuntimeConfig };
