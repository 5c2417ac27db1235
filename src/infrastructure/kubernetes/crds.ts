/**
 * Traefik custom resources (traefik.containo.us/v1alpha1)
 */

import { z } from 'zod';

export const TRAEFIK_GROUP = 'traefik.containo.us';
export const TRAEFIK_VERSION = 'v1alpha1';
export const TRAEFIK_API_VERSION = `${TRAEFIK_GROUP}/${TRAEFIK_VERSION}`;

export interface ObjectMeta {
  name?: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

export interface TraefikRuleService {
  kind?: string;
  name: string;
  port?: number;
}

export interface TraefikRuleSpec {
  kind: string;
  match: string;
  services: TraefikRuleService[];
  middlewares?: Array<{ name: string }>;
}

export interface IngressRouteSpec {
  entryPoints?: string[];
  routes?: TraefikRuleSpec[];
  tls?: { certResolver?: string };
}

export interface IngressRoute {
  apiVersion: string;
  kind: 'IngressRoute';
  metadata: ObjectMeta;
  spec: IngressRouteSpec;
}

export interface Middleware {
  apiVersion: string;
  kind: 'Middleware';
  metadata: ObjectMeta;
  spec: Record<string, unknown>;
}

const ObjectMetaSchema = z.object({
  name: z.string().optional(),
  namespace: z.string().optional(),
  labels: z.record(z.string()).optional(),
  annotations: z.record(z.string()).optional(),
});

/**
 * Validates IngressRoute objects read back from the cluster
 */
export const IngressRouteSchema: z.ZodType<IngressRoute, z.ZodTypeDef, unknown> = z.object({
  apiVersion: z.string(),
  kind: z.literal('IngressRoute'),
  metadata: ObjectMetaSchema,
  spec: z.object({
    entryPoints: z.array(z.string()).optional(),
    routes: z
      .array(
        z.object({
          kind: z.string(),
          match: z.string(),
          services: z
            .array(
              z.object({
                kind: z.string().optional(),
                name: z.string(),
                port: z.number().int().optional(),
              }),
            )
            .default([]),
          middlewares: z.array(z.object({ name: z.string() })).optional(),
        }),
      )
      .optional(),
    tls: z.object({ certResolver: z.string().optional() }).optional(),
  }),
});
