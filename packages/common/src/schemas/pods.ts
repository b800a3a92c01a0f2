import { z } from 'zod';

import { POD_PHASES, type PodInfo, type PodPhase } from '../types/pods.js';

// Absent and null fields decode to their zero value; other values must have the right type.
const text = () => z.string().nullish().transform((value) => value ?? '');
const integer = () => z.number().int().nullish().transform((value) => value ?? 0);
const flag = () => z.boolean().nullish().transform((value) => value ?? false);

export const probeStatusSchema = z.object({
  started: flag(),
  live: flag(),
  ready: flag(),
});

export const podInfoSchema: z.ZodType<PodInfo, z.ZodTypeDef, unknown> = z.object({
  podName: text(),
  podIP: text(),
  nodeHostname: text(),
  containerAge: integer(),
  startTime: text(),
  probeStatus: probeStatusSchema.nullish().transform((value) => value ?? { started: false, live: false, ready: false }),
  startupDelay: integer(),
  startupReady: text(),
});

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;

export const proxyRequestSchema = z.object({
  url: z.string().trim().url(),
  method: z
    .string()
    .trim()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(HTTP_METHODS)),
});

export const normalizePodPhase = (phase: string | undefined): PodPhase =>
  POD_PHASES.find((candidate) => candidate === phase) ?? 'Unknown';

export type ProxyRequest = z.infer<typeof proxyRequestSchema>;
export type HttpMethod = (typeof HTTP_METHODS)[number];
