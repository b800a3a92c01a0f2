import { proxyRequestSchema } from '@probe-monitor/common';
import { z } from 'zod';

export const proxyBodySchema = proxyRequestSchema;

export const podNameParamsSchema = z.object({
  name: z.string().trim().min(1).max(253),
});

export type ProxyBody = z.infer<typeof proxyBodySchema>;
export type PodNameParams = z.infer<typeof podNameParamsSchema>;
