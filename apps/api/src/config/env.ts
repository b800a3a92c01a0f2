import { config as loadDotenv } from 'dotenv';
import cron from 'node-cron';
import { z } from 'zod';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';

// Get the directory of the current file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env file from the api directory
loadDotenv({ path: resolve(__dirname, '../../.env') });

export const DEFAULT_RECONCILE_CRON = '*/5 * * * * *';

const environmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).or(z.literal('local')).default('development'),
  PORT: z.coerce.number().int().positive().default(8090),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  // Discovery
  POD_LABEL_SELECTOR: z.string().trim().min(1).default('app=probe-demo'),
  POD_NAMESPACE: z.string().trim().min(1).optional(),
  KUBECONFIG: z.string().min(1).optional(),
  // Remote pod endpoints
  INSTANCE_PORT: z.coerce.number().int().positive().max(65535).default(8080),
  PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  RECONCILE_CRON: z
    .string()
    .trim()
    .default(DEFAULT_RECONCILE_CRON)
    .refine((expression) => cron.validate(expression), { message: 'Invalid cron expression' }),
  PROXY_TARGET_POLICY: z.enum(['known-pods', 'any']).default('known-pods'),
  // Build info, injected by the image build
  APP_VERSION: z.string().min(1).default('dev'),
  GIT_COMMIT: z.string().min(1).default('unknown'),
  BUILD_TIME: z.string().min(1).default('unknown'),
});

const parsed = environmentSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment configuration', parsed.error.format());
  throw new Error('Invalid environment configuration');
}

export const env = parsed.data;

export type Environment = typeof env;
