import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  OUTPUT_DIR: z.string().min(1).default('./output'),
  SERVERS_FILE: z.string().min(1).default('./config/servers.json'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  DOWNLOAD_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
  DOWNLOAD_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(3).default(2),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;
