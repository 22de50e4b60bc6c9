/**
 * Environment configuration schema.
 * Credentials given on the command line or in a tool call take precedence over these.
 */
import { z } from 'zod';

export const envSchema = z.object({
  DAV_USERNAME: z.string().min(1).optional(),
  DAV_PASSWORD: z.string().optional(),
  DAV_PREEMPTIVE_AUTH: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  DAV_REQUEST_TIMEOUT: z.coerce.number().int().positive().default(30000),
  DAV_DNS_TIMEOUT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
});

export type Config = z.infer<typeof envSchema>;

/**
 * Parse and validate configuration from process.env.
 * @throws ZodError when a variable is present but invalid
 */
export function loadConfig(): Config {
  return envSchema.parse(process.env);
}
