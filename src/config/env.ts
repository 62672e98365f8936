/**
 * Environment Configuration
 * Validates and exports all environment variables
 */

import { z } from 'zod';

const flag = z.enum(['true', 'false']);

const envSchema = z.object({
  // Serial configuration
  SERIAL_PORT: z.string().optional(),
  SERIAL_BAUD: z.coerce.number().int().positive().default(57600),
  
  // Loopback mode (virtual firmware, no hardware)
  LOOPBACK_MODE: flag.transform(v => v === 'true').default('false'),
  
  // Debug mode
  DEBUG: flag.transform(v => v === 'true').default('false'),
  
  // Exchange timeouts
  COMMAND_TIMEOUT_MS: z.coerce.number().int().min(10).max(5000).default(100),
  SENSOR_TIMEOUT_MS: z.coerce.number().int().min(10).max(5000).default(100),
  REPLY_SETTLE_MS: z.coerce.number().int().min(0).max(100).default(5),
  
  // Handshake
  HANDSHAKE_TIMEOUT_MS: z.coerce.number().int().min(50).max(5000).default(500),
  HANDSHAKE_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  OPEN_SETTLE_MS: z.coerce.number().int().min(0).max(2000).default(100),
  
  // Logging (file sink off unless a path is given)
  LOG_PATH: z.string().default(''),
  LOG_CONSOLE: flag.transform(v => v === 'true').default('true'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): EnvConfig {
  const result = envSchema.safeParse(source);
  
  if (!result.success) {
    console.error('[Config] Invalid environment configuration:');
    for (const issue of result.error.issues) {
      console.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    // Return defaults on error
    return envSchema.parse({});
  }
  
  return result.data;
}

export const env = parseEnv(process.env);

// Re-export individual values for convenience
export const {
  SERIAL_PORT,
  SERIAL_BAUD,
  LOOPBACK_MODE,
  DEBUG,
  COMMAND_TIMEOUT_MS,
  SENSOR_TIMEOUT_MS,
  REPLY_SETTLE_MS,
  HANDSHAKE_TIMEOUT_MS,
  HANDSHAKE_ATTEMPTS,
  OPEN_SETTLE_MS,
  LOG_PATH,
  LOG_CONSOLE,
} = env;
