import { z } from 'zod';
import type { LogLevel } from '@recall-scheduler/shared/logger';
import { formatZodErrors } from '@recall-scheduler/shared/scheduler';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const ServerEnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  DATABASE_PATH: z.string().min(1).default('reviews.db'),
  LOG_LEVEL: LogLevelSchema.default('info'),
  CORS_ORIGIN: z.string().min(1).default('*'),
});

export interface ServerConfig {
  port: number;
  databasePath: string;
  logLevel: LogLevel;
  corsOrigin: string;
}

/**
 * Read server settings from environment variables.
 * Throws listing every invalid variable.
 */
export function loadServerConfig(env: Record<string, string | undefined>): ServerConfig {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const result = ServerEnvSchema.safeParse(present);
  if (!result.success) {
    throw new Error(
      `Invalid server environment: ${formatZodErrors(result.error).join('; ')}`
    );
  }

  return {
    port: result.data.PORT,
    databasePath: result.data.DATABASE_PATH,
    logLevel: result.data.LOG_LEVEL,
    corsOrigin: result.data.CORS_ORIGIN,
  };
}
