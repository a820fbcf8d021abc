import { z } from 'zod';
import { DEFAULT_TIME_ZONE, isValidTimeZone, formatZodErrors } from '@recall-scheduler/shared/scheduler';

const ClientConfigSchema = z.object({
  apiBase: z
    .string()
    .default('')
    .transform((base) => base.replace(/\/+$/, '')),
  timeZone: z
    .string()
    .default(DEFAULT_TIME_ZONE)
    .refine(isValidTimeZone, (zone) => ({ message: `Unknown time zone "${zone}"` })),
  databaseName: z.string().min(1).default('ReviewSchedulerDB'),
});

export type ClientConfig = z.output<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

/**
 * Fill in defaults and validate client settings.
 * Throws when a setting is unusable.
 */
export function resolveClientConfig(input: ClientConfigInput = {}): ClientConfig {
  const result = ClientConfigSchema.safeParse(input);
  if (!result.success) {
    throw new Error(`Invalid client config: ${formatZodErrors(result.error).join('; ')}`);
  }
  return result.data;
}
