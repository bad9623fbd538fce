import { z } from 'zod';
import { isLogger, type Logger } from '../shared/logger';

export const registryOptionsSchema = z
  .object({
    /** Logs every successful resolution through `logger.debug`. */
    debug: z.boolean().default(false),
    logger: z
      .custom<Logger>(isLogger, { message: 'logger must provide debug and warn' })
      .default(console),
  })
  .strict();

export type RegistryOptions = z.input<typeof registryOptionsSchema>;
export type ResolvedRegistryOptions = z.output<typeof registryOptionsSchema>;
