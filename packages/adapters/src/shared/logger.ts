export type Logger = Pick<Console, 'debug' | 'warn'>;

export const isLogger = (value: unknown): value is Logger =>
  typeof value === 'object' &&
  value !== null &&
  'debug' in value &&
  typeof value.debug === 'function' &&
  'warn' in value &&
  typeof value.warn === 'function';
