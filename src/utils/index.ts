export { logger } from './logger.js';
export { ConfigError, ExportFormatError, InvalidNumberError } from './errors.js';

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
