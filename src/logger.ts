import { pino } from 'pino';

/**
 * Level for the library logger. Unknown names fall back to 'info' so that a
 * mistyped EXIF_CARRY_LOG_LEVEL cannot break module loading.
 */
export function resolveLogLevel(requested: string | undefined): string {
  if (requested === undefined) {
    return 'info';
  }
  if (requested === 'silent' || pino.levels.values[requested] !== undefined) {
    return requested;
  }
  return 'info';
}

/**
 * Library logger. Writes to stderr so that CLI output on stdout stays a clean
 * image stream. Parser anomalies are logged at debug level; set
 * EXIF_CARRY_LOG_LEVEL=debug to see them.
 */
export const logger = pino(
  {
    name: 'exif-carry',
    level: resolveLogLevel(process.env.EXIF_CARRY_LOG_LEVEL),
  },
  pino.destination(2),
);
