/**
 * Centralized pino logger for semsync.
 *
 * The CLI calls initLogger once; everything else asks for a child logger
 * bound to its subsystem. Before initialisation a stderr logger at warn
 * level is returned, so library use and tests never need setup.
 */

import pino from 'pino';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

export interface LoggerConfig {
  level: string;
  filePath: string;
}

const formatters = {
  level: (label: string) => ({ level: label.toUpperCase() }),
};

/**
 * Initialize the root logger writing to a file.
 *
 * @param filePath - Absolute path of the log file
 */
export function initLogger(filePath: string, level: string): pino.Logger {
  mkdirSync(dirname(filePath), { recursive: true });

  rootLogger = pino(
    {
      level,
      formatters,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    // sync so nothing is lost when the CLI exits right after a run
    pino.destination({ dest: filePath, sync: true }),
  );

  return rootLogger;
}

/** Child logger bound to a subsystem name (e.g. 'detector', 'store') */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    fallbackLogger ??= pino({ level: 'warn', formatters }, pino.destination(2));
    return fallbackLogger.child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
