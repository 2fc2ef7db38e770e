/**
 * @file logger.ts
 * @description Process-wide pino logger, created and torn down by main.ts.
 *
 * Sinks:
 *   longLogFile  appended to across runs
 *   logFile      truncated at startup, holds only the current run
 *   stderr       optional; off by default since the terminal is the screen
 */

import pino, { type Logger } from 'pino';
import type { AppConfig } from './config.js';

export interface LoggerHandle
{
  logger: Logger;

  /** Flushes and closes the file sinks. */
  close(): void;
}

export function createLogger(
  config: Pick<AppConfig, 'logLevel' | 'logFile' | 'longLogFile' | 'logToStderr'>,
): LoggerHandle
{
  const level = config.logLevel;
  if (level === 'silent')
  {
    return { logger: pino({ level }), close: () => undefined };
  }

  const longLog = pino.destination({ dest: config.longLogFile, append: true,  mkdir: true, sync: true });
  const runLog  = pino.destination({ dest: config.logFile,     append: false, mkdir: true, sync: true });

  const streams = [
    { level, stream: longLog },
    { level, stream: runLog },
  ];
  if (config.logToStderr)
  {
    streams.push({ level, stream: pino.destination(2) });
  }

  const logger = pino({ level, base: { pid: process.pid } }, pino.multistream(streams));

  return {
    logger,
    close: () =>
    {
      longLog.end();
      runLog.end();
    },
  };
}
