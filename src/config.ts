/**
 * @file config.ts
 * @description Startup configuration read from environment variables.
 *
 * Only presentation and diagnostics are configurable.  Physics values live
 * in constants.ts and never change at runtime.
 *
 *   PONG_FPS            ticks per second of the run loop           (30)
 *   PONG_SCALE          display scale factor of the 512×256 frame  (2)
 *   PONG_LOG_LEVEL      pino level                                 (info)
 *   PONG_LOG_FILE       per-run log, truncated at startup          (pong.log)
 *   PONG_LONG_LOG_FILE  log appended to across runs                (pong.long.log)
 *   PONG_LOG_STDERR     also log to stderr                         (false)
 *   PONG_FONT_FILE      bitmap font JSON                           (assets/font.json)
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { DEFAULT_FPS, SURFACE_SIZE } from './constants.js';
import { ConfigError } from './errors.js';
import type { Size } from './types.js';

const DEFAULT_FONT_FILE = fileURLToPath(new URL('../assets/font.json', import.meta.url));

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PONG_FPS:           z.coerce.number().int().min(1).max(240).default(DEFAULT_FPS),
  PONG_SCALE:         z.coerce.number().int().min(1).max(8).default(2),
  PONG_LOG_LEVEL:     z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PONG_LOG_FILE:      z.string().trim().min(1).default('pong.log'),
  PONG_LONG_LOG_FILE: z.string().trim().min(1).default('pong.long.log'),
  PONG_LOG_STDERR:    booleanFlag.default('false'),
  PONG_FONT_FILE:     z.string().trim().min(1).default(DEFAULT_FONT_FILE),
});

export type LogLevel = z.infer<typeof envSchema>['PONG_LOG_LEVEL'];

export interface AppConfig
{
  fps: number;

  /** Display size every scene's logical surface is scaled to. */
  scale: Size;

  logLevel: LogLevel;
  logFile: string;
  longLogFile: string;
  logToStderr: boolean;
  fontFile: string;
}

/**
 * @function loadConfig
 * @description Validates `env` and fills in defaults.
 * @throws {ConfigError} listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig
{
  const parsed = envSchema.safeParse(env);
  if (!parsed.success)
  {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }

  const values = parsed.data;
  return {
    fps:         values.PONG_FPS,
    scale:       { w: SURFACE_SIZE.w * values.PONG_SCALE, h: SURFACE_SIZE.h * values.PONG_SCALE },
    logLevel:    values.PONG_LOG_LEVEL,
    logFile:     values.PONG_LOG_FILE,
    longLogFile: values.PONG_LONG_LOG_FILE,
    logToStderr: values.PONG_LOG_STDERR,
    fontFile:    values.PONG_FONT_FILE,
  };
}
