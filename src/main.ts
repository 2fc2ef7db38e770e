#!/usr/bin/env node
/**
 * @file main.ts
 * @description Entry point for the pong-trainer CLI.
 *
 * Responsibilities:
 *   1. Read the configuration from the environment.
 *   2. Open the log sinks and the font.
 *   3. Wire the terminal front end into an App and run it.
 *   4. Give the terminal back and close the logs, whatever happened.
 *
 * Exit codes: 0 normal quit, 1 the loop stopped on an error, 2 bad configuration.
 */

import { App } from './app.js';
import { AudioManager } from './audio.js';
import { loadConfig, type AppConfig } from './config.js';
import { SCORE_GLYPH_SCALE, TEXT_GLYPH_SCALE } from './constants.js';
import { ConfigError } from './errors.js';
import { BitmapGlyphSheet, loadFontFile, type FontFile } from './glyphs.js';
import { InputManager } from './input.js';
import { createLogger } from './logger.js';
import { TerminalDisplay } from './terminal.js';

async function main(): Promise<number>
{
  let config: AppConfig;
  let font: FontFile;
  try
  {
    config = loadConfig();
    font   = loadFontFile(config.fontFile);
  }
  catch (err)
  {
    if (err instanceof ConfigError)
    {
      process.stderr.write(`${err.message}\n`);
      return 2;
    }
    throw err;
  }

  const { logger, close } = createLogger(config);
  const input   = new InputManager();
  const display = new TerminalDisplay(process.stdout);

  const app = new App({
    fps:     config.fps,
    scale:   config.scale,
    display,
    input,
    audio:   new AudioManager(logger),
    fonts:   {
      score: new BitmapGlyphSheet(font, SCORE_GLYPH_SCALE),
      text:  new BitmapGlyphSheet(font, TEXT_GLYPH_SCALE),
    },
    logger,
  });

  input.attach(process.stdin);
  try
  {
    await app.run();
    return 0;
  }
  catch
  {
    /* already logged by App.run() */
    return 1;
  }
  finally
  {
    input.detach();
    display.restore();
    close();
  }
}

main().then(
  (code) => { process.exitCode = code; },
  (err: unknown) =>
  {
    process.stderr.write(`${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exitCode = 1;
  },
);
