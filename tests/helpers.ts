/**
 * @file helpers.ts
 * @description Shared factories and fakes for the unit tests.
 *
 * Entity factories return the same structs the game builds, with overrides
 * for the fields a test cares about.  The fakes stand in for the terminal
 * front end so App and the scenes can run headless.
 *
 * Import pattern:
 *   import { makeTestBall, makeTestPaddle, silentLogger } from './helpers.js';
 */

import { fileURLToPath } from 'node:url';
import pino, { type Logger } from 'pino';
import type
{
  Ball, Display, FontSet, InputFrame, InputSource, MatchState, Paddle, Rng, SceneSettings,
} from '../src/types.js';
import { BOT_START, PLAYER_START, SCORE_GLYPH_SCALE, TEXT_GLYPH_SCALE } from '../src/constants.js';
import { makeBall, makePaddle } from '../src/physics.js';
import { makeScoreBoard } from '../src/score.js';
import { BitmapGlyphSheet, loadFontFile } from '../src/glyphs.js';
import { App, type AppOptions } from '../src/app.js';
import { AudioManager } from '../src/audio.js';
import type { Surface } from '../src/surface.js';

export const FONT_PATH = fileURLToPath(new URL('../assets/font.json', import.meta.url));

/* ═══════════════════════════════════════════════════════════════════════════
   ENTITY FACTORIES
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function makeTestBall
 * @description A ball at the arena centre, at rest unless overridden.
 */
export function makeTestBall(overrides: Partial<Ball> = {}): Ball
{
  return { ...makeBall({ x: 256, y: 128 }, { x: 0, y: 0 }), ...overrides };
}

/**
 * @function makeTestPaddle
 * @description Player (id 1) or bot (id 2) paddle at its start position.
 */
export function makeTestPaddle(id: 1 | 2, overrides: Partial<Paddle> = {}): Paddle
{
  return { ...makePaddle(id, id === 1 ? PLAYER_START : BOT_START), ...overrides };
}

/** A MatchState literal for driving bot policies directly. */
export function makeTestState(overrides: Partial<MatchState> = {}): MatchState
{
  return {
    player:      makeTestPaddle(1),
    bot:         makeTestPaddle(2),
    ball:        makeTestBall(),
    projectiles: [],
    scores:      makeScoreBoard(),
    ...overrides,
  };
}

/** Rng that replays `values` in order and then repeats the last one. */
export function sequenceRng(...values: number[]): Rng
{
  let i = 0;
  return () =>
  {
    const value = values[Math.min(i, values.length - 1)];
    i++;
    return value;
  };
}

/* ═══════════════════════════════════════════════════════════════════════════
   AMBIENT
   ═══════════════════════════════════════════════════════════════════════════ */

export function silentLogger(): Logger
{
  return pino({ level: 'silent' });
}

export function testFonts(): FontSet
{
  const font = loadFontFile(FONT_PATH);
  return {
    score: new BitmapGlyphSheet(font, SCORE_GLYPH_SCALE),
    text:  new BitmapGlyphSheet(font, TEXT_GLYPH_SCALE),
  };
}

/* ═══════════════════════════════════════════════════════════════════════════
   FRONT-END FAKES
   ═══════════════════════════════════════════════════════════════════════════ */

/** Keeps every presented frame. */
export class RecordingDisplay implements Display
{
  readonly frames: Array<{ surface: Surface; settings: SceneSettings }> = [];

  present(surface: Surface, settings: SceneSettings): void
  {
    this.frames.push({ surface, settings });
  }
}

/** Returns queued frames one poll at a time, then empty frames. */
export class ScriptedInput implements InputSource
{
  private readonly queue: Array<Partial<InputFrame>>;

  constructor(...frames: Array<Partial<InputFrame>>)
  {
    this.queue = frames;
  }

  push(frame: Partial<InputFrame>): void
  {
    this.queue.push(frame);
  }

  poll(): InputFrame
  {
    const next = this.queue.shift() ?? {};
    return { keys: next.keys ?? [], mouse: next.mouse ?? [], events: next.events ?? [] };
  }
}

/**
 * @function makeTestApp
 * @description App wired to the fakes, a silent logger and a constant rng
 *              (0.5 makes every respawn use the (8, 9) fallback velocity).
 */
export function makeTestApp(overrides: Partial<AppOptions> = {}): {
  app: App;
  display: RecordingDisplay;
  input: ScriptedInput;
  audio: AudioManager;
}
{
  const logger  = overrides.logger ?? silentLogger();
  const display = new RecordingDisplay();
  const input   = new ScriptedInput();
  const audio   = new AudioManager(logger);

  const app = new App({
    fps:   30,
    scale: { w: 1024, h: 512 },
    display,
    input,
    audio,
    fonts: testFonts(),
    logger,
    rng:   sequenceRng(0.5),
    ...overrides,
  });

  return { app, display, input, audio };
}
