/**
 * @file constants.ts
 * @description Single source of truth for every tuning value in Pong Trainer.
 *
 * UNITS
 * -----
 * Unless otherwise noted:
 *   - Distances / positions are in *logical surface pixels* (px).
 *   - Velocities are in *pixels per tick*; the simulation runs at a fixed tick.
 *   - Durations / timers are in *ticks*.
 *
 * None of these are configurable at runtime.
 */

import type { PaddleTuning, Rect, Size, Vector2 } from './types.js';

/* ═══════════════════════════════════════════════════════════════════════════
   SURFACE & ARENA
   Every scene renders into a 512 × 256 logical surface.  The ball plays
   inside PLAY_BOUNDS; leaving DESPAWN_BOUNDS triggers a respawn.
   ═══════════════════════════════════════════════════════════════════════════ */

export const SURFACE_SIZE: Size = { w: 512, h: 256 };

/** Respawned balls are placed exactly here (top-left of the ball sprite). */
export const ARENA_CENTER: Vector2 = { x: SURFACE_SIZE.w / 2, y: SURFACE_SIZE.h / 2 };

/** Walls the ball and the paddles are kept within. */
export const PLAY_BOUNDS: Rect = { x: 20, y: 15, w: 482, h: 221 };

/** How far the despawn bound's origin sits outside PLAY_BOUNDS. */
export const DESPAWN_MARGIN = 20;

/**
 * Outer bound used to detect an out-of-play ball.  The origin moves out by
 * DESPAWN_MARGIN and the size grows by the same amount, so the right and
 * bottom edges coincide with PLAY_BOUNDS: a ball the clamp pushes past the
 * right or bottom wall is respawned at the end of the same tick.
 */
export const DESPAWN_BOUNDS: Rect =
{
  x: PLAY_BOUNDS.x - DESPAWN_MARGIN,
  y: PLAY_BOUNDS.y - DESPAWN_MARGIN,
  w: PLAY_BOUNDS.w + DESPAWN_MARGIN,
  h: PLAY_BOUNDS.h + DESPAWN_MARGIN,
};

/** Target ticks per second of the run loop. */
export const DEFAULT_FPS = 30;

/** Default display size (2× the logical surface). */
export const DEFAULT_SCALE: Size = { w: 1024, h: 512 };

/* ═══════════════════════════════════════════════════════════════════════════
   PADDLE
   ═══════════════════════════════════════════════════════════════════════════ */

export const PADDLE_SIZE: Size = { w: 10, h: 50 };

export const PLAYER_START: Vector2 = { x: 30,  y: 128 };
export const BOT_START:    Vector2 = { x: 472, y: 128 };

/** Velocity multiplier applied every tick. */
export const PADDLE_FRICTION = 0.9;

/** Hitbox is snapped this far inside a violated bound edge. */
export const PADDLE_CLAMP_INSET = 1;

export const DEFAULT_TUNING: PaddleTuning = { impulse: 10, controlDelay: 10 };

/** Both paddles flip the ball's horizontal sign and keep the vertical one. */
export const PADDLE_REFLECTION_SIGN: Vector2 = { x: -1, y: 1 };

/* ═══════════════════════════════════════════════════════════════════════════
   BALL
   ═══════════════════════════════════════════════════════════════════════════ */

export const BALL_SIZE: Size = { w: 10, h: 10 };

/** Speed after a paddle hit and after a respawn (px/tick). */
export const BALL_SPEED = 10;

/**
 * Defined for symmetry with PADDLE_FRICTION but never applied: the ball
 * keeps its speed between hits.
 */
export const BALL_FRICTION = 0.99;

export const WALL_BOUNCE_INTERVAL   = 10;
export const PADDLE_BOUNCE_INTERVAL = 10;

/** Left-wall clamp places the ball this far inside the wall. */
export const BALL_CLAMP_LEFT_INSET = 21;

/** Direction used when ball and paddle centres coincide. */
export const PADDLE_BOUNCE_FALLBACK: Vector2 = { x: 8, y: 6 };

/** Respawn velocity used when the random candidate is degenerate. */
export const RESPAWN_FALLBACK_VELOCITY: Vector2 = { x: 8, y: 9 };

/** Random respawn components are drawn from [-RANGE, RANGE). */
export const RESPAWN_RANGE = 10;

/* ═══════════════════════════════════════════════════════════════════════════
   GOALS & SCORING
   ═══════════════════════════════════════════════════════════════════════════ */

/** Touching this credits the bot. */
export const LEFT_GOAL_REGION:  Rect = { x: 20,  y: 0, w: 10, h: SURFACE_SIZE.h };

/** Touching this credits the player. */
export const RIGHT_GOAL_REGION: Rect = { x: 492, y: 0, w: 10, h: SURFACE_SIZE.h };

/** Ticks during which further goal triggers are ignored. */
export const SCORE_COOLDOWN = 10;

/* ═══════════════════════════════════════════════════════════════════════════
   BOT & PROJECTILES
   ═══════════════════════════════════════════════════════════════════════════ */

/** Horizontal distance to the ball within which the tutorial bot plays the ball. */
export const BOT_ENGAGE_RANGE = 160;

export const PROJECTILE_SIZE: Size = { w: 6, h: 2 };
export const PROJECTILE_SPEED = 12;

/** Ticks between two shots of the same paddle. */
export const RELOAD_PERIOD = 30;

/** Ticks a paddle ignores control after being hit. */
export const STUN_PERIOD = 45;

/* ═══════════════════════════════════════════════════════════════════════════
   TUTORIAL THRESHOLDS
   ═══════════════════════════════════════════════════════════════════════════ */

/** Bot score during the difficulty probe that unlocks projectiles straight away. */
export const PROBE_ESCALATE_SCORE = 10;

/** Leading score (and 2× lead) that decides the easy / hard branch. */
export const PROBE_LEAD_SCORE = 5;

/** Bot control delay after the player found the probe easy. */
export const EASY_BRANCH_CONTROL_DELAY = 2;

/** Player score that ends the shooting probe. */
export const SHOOT_PROBE_TARGET = 3;

/** Bot score that turns the end of the shooting probe into a failure. */
export const SHOOT_PROBE_FAIL_SCORE = 3;

/** Bot score that fails the shooting probe on its own. */
export const SHOOT_PROBE_BOT_CAP = 10;

/* ═══════════════════════════════════════════════════════════════════════════
   KEYS
   Names as reported by the input source (terminal keypress names).
   ═══════════════════════════════════════════════════════════════════════════ */

export const KEY_MOVE_UP   = 'w';
export const KEY_MOVE_DOWN = 's';
export const KEY_SHOOT     = 'd';
export const KEY_ADVANCE   = 'space';
export const KEY_CONFIRM   = 'return';
export const KEY_BACK      = 'escape';
export const KEY_MENU_UP   = 'up';
export const KEY_MENU_DOWN = 'down';

/* ═══════════════════════════════════════════════════════════════════════════
   DRAWING
   ═══════════════════════════════════════════════════════════════════════════ */

export const COLOR_BG         = '#000000';
export const COLOR_FG         = '#ffffff';
export const COLOR_STUNNED    = '#808080';
export const COLOR_PROJECTILE = '#ffe600';

/** Scale of the score digits. */
export const SCORE_GLYPH_SCALE = 6;

/** Scale of menu and dialogue text. */
export const TEXT_GLYPH_SCALE = 2;

/** Glyph advance and width, in font pixels (multiplied by the sheet scale). */
export const GLYPH_ADVANCE = 5;
export const GLYPH_WIDTH   = 4;

/** Scores are drawn this far from the centre line, at this height. */
export const SCORE_GAP = 30;
export const SCORE_Y   = 30;

/** Court walls and centre line thickness. */
export const COURT_LINE = 10;
