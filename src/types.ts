/**
 * @file types.ts
 * @description Shared TypeScript interfaces and type aliases for Pong Trainer.
 *
 * Every other module imports from here.  Entities are plain structs; the
 * functions in physics.ts, score.ts and ai.ts mutate them in place.
 */

import type { Surface } from './surface.js';

/* ═══════════════════════════════════════════════════════════════════════════
   GEOMETRY
   (0, 0) is the top-left corner of the logical surface; Y grows downward.
   ═══════════════════════════════════════════════════════════════════════════ */

export interface Vector2
{
  x: number;
  y: number;
}

export interface Size
{
  w: number;
  h: number;
}

/** Axis-aligned rectangle: (x, y) is the top-left corner. */
export interface Rect
{
  x: number;
  y: number;
  w: number;
  h: number;
}

/* ═══════════════════════════════════════════════════════════════════════════
   PADDLE
   ═══════════════════════════════════════════════════════════════════════════ */

/** A control command: push the paddle up or down. */
export type MoveMode = 'UP' | 'DOWN';

/** What control() remembered while the debounce timer was still running. */
export type BufferedMove = MoveMode | 'NONE';

/**
 * @interface PaddleTuning
 * @description Impulse strength and debounce period of one paddle.
 *              Swapped as a whole value by the tutorial, never field by field.
 */
export interface PaddleTuning
{
  /** Velocity added per accepted control command (px/tick). */
  impulse: number;

  /** Minimum ticks between two accepted control commands. */
  controlDelay: number;
}

/**
 * @interface Paddle
 * @description Full state of one paddle, either the human player or the bot.
 *
 * The hitbox is derived: position + hitboxOffset, sized hitboxSize.
 */
export interface Paddle
{
  /** 1 = left paddle (player), 2 = right paddle (bot). */
  id: 1 | 2;

  position: Vector2;
  velocity: Vector2;

  hitboxOffset: Vector2;
  hitboxSize:   Size;

  /** The paddle's hitbox is kept inside this rectangle. */
  bounds: Rect;

  tuning: PaddleTuning;

  /** Ticks left before another control command is accepted. */
  lastPressTimer: number;

  /** Recorded while debounced; never replayed. */
  bufferedMove: BufferedMove;

  /** Per-axis mask applied to the ball's velocity sign on contact. */
  reflectionSign: Vector2;

  /** Ticks left during which control() is ignored (hit by a projectile). */
  stunTimer: number;

  /** Ticks left before this paddle may fire another projectile. */
  reloadTimer: number;
}

/* ═══════════════════════════════════════════════════════════════════════════
   BALL, GOALS, PROJECTILES
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface Ball
 * @description State of the ball.  Velocity is in px per tick; the ball
 *              never slows down on its own.
 */
export interface Ball
{
  position: Vector2;
  velocity: Vector2;

  hitboxOffset: Vector2;
  hitboxSize:   Size;

  /** Walls the ball reflects off. */
  bounds: Rect;

  /** Ticks left before another wall reflection may fire. */
  wallBounceCooldown: number;

  /** Ticks left before another paddle reflection may fire. */
  paddleBounceCooldown: number;
}

/**
 * @interface Goal
 * @description Trigger region; invokes onCollide every tick the ball overlaps it.
 */
export interface Goal
{
  region: Rect;
  onCollide: () => void;
}

/** A shot travelling horizontally toward the opposing paddle. */
export interface Projectile
{
  /** Which paddle fired it; it can only hit the other one. */
  owner: 1 | 2;
  position: Vector2;
  velocity: Vector2;
  size: Size;
}

/* ═══════════════════════════════════════════════════════════════════════════
   SCORING
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface ScoreBoard
 * @description Both scores plus the shared post-score cooldown.
 *              While cooldown > 0 every goal trigger is ignored.
 */
export interface ScoreBoard
{
  playerScore: number;
  botScore:    number;
  cooldown:    number;
}

/** Pseudo-random source returning values in [0, 1). */
export type Rng = () => number;

/* ═══════════════════════════════════════════════════════════════════════════
   MATCH
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface MatchState
 * @description Everything a bot policy may read or command during one tick.
 */
export interface MatchState
{
  readonly player: Paddle;
  readonly bot: Paddle;
  readonly ball: Ball;
  readonly projectiles: Projectile[];
  readonly scores: ScoreBoard;
}

/* ═══════════════════════════════════════════════════════════════════════════
   TUTORIAL
   Forward table and score-driven branches live in tutorial.ts.
   ═══════════════════════════════════════════════════════════════════════════ */

export type TutorialStage =
  | 'INTRO'
  | 'MOVE_HINT'
  | 'DIFFICULTY_PROBE'
  | 'EASY_EXPLAIN'
  | 'HARD_EXPLAIN'
  | 'SHOOT_EXPLAIN'
  | 'SHOOT_PROBE_1'
  | 'SHOOT_PROBE_2'
  | 'SHOOT_PROBE_3'
  | 'SUCCESS'
  | 'FAIL'
  | 'RETURN_WARN_1'
  | 'RETURN_WARN_2'
  | 'RETURN_WARN_3'
  | 'RETURN_WARN_4'
  | 'CLOSING'
  | 'COMBAT';

/* ═══════════════════════════════════════════════════════════════════════════
   SCENES & INPUT
   ═══════════════════════════════════════════════════════════════════════════ */

export type SceneId = 'MENU' | 'GAME' | 'TUTORIAL';

export type MouseButton = 'LEFT' | 'MIDDLE' | 'RIGHT';

/** Raw events delivered once each (unlike polled keys, which repeat while held). */
export type RawEvent =
  | { type: 'QUIT' }
  | { type: 'KEY_DOWN'; key: string }
  | { type: 'MOUSE_DOWN'; button: MouseButton; pos: Vector2 };

export type RawEventType = RawEvent['type'];

export interface MousePress
{
  button: MouseButton;

  /** Position in display (scaled) coordinates. */
  pos: Vector2;
}

/** One tick's worth of input, as returned by InputSource.poll(). */
export interface InputFrame
{
  /** Keys held this tick. */
  keys: string[];
  mouse: MousePress[];
  events: RawEvent[];
}

/**
 * @interface SceneSettings
 * @description Static presentation settings of a scene.
 */
export interface SceneSettings
{
  /** Logical surface size (px). */
  size: Size;

  /** Display size the logical surface is scaled to. */
  scale: Size;

  title: string;

  /** When set, raw events of other types never reach the scene. */
  eventsFilter?: ReadonlySet<RawEventType>;
}

/**
 * @interface Scene
 * @description Capability set shared by Menu, Game and Tutorial.
 */
export interface Scene
{
  readonly settings: SceneSettings;

  update(): void;

  /** Returns a fully composed frame. */
  draw(): Surface;

  /** Called once per tick for every held key. */
  handleInput(key: string): void;

  /** Called once per tick for every pressed mouse button; pos is logical. */
  handleMousePress(button: MouseButton, pos: Vector2): void;

  handleEvent(event: RawEvent): void;

  /** One-time setup; guarded so repeated calls do nothing. */
  initialize(): void;

  isInitialized(): boolean;
}

/**
 * @interface SceneHost
 * @description What a scene may change on the application that owns it.
 */
export interface SceneHost
{
  scene: SceneId;
  done: boolean;
}

/* ═══════════════════════════════════════════════════════════════════════════
   EXTERNAL COLLABORATORS
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface Glyph
 * @description One character of a bitmap font, already scaled.
 */
export interface Glyph
{
  key: string;
  width: number;
  height: number;

  /** Row-major pixel mask at scale 1 ('#' = set). */
  rows: readonly string[];
}

/**
 * @interface GlyphSheet
 * @description Font provider.  generate() must run before get() is valid.
 */
export interface GlyphSheet
{
  readonly scale: number;
  readonly generated: boolean;
  generate(): void;
  get(key: string): Glyph;
}

/** Large digits for scores, small letters for menus and dialogue. */
export interface FontSet
{
  score: GlyphSheet;
  text:  GlyphSheet;
}

export interface Display
{
  present(surface: Surface, settings: SceneSettings): void;
}

export interface InputSource
{
  poll(): InputFrame;
}

export interface AudioSink
{
  /** Fire-and-forget looped playback. */
  playLoop(track: string): void;
}
