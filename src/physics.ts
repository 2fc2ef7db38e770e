/**
 * @file physics.ts
 * @description Fixed-tick physics for Pong Trainer.
 *
 * DESIGN
 * ------
 * Functions here never own state: they mutate the Paddle / Ball / Projectile
 * structs they receive and return a summary of what happened, so the Match
 * can log and react.  One call = one tick; there is no delta time.
 *
 * COORDINATE SYSTEM
 * -----------------
 *   (0, 0) is the top-left corner of the 512 × 256 logical surface.
 *   X increases to the right, Y increases DOWNWARD.
 *   An entity's `position` is the top-left of its sprite; the hitbox is
 *   position + hitboxOffset.
 */

import type { Ball, Goal, MoveMode, Paddle, PaddleTuning, Projectile, Rect, Rng, Vector2 } from './types.js';
import
{
  ARENA_CENTER,
  BALL_CLAMP_LEFT_INSET, BALL_SIZE, BALL_SPEED,
  DEFAULT_TUNING,
  PADDLE_BOUNCE_FALLBACK, PADDLE_BOUNCE_INTERVAL, PADDLE_CLAMP_INSET, PADDLE_FRICTION,
  PADDLE_REFLECTION_SIGN, PADDLE_SIZE,
  PLAY_BOUNDS,
  PROJECTILE_SIZE, PROJECTILE_SPEED,
  RELOAD_PERIOD,
  RESPAWN_FALLBACK_VELOCITY, RESPAWN_RANGE,
  STUN_PERIOD,
  WALL_BOUNCE_INTERVAL,
} from './constants.js';
import
{
  addInPlace, bottom, centerOf, contains, copySign, multiply, overlaps, rectAt, right,
  subtract, withLength,
} from './geometry.js';

/* ═══════════════════════════════════════════════════════════════════════════
   PADDLE
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function makePaddle
 * @description A stationary paddle at `position` with default tuning.
 */
export function makePaddle(id: 1 | 2, position: Vector2, tuning: PaddleTuning = DEFAULT_TUNING): Paddle
{
  return {
    id,
    position:       { ...position },
    velocity:       { x: 0, y: 0 },
    hitboxOffset:   { x: 0, y: 0 },
    hitboxSize:     { ...PADDLE_SIZE },
    bounds:         { ...PLAY_BOUNDS },
    tuning:         { ...tuning },
    lastPressTimer: 0,
    bufferedMove:   'NONE',
    reflectionSign: { ...PADDLE_REFLECTION_SIGN },
    stunTimer:      0,
    reloadTimer:    0,
  };
}

export function paddleHitbox(paddle: Paddle): Rect
{
  return rectAt(paddle.position, paddle.hitboxOffset, paddle.hitboxSize);
}

/** A stunned paddle ignores control and cannot shoot. */
export function isStunned(paddle: Paddle): boolean
{
  return paddle.stunTimer > 0;
}

export function applyUpImpulse(paddle: Paddle): void
{
  paddle.velocity.y -= paddle.tuning.impulse;
}

export function applyDownImpulse(paddle: Paddle): void
{
  paddle.velocity.y += paddle.tuning.impulse;
}

/**
 * @function controlPaddle
 * @description Debounced control.  While lastPressTimer is running the
 *              command is only remembered in bufferedMove (and never
 *              replayed); otherwise the impulse applies at once and the
 *              timer restarts at tuning.controlDelay.
 *
 * @returns true if an impulse was applied.
 */
export function controlPaddle(paddle: Paddle, mode: MoveMode): boolean
{
  if (isStunned(paddle)) return false;

  if (paddle.lastPressTimer > 0)
  {
    paddle.bufferedMove = mode;
    return false;
  }

  if (mode === 'UP') applyUpImpulse(paddle);
  else               applyDownImpulse(paddle);

  paddle.lastPressTimer = paddle.tuning.controlDelay;
  paddle.bufferedMove   = 'NONE';
  return true;
}

/**
 * @function clampPaddle
 * @description Snaps the hitbox one unit inside any bound edge it crossed.
 *              Paddles stop at walls; velocity is left alone.
 */
export function clampPaddle(paddle: Paddle): void
{
  const { bounds, hitboxOffset } = paddle;
  let box = paddleHitbox(paddle);

  if (box.x < bounds.x)
  {
    paddle.position.x = bounds.x + PADDLE_CLAMP_INSET - hitboxOffset.x;
    box = paddleHitbox(paddle);
  }
  if (right(box) > right(bounds))
  {
    paddle.position.x = right(bounds) - box.w - PADDLE_CLAMP_INSET - hitboxOffset.x;
  }
  if (box.y < bounds.y)
  {
    paddle.position.y = bounds.y + PADDLE_CLAMP_INSET - hitboxOffset.y;
    box = paddleHitbox(paddle);
  }
  if (bottom(box) > bottom(bounds))
  {
    paddle.position.y = bottom(bounds) - box.h - PADDLE_CLAMP_INSET - hitboxOffset.y;
  }
}

/**
 * @function tickPaddle
 * @description Integrate, apply friction, clamp, then count timers down.
 */
export function tickPaddle(paddle: Paddle): void
{
  addInPlace(paddle.position, paddle.velocity);
  paddle.velocity.x *= PADDLE_FRICTION;
  paddle.velocity.y *= PADDLE_FRICTION;

  clampPaddle(paddle);

  if (paddle.lastPressTimer > 0) paddle.lastPressTimer--;
  if (paddle.stunTimer > 0)      paddle.stunTimer--;
  if (paddle.reloadTimer > 0)    paddle.reloadTimer--;
}

/* ═══════════════════════════════════════════════════════════════════════════
   BALL
   ═══════════════════════════════════════════════════════════════════════════ */

export function makeBall(position: Vector2, velocity: Vector2): Ball
{
  return {
    position:             { ...position },
    velocity:             { ...velocity },
    hitboxOffset:         { x: 0, y: 0 },
    hitboxSize:           { ...BALL_SIZE },
    bounds:               { ...PLAY_BOUNDS },
    wallBounceCooldown:   0,
    paddleBounceCooldown: 0,
  };
}

export function ballHitbox(ball: Ball): Rect
{
  return rectAt(ball.position, ball.hitboxOffset, ball.hitboxSize);
}

export type Wall = 'left' | 'right' | 'top' | 'bottom';

/**
 * @interface BallEvents
 * @description What happened during the most recent updateBall() call.
 */
export interface BallEvents
{
  /** Walls reflected off this tick (a corner gives two). */
  wallHits: Wall[];

  /** Paddle id that reflected the ball this tick, or null. */
  paddleHit: 1 | 2 | null;

  /** How many goal regions the ball overlapped this tick. */
  goalContacts: number;
}

/**
 * @function updateBall
 * @description Advances the ball by one tick.
 *
 * Order of operations:
 *   1. Integrate        position += velocity.  No friction.
 *   2. Wall bounces     every crossed edge reflects, unless the wall cooldown runs.
 *   3. Clamp            tuned per-edge nudges away from a still-violated wall.
 *   4. Cooldowns        both count down by one.
 *   5. Paddle bounce    first overlapping paddle wins.
 *   6. Goals            every overlapped goal fires its callback.
 *
 * @param ball     The ball (mutated in place).
 * @param paddles  Paddles in priority order.
 * @param goals    Goal regions to test after the physics.
 */
export function updateBall(ball: Ball, paddles: readonly Paddle[], goals: readonly Goal[]): BallEvents
{
  const events: BallEvents = { wallHits: [], paddleHit: null, goalContacts: 0 };

  addInPlace(ball.position, ball.velocity);

  bounceOffWalls(ball, events.wallHits);
  clampBall(ball);

  if (ball.wallBounceCooldown > 0)   ball.wallBounceCooldown--;
  if (ball.paddleBounceCooldown > 0) ball.paddleBounceCooldown--;

  for (const paddle of paddles)
  {
    /* The cooldown set by the first hit keeps any later paddle out. */
    if (ball.paddleBounceCooldown === 0 && overlaps(ballHitbox(ball), paddleHitbox(paddle)))
    {
      bounceOffPaddle(ball, paddle);
      events.paddleHit = paddle.id;
    }
  }

  const box = ballHitbox(ball);
  for (const goal of goals)
  {
    if (overlaps(goal.region, box))
    {
      goal.onCollide();
      events.goalContacts++;
    }
  }

  return events;
}

/**
 * @function bounceOffWalls
 * @description Each crossed edge negates the perpendicular velocity
 *              component and steps the ball once more so it leaves the
 *              wall.  All four edges are tested, so a corner reflects both
 *              axes in one tick.  Nothing happens while the cooldown runs.
 */
function bounceOffWalls(ball: Ball, hits: Wall[]): void
{
  if (ball.wallBounceCooldown > 0) return;

  const { bounds } = ball;

  if (ballHitbox(ball).x < bounds.x)
  {
    reflect(ball, 'x');
    hits.push('left');
  }
  if (right(ballHitbox(ball)) > right(bounds))
  {
    reflect(ball, 'x');
    hits.push('right');
  }
  if (ballHitbox(ball).y < bounds.y)
  {
    reflect(ball, 'y');
    hits.push('top');
  }
  if (bottom(ballHitbox(ball)) > bottom(bounds))
  {
    reflect(ball, 'y');
    hits.push('bottom');
  }
}

function reflect(ball: Ball, axis: 'x' | 'y'): void
{
  ball.velocity[axis] = -ball.velocity[axis];
  addInPlace(ball.position, ball.velocity);
  ball.wallBounceCooldown = WALL_BOUNCE_INTERVAL;
}

/**
 * @function clampBall
 * @description Per-edge nudges for a ball still past a wall after the
 *              bounce step.  The offsets are deliberately asymmetric:
 *                left   → wall + 21
 *                right  → wall + hitbox width   (outside; despawns)
 *                top    → wall + velocity.y
 *                bottom → wall + hitbox height  (outside; despawns)
 */
function clampBall(ball: Ball): void
{
  const { bounds } = ball;

  if (ballHitbox(ball).x < bounds.x)
  {
    ball.position.x = bounds.x + BALL_CLAMP_LEFT_INSET;
  }
  if (right(ballHitbox(ball)) > right(bounds))
  {
    ball.position.x = right(bounds) + ball.hitboxSize.w;
  }
  if (ballHitbox(ball).y < bounds.y)
  {
    ball.position.y = bounds.y + ball.velocity.y;
  }
  if (bottom(ballHitbox(ball)) > bottom(bounds))
  {
    ball.position.y = bottom(bounds) + ball.hitboxSize.h;
  }
}

/**
 * @function bounceOffPaddle
 * @description New velocity points from the paddle centre to the ball
 *              centre at BALL_SPEED.  Its per-axis sign comes from the old
 *              velocity multiplied by the paddle's reflection mask, so the
 *              ball always leaves horizontally away from where it came from.
 */
function bounceOffPaddle(ball: Ball, paddle: Paddle): void
{
  const sign = multiply(ball.velocity, paddle.reflectionSign);
  const diff = subtract(centerOf(ballHitbox(ball)), centerOf(paddleHitbox(paddle)));

  const direction = withLength(diff, BALL_SPEED) ?? { ...PADDLE_BOUNCE_FALLBACK };

  /* A purely vertical ball would never reach either side. */
  if (direction.x === 0) direction.x = 1;

  ball.velocity = {
    x: copySign(direction.x, sign.x),
    y: copySign(direction.y, sign.y),
  };
  ball.paddleBounceCooldown = PADDLE_BOUNCE_INTERVAL;
}

/* ═══════════════════════════════════════════════════════════════════════════
   GOALS
   ═══════════════════════════════════════════════════════════════════════════ */

export function makeGoal(region: Rect, onCollide: () => void): Goal
{
  return { region: { ...region }, onCollide };
}

/* ═══════════════════════════════════════════════════════════════════════════
   RESPAWN
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function respawnBall
 * @description A fresh ball at the arena centre.  Velocity is a random
 *              vector with both components in [-10, 10), rescaled to
 *              BALL_SPEED; a zero-length or purely vertical draw falls back
 *              to RESPAWN_FALLBACK_VELOCITY.
 *
 * @param rng  Returns values in [0, 1); called exactly twice (x then y).
 */
export function respawnBall(rng: Rng = Math.random): Ball
{
  const candidate: Vector2 = {
    x: rng() * RESPAWN_RANGE * 2 - RESPAWN_RANGE,
    y: rng() * RESPAWN_RANGE * 2 - RESPAWN_RANGE,
  };

  const scaled   = candidate.x !== 0 ? withLength(candidate, BALL_SPEED) : null;
  const velocity = scaled ?? { ...RESPAWN_FALLBACK_VELOCITY };

  return makeBall(ARENA_CENTER, velocity);
}

/* ═══════════════════════════════════════════════════════════════════════════
   PROJECTILES
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function tryShoot
 * @description Fires a projectile from the shooter's hitbox centre toward
 *              the opposing side, if the shooter is reloaded and not stunned.
 *
 * @returns true if a projectile was fired.
 */
export function tryShoot(shooter: Paddle, projectiles: Projectile[]): boolean
{
  if (shooter.reloadTimer > 0 || isStunned(shooter)) return false;

  const origin    = centerOf(paddleHitbox(shooter));
  const direction = shooter.id === 1 ? 1 : -1; // player shoots right, bot shoots left

  projectiles.push({
    owner:    shooter.id,
    position: { x: origin.x - PROJECTILE_SIZE.w / 2, y: origin.y - PROJECTILE_SIZE.h / 2 },
    velocity: { x: direction * PROJECTILE_SPEED, y: 0 },
    size:     { ...PROJECTILE_SIZE },
  });
  shooter.reloadTimer = RELOAD_PERIOD;
  return true;
}

export function projectileRect(projectile: Projectile): Rect
{
  return rectAt(projectile.position, { x: 0, y: 0 }, projectile.size);
}

/**
 * @function updateProjectiles
 * @description Moves every projectile one tick.  A projectile leaving
 *              `despawn` is dropped; one overlapping the paddle it was
 *              aimed at stuns that paddle for STUN_PERIOD and is dropped.
 *
 * @returns Ids of the paddles stunned this tick.
 */
export function updateProjectiles(
  projectiles: Projectile[],
  paddles: readonly Paddle[],
  despawn: Rect,
): Array<1 | 2>
{
  const stunned: Array<1 | 2> = [];

  /* Iterate backwards so splice() doesn't skip elements. */
  for (let i = projectiles.length - 1; i >= 0; i--)
  {
    const projectile = projectiles[i];
    addInPlace(projectile.position, projectile.velocity);

    const box = projectileRect(projectile);
    if (!contains(despawn, box))
    {
      projectiles.splice(i, 1);
      continue;
    }

    const target = paddles.find((p) => p.id !== projectile.owner && overlaps(box, paddleHitbox(p)));
    if (target)
    {
      target.stunTimer = STUN_PERIOD;
      stunned.push(target.id);
      projectiles.splice(i, 1);
    }
  }

  return stunned;
}
