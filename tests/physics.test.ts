/**
 * @file physics.test.ts
 * @description Unit tests for physics.ts.
 *
 * ORGANISATION
 * ------------
 * Test sections mirror the section dividers in physics.ts:
 *   1. Paddle control and debounce
 *   2. tickPaddle (friction, clamp, timers)
 *   3. updateBall: movement and wall bounces
 *   4. updateBall: paddle bounces
 *   5. updateBall: goals
 *   6. respawnBall
 *   7. Projectiles
 */

import { describe, test, expect, vi } from 'vitest';
import
{
  ballHitbox, controlPaddle, makeGoal, paddleHitbox, projectileRect, respawnBall,
  tickPaddle, tryShoot, updateBall, updateProjectiles,
} from '../src/physics.js';
import
{
  ARENA_CENTER, DESPAWN_BOUNDS, LEFT_GOAL_REGION, PLAY_BOUNDS, RELOAD_PERIOD, STUN_PERIOD,
  WALL_BOUNCE_INTERVAL,
} from '../src/constants.js';
import { bottom, length, right } from '../src/geometry.js';
import type { Projectile } from '../src/types.js';
import { makeTestBall, makeTestPaddle, sequenceRng } from './helpers.js';

/* ═══════════════════════════════════════════════════════════════════════════
   1. Paddle control and debounce
   ═══════════════════════════════════════════════════════════════════════════ */

describe('controlPaddle', () =>
{
  test('applies the impulse and starts the debounce timer', () =>
  {
    const paddle = makeTestPaddle(1);
    expect(controlPaddle(paddle, 'UP')).toBe(true);
    expect(paddle.velocity.y).toBe(-10);
    expect(paddle.lastPressTimer).toBe(10);
  });

  test('DOWN pushes the paddle toward larger y', () =>
  {
    const paddle = makeTestPaddle(1);
    controlPaddle(paddle, 'DOWN');
    expect(paddle.velocity.y).toBe(10);
  });

  /** Two commands inside the control delay give exactly one impulse. */
  test('second command within the control delay is only buffered', () =>
  {
    const paddle = makeTestPaddle(1);
    controlPaddle(paddle, 'UP');
    for (let i = 0; i < 5; i++) tickPaddle(paddle);

    const velocityBefore = paddle.velocity.y;
    expect(controlPaddle(paddle, 'DOWN')).toBe(false);
    expect(paddle.velocity.y).toBe(velocityBefore);
    expect(paddle.bufferedMove).toBe('DOWN');
  });

  test('accepts a new command once controlDelay ticks have passed', () =>
  {
    const paddle = makeTestPaddle(1);
    controlPaddle(paddle, 'UP');
    for (let i = 0; i < 10; i++) tickPaddle(paddle);

    expect(paddle.lastPressTimer).toBe(0);
    expect(controlPaddle(paddle, 'UP')).toBe(true);
    expect(paddle.bufferedMove).toBe('NONE');
  });

  test('a buffered move is never replayed', () =>
  {
    const paddle = makeTestPaddle(1);
    controlPaddle(paddle, 'UP');
    controlPaddle(paddle, 'DOWN');
    for (let i = 0; i < 10; i++) tickPaddle(paddle);

    expect(paddle.velocity.y).toBeLessThan(0);
    expect(paddle.bufferedMove).toBe('DOWN');
  });

  test('a stunned paddle ignores control entirely', () =>
  {
    const paddle = makeTestPaddle(1, { stunTimer: 5 });
    expect(controlPaddle(paddle, 'UP')).toBe(false);
    expect(paddle.velocity.y).toBe(0);
    expect(paddle.bufferedMove).toBe('NONE');
    expect(paddle.lastPressTimer).toBe(0);
  });

  test('uses the impulse from the paddle tuning', () =>
  {
    const paddle = makeTestPaddle(2, { tuning: { impulse: 5, controlDelay: 20 } });
    controlPaddle(paddle, 'DOWN');
    expect(paddle.velocity.y).toBe(5);
    expect(paddle.lastPressTimer).toBe(20);
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   2. tickPaddle
   ═══════════════════════════════════════════════════════════════════════════ */

describe('tickPaddle', () =>
{
  test('moves by the velocity, then applies friction', () =>
  {
    const paddle = makeTestPaddle(1, { velocity: { x: 0, y: -10 } });
    tickPaddle(paddle);
    expect(paddle.position.y).toBe(118);
    expect(paddle.velocity.y).toBeCloseTo(-9, 10);
  });

  test('snaps one unit inside the top bound', () =>
  {
    const paddle = makeTestPaddle(1, { position: { x: 30, y: 0 } });
    tickPaddle(paddle);
    expect(paddle.position.y).toBe(PLAY_BOUNDS.y + 1);
  });

  test('snaps one unit inside the bottom bound', () =>
  {
    const paddle = makeTestPaddle(1, { position: { x: 30, y: 300 } });
    tickPaddle(paddle);
    expect(paddle.position.y).toBe(bottom(PLAY_BOUNDS) - 50 - 1);
  });

  /** The hitbox stays inside the bounds whatever the player does. */
  test('hitbox never leaves the bounds over a long sequence of commands', () =>
  {
    const paddle = makeTestPaddle(1);
    for (let i = 0; i < 300; i++)
    {
      controlPaddle(paddle, Math.floor(i / 60) % 2 === 0 ? 'UP' : 'DOWN');
      tickPaddle(paddle);

      const box = paddleHitbox(paddle);
      expect(box.y).toBeGreaterThanOrEqual(PLAY_BOUNDS.y);
      expect(bottom(box)).toBeLessThanOrEqual(bottom(PLAY_BOUNDS));
    }
  });

  test('counts the debounce, stun and reload timers down', () =>
  {
    const paddle = makeTestPaddle(2, { lastPressTimer: 1, stunTimer: 3, reloadTimer: 2 });
    tickPaddle(paddle);
    expect(paddle.lastPressTimer).toBe(0);
    expect(paddle.stunTimer).toBe(2);
    expect(paddle.reloadTimer).toBe(1);

    tickPaddle(paddle);
    expect(paddle.lastPressTimer).toBe(0);
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   3. updateBall: movement and wall bounces
   ═══════════════════════════════════════════════════════════════════════════ */

describe('updateBall: walls', () =>
{
  /** The ball keeps its speed between hits. */
  test('moves by its velocity with no friction', () =>
  {
    const ball = makeTestBall({ position: { x: 200, y: 100 }, velocity: { x: 8, y: 9 } });
    updateBall(ball, [], []);
    expect(ball.position).toEqual({ x: 208, y: 109 });
    expect(ball.velocity).toEqual({ x: 8, y: 9 });
  });

  test('reflects off the right wall and steps back inside', () =>
  {
    const ball = makeTestBall({ position: { x: 488, y: 109 }, velocity: { x: 8, y: 9 } });
    const events = updateBall(ball, [], []);

    expect(events.wallHits).toEqual(['right']);
    expect(ball.velocity).toEqual({ x: -8, y: 9 });
    expect(ball.position).toEqual({ x: 488, y: 127 });
    expect(ball.wallBounceCooldown).toBe(WALL_BOUNCE_INTERVAL - 1);
  });

  /** A ball heading right at (8, 9) flips x exactly once when it reaches the wall. */
  test('x velocity flips exactly once on the way in and out', () =>
  {
    const player = makeTestPaddle(1);
    const ball   = makeTestBall({ position: { x: 440, y: 100 }, velocity: { x: 8, y: 9 } });

    let flips = 0;
    let flipTick = -1;
    for (let tick = 1; tick <= 20; tick++)
    {
      const before = Math.sign(ball.velocity.x);
      updateBall(ball, [player], []);
      if (Math.sign(ball.velocity.x) !== before)
      {
        flips++;
        flipTick = tick;
      }
    }

    expect(flips).toBe(1);
    expect(flipTick).toBe(7);
  });

  /** Still penetrating, but the cooldown blocks another reflection. */
  test('cannot reflect again until the cooldown has run out', () =>
  {
    const ball = makeTestBall({ position: { x: 500, y: 100 }, velocity: { x: 8, y: 0 } });

    expect(updateBall(ball, [], []).wallHits).toEqual(['right']);
    expect(ball.velocity.x).toBe(-8);

    for (let tick = 2; tick <= 10; tick++)
    {
      const events = updateBall(ball, [], []);
      expect(events.wallHits).toEqual([]);
      expect(ball.velocity.x).toBe(-8);
      expect(right(ballHitbox(ball))).toBeGreaterThan(right(PLAY_BOUNDS));
    }

    expect(updateBall(ball, [], []).wallHits).toEqual(['right']);
    expect(ball.velocity.x).toBe(8);
  });

  test('the right-wall clamp pushes the ball out by its own width', () =>
  {
    const ball = makeTestBall({ position: { x: 500, y: 100 }, velocity: { x: 8, y: 0 } });
    updateBall(ball, [], []);
    expect(ball.position.x).toBe(right(PLAY_BOUNDS) + 10);
  });

  test('reflects both axes in a corner', () =>
  {
    const ball = makeTestBall({ position: { x: 495, y: 230 }, velocity: { x: 8, y: 8 } });
    const events = updateBall(ball, [], []);
    expect(events.wallHits).toEqual(['right', 'bottom']);
    expect(ball.velocity).toEqual({ x: -8, y: -8 });
  });

  test('the left-wall clamp places the ball 21 units inside', () =>
  {
    const ball = makeTestBall({ position: { x: 10, y: 100 }, velocity: { x: -3, y: 0 } });
    updateBall(ball, [], []);
    expect(ball.velocity.x).toBe(3);
    expect(ball.position.x).toBe(PLAY_BOUNDS.x + 21);
  });

  test('the top-wall clamp offsets by the vertical velocity', () =>
  {
    const ball = makeTestBall({ position: { x: 100, y: 10 }, velocity: { x: 0, y: -3 } });
    updateBall(ball, [], []);
    expect(ball.velocity.y).toBe(3);
    expect(ball.position.y).toBe(PLAY_BOUNDS.y + 3);
  });

  test('both cooldowns count down every tick', () =>
  {
    const ball = makeTestBall({ wallBounceCooldown: 4, paddleBounceCooldown: 2 });
    updateBall(ball, [], []);
    expect(ball.wallBounceCooldown).toBe(3);
    expect(ball.paddleBounceCooldown).toBe(1);
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   4. updateBall: paddle bounces
   ═══════════════════════════════════════════════════════════════════════════ */

describe('updateBall: paddles', () =>
{
  test('leaves the paddle at speed 10 with signs from the reflection mask', () =>
  {
    const player = makeTestPaddle(1);
    const ball   = makeTestBall({ position: { x: 35, y: 148 }, velocity: { x: -8, y: 3 } });

    const events = updateBall(ball, [player], []);

    expect(events.paddleHit).toBe(1);
    expect(length(ball.velocity)).toBeCloseTo(10, 10);
    expect(ball.velocity.x).toBeGreaterThan(0);   // -8 × -1
    expect(ball.velocity.y).toBeGreaterThan(0);   //  3 ×  1
    expect(ball.velocity.x).toBeCloseTo(Math.SQRT1_2 * 10, 10);
    expect(ball.paddleBounceCooldown).toBe(10);
  });

  test('no reflection while the paddle cooldown runs', () =>
  {
    const player = makeTestPaddle(1);
    const ball   = makeTestBall({
      position: { x: 35, y: 148 }, velocity: { x: -8, y: 3 }, paddleBounceCooldown: 5,
    });

    const events = updateBall(ball, [player], []);

    expect(events.paddleHit).toBeNull();
    expect(ball.velocity).toEqual({ x: -8, y: 3 });
    expect(ball.paddleBounceCooldown).toBe(4);
  });

  test('coinciding centres use the (8, 6) fallback direction', () =>
  {
    const player = makeTestPaddle(1);
    const ball   = makeTestBall({ position: { x: 30, y: 148 }, velocity: { x: 0, y: 0 } });

    updateBall(ball, [player], []);

    /* 0 × -1 is negative zero, so x takes the negative sign. */
    expect(ball.velocity).toEqual({ x: -8, y: 6 });
  });

  test('a purely vertical direction gets an x component of 1', () =>
  {
    const player = makeTestPaddle(1);
    const ball   = makeTestBall({ position: { x: 32, y: 120 }, velocity: { x: -2, y: 0 } });

    updateBall(ball, [player], []);

    expect(ball.velocity.x).toBe(1);
    expect(ball.velocity.y).toBeCloseTo(10, 10);
  });

  test('only the first overlapping paddle reflects the ball', () =>
  {
    const player = makeTestPaddle(1);
    const bot    = makeTestPaddle(2, { position: { x: 30, y: 128 } });
    const ball   = makeTestBall({ position: { x: 35, y: 148 }, velocity: { x: -8, y: 3 } });

    const events = updateBall(ball, [player, bot], []);

    expect(events.paddleHit).toBe(1);
    expect(ball.velocity.x).toBeGreaterThan(0);
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   5. updateBall: goals
   ═══════════════════════════════════════════════════════════════════════════ */

describe('updateBall: goals', () =>
{
  test('calls the goal callback on every tick of overlap', () =>
  {
    const onCollide = vi.fn();
    const goal = makeGoal(LEFT_GOAL_REGION, onCollide);
    const ball = makeTestBall({ position: { x: 25, y: 100 } });

    updateBall(ball, [], [goal]);
    const events = updateBall(ball, [], [goal]);

    expect(onCollide).toHaveBeenCalledTimes(2);
    expect(events.goalContacts).toBe(1);
  });

  test('does not call the callback without overlap', () =>
  {
    const onCollide = vi.fn();
    updateBall(makeTestBall(), [], [makeGoal(LEFT_GOAL_REGION, onCollide)]);
    expect(onCollide).not.toHaveBeenCalled();
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   6. respawnBall
   ═══════════════════════════════════════════════════════════════════════════ */

describe('respawnBall', () =>
{
  test('places the ball at the arena centre at speed 10', () =>
  {
    const ball = respawnBall(sequenceRng(0.75, 0.25));
    expect(ball.position).toEqual(ARENA_CENTER);
    expect(ball.velocity.x).toBeCloseTo(Math.SQRT1_2 * 10, 10);
    expect(ball.velocity.y).toBeCloseTo(-Math.SQRT1_2 * 10, 10);
  });

  test('falls back to (8, 9) when the x component is zero', () =>
  {
    const ball = respawnBall(sequenceRng(0.5, 0.9));
    expect(ball.velocity).toEqual({ x: 8, y: 9 });
  });

  test('falls back to (8, 9) for a zero-length draw', () =>
  {
    expect(respawnBall(sequenceRng(0.5)).velocity).toEqual({ x: 8, y: 9 });
  });

  test('draws exactly two random values', () =>
  {
    const rng = vi.fn(() => 0.1);
    respawnBall(rng);
    expect(rng).toHaveBeenCalledTimes(2);
  });

  test('starts with both cooldowns at zero', () =>
  {
    const ball = respawnBall(sequenceRng(0.2, 0.7));
    expect(ball.wallBounceCooldown).toBe(0);
    expect(ball.paddleBounceCooldown).toBe(0);
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   7. Projectiles
   ═══════════════════════════════════════════════════════════════════════════ */

describe('tryShoot', () =>
{
  test('fires from the hitbox centre toward the bot', () =>
  {
    const player = makeTestPaddle(1);
    const projectiles: Projectile[] = [];

    expect(tryShoot(player, projectiles)).toBe(true);
    expect(projectiles).toHaveLength(1);
    expect(projectiles[0].owner).toBe(1);
    expect(projectiles[0].position).toEqual({ x: 32, y: 152 });
    expect(projectiles[0].velocity).toEqual({ x: 12, y: 0 });
    expect(player.reloadTimer).toBe(RELOAD_PERIOD);
  });

  test('the bot fires toward the player', () =>
  {
    const projectiles: Projectile[] = [];
    tryShoot(makeTestPaddle(2), projectiles);
    expect(projectiles[0].velocity.x).toBe(-12);
  });

  test('refuses while reloading', () =>
  {
    const player = makeTestPaddle(1);
    const projectiles: Projectile[] = [];
    tryShoot(player, projectiles);
    expect(tryShoot(player, projectiles)).toBe(false);
    expect(projectiles).toHaveLength(1);
  });

  test('refuses while stunned', () =>
  {
    const projectiles: Projectile[] = [];
    expect(tryShoot(makeTestPaddle(1, { stunTimer: 1 }), projectiles)).toBe(false);
    expect(projectiles).toHaveLength(0);
  });
});

describe('updateProjectiles', () =>
{
  function shot(owner: 1 | 2, x: number, y: number, vx: number): Projectile
  {
    return { owner, position: { x, y }, velocity: { x: vx, y: 0 }, size: { w: 6, h: 2 } };
  }

  test('stuns the opposing paddle and removes the projectile', () =>
  {
    const player = makeTestPaddle(1);
    const bot    = makeTestPaddle(2);
    const projectiles = [shot(1, 465, 150, 12)];

    const stunned = updateProjectiles(projectiles, [player, bot], DESPAWN_BOUNDS);

    expect(stunned).toEqual([2]);
    expect(bot.stunTimer).toBe(STUN_PERIOD);
    expect(projectiles).toHaveLength(0);
  });

  test('passes through the paddle that fired it', () =>
  {
    const player = makeTestPaddle(1);
    const projectiles = [shot(1, 30, 150, 2)];

    expect(updateProjectiles(projectiles, [player], DESPAWN_BOUNDS)).toEqual([]);
    expect(player.stunTimer).toBe(0);
    expect(projectiles).toHaveLength(1);
    expect(projectileRect(projectiles[0]).x).toBe(32);
  });

  test('drops a projectile that leaves the despawn bound', () =>
  {
    const projectiles = [shot(1, 500, 100, 12), shot(2, 200, 100, -12)];
    updateProjectiles(projectiles, [], DESPAWN_BOUNDS);
    expect(projectiles).toHaveLength(1);
    expect(projectiles[0].owner).toBe(2);
    expect(projectiles[0].position.x).toBe(188);
  });
});
