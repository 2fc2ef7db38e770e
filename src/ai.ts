/**
 * @file ai.ts
 * @description Bot policies that drive the right-side paddle without human input.
 *
 * TWO POLICIES
 * ------------
 *   BasicBotPolicy      pure reactive follow: push toward the ball's
 *                       vertical centre every tick.  The paddle's own
 *                       debounce (tuning.controlDelay) is what limits it.
 *
 *   TutorialBotPolicy   only differs while the tutorial's shooting probe is
 *                       running.  Close to the ball it plays like the basic
 *                       bot (unless stunned); far from the ball it lines up
 *                       with the player and fires projectiles at them.
 *                       Outside that stage it is the basic bot.
 *
 * Policies only issue commands (controlPaddle / tryShoot); they never move
 * a paddle directly, so stun and debounce apply to them like to the player.
 */

import type { MatchState, Paddle } from './types.js';
import { BOT_ENGAGE_RANGE } from './constants.js';
import { ballHitbox, controlPaddle, isStunned, paddleHitbox, tryShoot } from './physics.js';
import { centerOf } from './geometry.js';

/**
 * @interface BotPolicy
 * @description Strategy consulted once per tick, after the ball has moved.
 */
export interface BotPolicy
{
  decide(state: MatchState): void;
}

/**
 * @function followTarget
 * @description Pushes `paddle` toward `targetY`.  Both comparisons run, so
 *              an exact tie issues nothing.
 *
 * @returns true if the paddle was not aligned (a command was issued).
 */
export function followTarget(paddle: Paddle, targetY: number): boolean
{
  const centerY = centerOf(paddleHitbox(paddle)).y;
  let issued = false;

  if (centerY > targetY)
  {
    controlPaddle(paddle, 'UP');
    issued = true;
  }
  if (centerY < targetY)
  {
    controlPaddle(paddle, 'DOWN');
    issued = true;
  }

  return issued;
}

/**
 * @class BasicBotPolicy
 * @description Follows the ball's vertical centre.
 */
export class BasicBotPolicy implements BotPolicy
{
  decide(state: MatchState): void
  {
    followTarget(state.bot, centerOf(ballHitbox(state.ball)).y);
  }
}

/**
 * @class TutorialBotPolicy
 * @description Offense/defense policy for the tutorial's shooting probe.
 *
 * @param isActive  Queried every tick; false falls back to `fallback`.
 */
export class TutorialBotPolicy implements BotPolicy
{
  constructor(
    private readonly isActive: () => boolean,
    private readonly fallback: BotPolicy = new BasicBotPolicy(),
  ) {}

  decide(state: MatchState): void
  {
    if (!this.isActive())
    {
      this.fallback.decide(state);
      return;
    }

    const { bot, player, ball, projectiles } = state;
    const botCenter  = centerOf(paddleHitbox(bot));
    const ballCenter = centerOf(ballHitbox(ball));

    if (Math.abs(botCenter.x - ballCenter.x) <= BOT_ENGAGE_RANGE)
    {
      /* Ball is close: play it, unless a projectile knocked us out. */
      if (!isStunned(bot)) followTarget(bot, ballCenter.y);
      return;
    }

    /* Ball is far: line up with the player and shoot while not aligned. */
    if (followTarget(bot, centerOf(paddleHitbox(player)).y))
    {
      tryShoot(bot, projectiles);
    }
  }
}
