/**
 * @file match.ts
 * @description The rules of one match (two paddles, one ball, two goals)
 *              shared by the Game and Tutorial scenes.
 *
 * TICK ORDER
 * ----------
 *   1. Paddles          integrate, friction, clamp, timers (player, then bot)
 *   2. Ball             walls, paddles, goals (goal callbacks score)
 *   3. Bot decision     the BotPolicy reads the post-update state
 *   4. Projectiles      move, despawn, stun
 *   5. Score cooldown   counts down
 *   6. Respawn          a ball outside DESPAWN_BOUNDS is replaced at the centre
 *
 * The difference between the two scenes is only the BotPolicy passed in and
 * whether shooting has been unlocked.
 */

import type { Logger } from 'pino';
import type { Ball, Goal, MatchState, MoveMode, Paddle, PaddleTuning, Projectile, Rng, ScoreBoard } from './types.js';
import type { BotPolicy } from './ai.js';
import
{
  BOT_START, DESPAWN_BOUNDS, LEFT_GOAL_REGION, PLAYER_START, RIGHT_GOAL_REGION,
} from './constants.js';
import
{
  ballHitbox, controlPaddle, makeGoal, makePaddle, respawnBall, tickPaddle, tryShoot,
  updateBall, updateProjectiles,
} from './physics.js';
import { makeScoreBoard, resetScoreBoard, scoreLeftGoal, scoreRightGoal, tickScoreBoard } from './score.js';
import { contains } from './geometry.js';

export interface MatchOptions
{
  policy: BotPolicy;
  logger: Logger;

  /** Random source for respawn velocities.  Defaults to Math.random. */
  rng?: Rng;
}

/**
 * @class Match
 * @description Owns the entities of one match and advances them one tick
 *              at a time.  Exposes them read-only to bot policies through
 *              MatchState.
 */
export class Match implements MatchState
{
  readonly player: Paddle;
  readonly bot: Paddle;
  readonly goals: readonly Goal[];
  readonly scores: ScoreBoard = makeScoreBoard();
  readonly projectiles: Projectile[] = [];

  ball: Ball;

  /** Set by the tutorial; until then playerShoot() does nothing. */
  shootingUnlocked = false;

  private readonly policy: BotPolicy;
  private readonly rng: Rng;
  private readonly log: Logger;

  constructor({ policy, logger, rng = Math.random }: MatchOptions)
  {
    this.policy = policy;
    this.rng    = rng;
    this.log    = logger.child({ component: 'match' });

    this.player = makePaddle(1, PLAYER_START);
    this.bot    = makePaddle(2, BOT_START);
    this.ball   = respawnBall(this.rng);

    this.goals = [
      makeGoal(LEFT_GOAL_REGION, () =>
      {
        if (scoreLeftGoal(this.scores)) this.logScore('bot');
      }),
      makeGoal(RIGHT_GOAL_REGION, () =>
      {
        if (scoreRightGoal(this.scores)) this.logScore('player');
      }),
    ];
  }

  /** Advances every entity by one tick (see TICK ORDER above). */
  tick(): void
  {
    tickPaddle(this.player);
    tickPaddle(this.bot);

    const events = updateBall(this.ball, [this.player, this.bot], this.goals);
    if (events.wallHits.length > 0 || events.paddleHit !== null)
    {
      this.log.trace({ walls: events.wallHits, paddle: events.paddleHit }, 'ball bounced');
    }

    this.policy.decide(this);

    const stunned = updateProjectiles(this.projectiles, [this.player, this.bot], DESPAWN_BOUNDS);
    for (const id of stunned)
    {
      this.log.debug({ paddle: id }, 'paddle stunned');
    }

    tickScoreBoard(this.scores);

    if (!contains(DESPAWN_BOUNDS, ballHitbox(this.ball)))
    {
      this.respawn();
    }
  }

  controlPlayer(mode: MoveMode): boolean
  {
    return controlPaddle(this.player, mode);
  }

  /** @returns true if a projectile was fired. */
  playerShoot(): boolean
  {
    if (!this.shootingUnlocked) return false;
    return tryShoot(this.player, this.projectiles);
  }

  /** Replaces the ball with a fresh one at the arena centre. */
  respawn(): void
  {
    this.ball = respawnBall(this.rng);
    this.log.debug({ velocity: this.ball.velocity }, 'ball respawned');
  }

  resetScores(): void
  {
    resetScoreBoard(this.scores);
  }

  /** Scores back to zero and a new ball; paddles stay where they are. */
  resetRound(): void
  {
    this.resetScores();
    this.projectiles.length = 0;
    this.respawn();
  }

  /** Swaps the bot's tuning as a whole value. */
  setBotTuning(tuning: PaddleTuning): void
  {
    this.bot.tuning = { ...tuning };
    this.log.info({ tuning }, 'bot tuning changed');
  }

  private logScore(scorer: 'player' | 'bot'): void
  {
    this.log.info(
      { scorer, player: this.scores.playerScore, bot: this.scores.botScore },
      'goal',
    );
  }
}
