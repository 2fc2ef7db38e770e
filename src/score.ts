/**
 * @file score.ts
 * @description Score counters with a shared post-score cooldown.
 *
 * A ball sitting in a goal region fires the goal callback every tick; the
 * cooldown is what turns that into a single point.
 */

import type { ScoreBoard } from './types.js';
import { SCORE_COOLDOWN } from './constants.js';

export function makeScoreBoard(): ScoreBoard
{
  return { playerScore: 0, botScore: 0, cooldown: 0 };
}

/**
 * @function scoreLeftGoal
 * @description Ball reached the player's goal: the bot scores.
 * @returns true if the point counted.
 */
export function scoreLeftGoal(board: ScoreBoard): boolean
{
  if (board.cooldown > 0) return false;
  board.botScore++;
  board.cooldown = SCORE_COOLDOWN;
  return true;
}

/**
 * @function scoreRightGoal
 * @description Ball reached the bot's goal: the player scores.
 * @returns true if the point counted.
 */
export function scoreRightGoal(board: ScoreBoard): boolean
{
  if (board.cooldown > 0) return false;
  board.playerScore++;
  board.cooldown = SCORE_COOLDOWN;
  return true;
}

export function tickScoreBoard(board: ScoreBoard): void
{
  if (board.cooldown > 0) board.cooldown--;
}

/** Only the tutorial calls this. */
export function resetScoreBoard(board: ScoreBoard): void
{
  board.playerScore = 0;
  board.botScore    = 0;
  board.cooldown    = 0;
}
