/**
 * @file tutorial.ts
 * @description Tutorial stage machine: dialogue, pause state and the
 *              score-driven branches that retune the bot.
 *
 * STAGE FLOW
 * ----------
 *   INTRO → MOVE_HINT → DIFFICULTY_PROBE ──┬─ bot ≥ 10 ────────────→ SHOOT_EXPLAIN
 *                                          ├─ bot leads 2:1 ───────→ HARD_EXPLAIN ─┐
 *                                          └─ player leads 2:1 ────→ EASY_EXPLAIN ─┤
 *                                                                                  ↓
 *   SHOOT_EXPLAIN → SHOOT_PROBE_1 → SHOOT_PROBE_2 → SHOOT_PROBE_3 ──→ SUCCESS | FAIL → COMBAT
 *
 *   COMBAT, left and re-entered → RETURN_WARN_1 → 2 → 3 → 4 → CLOSING → (menu)
 *
 * Paused stages show dialogue and wait for the advance key; the others run
 * the match and are left only through advanceCondition().
 *
 * HARD_EXPLAIN halves the bot's impulse and doubles its control delay, which
 * makes the bot easier to beat.  The stage is named after what the player
 * experienced during the probe (the bot was winning), not after its effect.
 */

import type { Logger } from 'pino';
import type { ScoreBoard, TutorialStage } from './types.js';
import type { Match } from './match.js';
import
{
  EASY_BRANCH_CONTROL_DELAY,
  PROBE_ESCALATE_SCORE, PROBE_LEAD_SCORE,
  SHOOT_PROBE_BOT_CAP, SHOOT_PROBE_FAIL_SCORE, SHOOT_PROBE_TARGET,
} from './constants.js';

/* ═══════════════════════════════════════════════════════════════════════════
   TRANSITION TABLES
   ═══════════════════════════════════════════════════════════════════════════ */

/** Where the advance key leads from each stage; null = no forward edge. */
const FORWARD: Record<TutorialStage, TutorialStage | null> =
{
  INTRO:            'MOVE_HINT',
  MOVE_HINT:        'DIFFICULTY_PROBE',
  DIFFICULTY_PROBE: null,
  EASY_EXPLAIN:     'SHOOT_EXPLAIN',
  HARD_EXPLAIN:     'SHOOT_EXPLAIN',
  SHOOT_EXPLAIN:    'SHOOT_PROBE_1',
  SHOOT_PROBE_1:    'SHOOT_PROBE_2',
  SHOOT_PROBE_2:    'SHOOT_PROBE_3',
  SHOOT_PROBE_3:    null,
  SUCCESS:          'COMBAT',
  FAIL:             'COMBAT',
  RETURN_WARN_1:    'RETURN_WARN_2',
  RETURN_WARN_2:    'RETURN_WARN_3',
  RETURN_WARN_3:    'RETURN_WARN_4',
  RETURN_WARN_4:    'CLOSING',
  CLOSING:          null,
  COMBAT:           null,
};

/** Stages that wait for the advance key instead of running the match. */
const PAUSED: ReadonlySet<TutorialStage> = new Set<TutorialStage>([
  'INTRO', 'MOVE_HINT',
  'EASY_EXPLAIN', 'HARD_EXPLAIN', 'SHOOT_EXPLAIN',
  'SHOOT_PROBE_1', 'SHOOT_PROBE_2',
  'SUCCESS', 'FAIL',
  'RETURN_WARN_1', 'RETURN_WARN_2', 'RETURN_WARN_3', 'RETURN_WARN_4',
  'CLOSING',
]);

const DIALOGUE: Record<TutorialStage, readonly string[]> =
{
  INTRO:            ['WELCOME TO THE PONG TRAINER.', 'I WILL BE YOUR OPPONENT TODAY.', '', 'PRESS SPACE TO CONTINUE.'],
  MOVE_HINT:        ['MOVE YOUR PADDLE WITH W AND S.', 'LET US SEE HOW YOU PLAY.'],
  DIFFICULTY_PROBE: [],
  EASY_EXPLAIN:     ['YOU ARE GOOD AT THIS.', 'I WILL REACT FASTER FROM NOW ON.'],
  HARD_EXPLAIN:     ['THAT WAS ROUGH FOR YOU.', 'I WILL SLOW DOWN A LITTLE.'],
  SHOOT_EXPLAIN:    ['TIME FOR SOMETHING NEW: SHOOTING.'],
  SHOOT_PROBE_1:    ['PRESS D TO FIRE AT MY PADDLE.', 'A HIT STUNS IT FOR A MOMENT.'],
  SHOOT_PROBE_2:    ['I CAN SHOOT TOO.', 'SCORE 3 POINTS TO FINISH.'],
  SHOOT_PROBE_3:    [],
  SUCCESS:          ['WELL DONE!', 'YOU HAVE LEARNED EVERYTHING I KNOW.'],
  FAIL:             ['NOT QUITE, BUT YOU GOT THROUGH.', 'KEEP PRACTISING.'],
  RETURN_WARN_1:    ['YOU CAME BACK?', 'THE TUTORIAL IS OVER.'],
  RETURN_WARN_2:    ['THERE IS NOTHING LEFT TO TEACH.'],
  RETURN_WARN_3:    ['REALLY. NOTHING.'],
  RETURN_WARN_4:    ['FINE. IF YOU INSIST...'],
  CLOSING:          ['GOODBYE.', '', 'PRESS SPACE TO RETURN TO THE MENU.'],
  COMBAT:           [],
};

/* ═══════════════════════════════════════════════════════════════════════════
   PURE HELPERS
   ═══════════════════════════════════════════════════════════════════════════ */

/** Cross-visit facts the score-driven branches depend on. */
export interface TutorialProgress
{
  /** Reached COMBAT, left the tutorial, and came back. */
  returnedAfterCompletion: boolean;
}

export function nextStage(stage: TutorialStage): TutorialStage | null
{
  return FORWARD[stage];
}

export function isPausedStage(stage: TutorialStage): boolean
{
  return PAUSED.has(stage);
}

export function dialogueFor(stage: TutorialStage): readonly string[]
{
  return DIALOGUE[stage];
}

/**
 * @function advanceCondition
 * @description Score-driven jump out of a running stage, if one applies.
 *              Branches are tested in order; the first match wins.
 */
export function advanceCondition(
  stage: TutorialStage,
  scores: Readonly<ScoreBoard>,
  progress: TutorialProgress,
): TutorialStage | null
{
  const { playerScore: player, botScore: bot } = scores;

  switch (stage)
  {
    case 'DIFFICULTY_PROBE':
      if (bot >= PROBE_ESCALATE_SCORE)                            return 'SHOOT_EXPLAIN';
      if (bot >= player * 2 && bot >= PROBE_LEAD_SCORE)           return 'HARD_EXPLAIN';
      if (player >= bot * 2 && player >= PROBE_LEAD_SCORE)        return 'EASY_EXPLAIN';
      return null;

    case 'SHOOT_PROBE_3':
      if (player >= SHOOT_PROBE_TARGET) return bot >= SHOOT_PROBE_FAIL_SCORE ? 'FAIL' : 'SUCCESS';
      if (bot >= SHOOT_PROBE_BOT_CAP)   return 'FAIL';
      return null;

    case 'COMBAT':
      return progress.returnedAfterCompletion ? 'RETURN_WARN_1' : null;

    default:
      return null;
  }
}

/* ═══════════════════════════════════════════════════════════════════════════
   STATE MACHINE
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @class TutorialStateMachine
 * @description Holds the current stage and applies each stage's entry
 *              effects to the match it drives.
 *
 * Entry effects:
 *   DIFFICULTY_PROBE, SHOOT_PROBE_3  reset scores and respawn the ball
 *   EASY_EXPLAIN                     bot control delay → 2
 *   HARD_EXPLAIN                     bot impulse ÷ 2, control delay × 2
 *   SHOOT_EXPLAIN                    unlock shooting
 *   COMBAT                           mark the tutorial completed
 */
export class TutorialStateMachine
{
  private current: TutorialStage = 'INTRO';
  private completed = false;
  private leftAfterCompletion = false;
  private sealed = false;

  private readonly log: Logger;

  /**
   * @param match   The match this tutorial runs on.
   * @param onExit  Called when CLOSING is advanced past.
   */
  constructor(
    private readonly match: Match,
    private readonly onExit: () => void,
    logger: Logger,
  )
  {
    this.log = logger.child({ component: 'tutorial' });
  }

  get stage(): TutorialStage
  {
    return this.current;
  }

  get isCompleted(): boolean
  {
    return this.completed;
  }

  /** True once the closing stage has been dismissed; the tutorial stays there. */
  get isSealed(): boolean
  {
    return this.sealed;
  }

  isPaused(): boolean
  {
    return isPausedStage(this.current);
  }

  dialogue(): readonly string[]
  {
    return dialogueFor(this.current);
  }

  /**
   * @method advance
   * @description Handles the advance key.  Ignored outside paused stages.
   * @returns true if the stage changed or the tutorial exited.
   */
  advance(): boolean
  {
    if (!this.isPaused()) return false;

    if (this.current === 'CLOSING')
    {
      this.sealed = true;
      this.log.info('tutorial closed');
      this.onExit();
      return true;
    }

    const next = nextStage(this.current);
    if (next === null) return false;

    this.enter(next);
    return true;
  }

  /**
   * @method checkStage
   * @description Called once per tick after the match has ticked.
   */
  checkStage(): void
  {
    const next = advanceCondition(this.current, this.match.scores, {
      returnedAfterCompletion: this.leftAfterCompletion,
    });
    if (next !== null) this.enter(next);
  }

  /** The player left the tutorial scene. */
  notifyLeft(): void
  {
    if (this.completed) this.leftAfterCompletion = true;
  }

  private enter(stage: TutorialStage): void
  {
    this.log.info({ from: this.current, to: stage }, 'stage changed');
    this.current = stage;

    const tuning = this.match.bot.tuning;

    switch (stage)
    {
      case 'DIFFICULTY_PROBE':
      case 'SHOOT_PROBE_3':
        this.match.resetRound();
        break;

      case 'EASY_EXPLAIN':
        this.match.setBotTuning({ ...tuning, controlDelay: EASY_BRANCH_CONTROL_DELAY });
        break;

      case 'HARD_EXPLAIN':
        this.match.setBotTuning({ impulse: tuning.impulse / 2, controlDelay: tuning.controlDelay * 2 });
        break;

      case 'SHOOT_EXPLAIN':
        this.match.shootingUnlocked = true;
        break;

      case 'COMBAT':
        this.completed = true;
        break;

      default:
        break;
    }
  }
}
