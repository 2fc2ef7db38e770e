/**
 * @file tutorial.ts
 * @description Tutorial scene: a Match with the tutorial bot, overlaid by
 *              the TutorialStateMachine.
 *
 * While the stage machine is paused the match does not tick and the frame
 * shows only dialogue.  Otherwise the match runs and the stage machine looks
 * at the scores after every tick.
 *
 * Keys:
 *   Space / Enter  advance the dialogue
 *   W / S          move (running stages only)
 *   D              shoot, once shooting is unlocked
 *   Escape         reset the scores and return to the menu
 */

import type { MouseButton, RawEvent, RawEventType, Scene, SceneSettings, Vector2 } from '../types.js';
import type { SceneContext } from './sceneManager.js';
import
{
  COLOR_BG,
  KEY_ADVANCE, KEY_BACK, KEY_CONFIRM, KEY_MOVE_DOWN, KEY_MOVE_UP, KEY_SHOOT,
  SURFACE_SIZE,
} from '../constants.js';
import { TutorialBotPolicy } from '../ai.js';
import { Match } from '../match.js';
import { TutorialStateMachine } from '../tutorial.js';
import { Surface } from '../surface.js';

export class TutorialScene implements Scene
{
  readonly settings: SceneSettings;
  readonly match: Match;
  readonly machine: TutorialStateMachine;

  private court: Surface | null = null;

  constructor(private readonly ctx: SceneContext)
  {
    this.settings = {
      size:         { ...SURFACE_SIZE },
      scale:        { ...ctx.scale },
      title:        'Pong Tutorial',
      eventsFilter: new Set<RawEventType>(['KEY_DOWN']),
    };

    this.match = new Match({
      policy: new TutorialBotPolicy(() => this.machine.stage === 'SHOOT_PROBE_3'),
      logger: ctx.logger,
      rng:    ctx.rng,
    });
    this.machine = new TutorialStateMachine(this.match, () => this.leave(), ctx.logger);
  }

  initialize(): void
  {
    if (this.court) return;
    this.court = this.ctx.renderer.buildCourt(this.settings.size);
  }

  isInitialized(): boolean
  {
    return this.court !== null;
  }

  update(): void
  {
    if (this.machine.isPaused()) return;

    this.match.tick();
    this.machine.checkStage();
  }

  draw(): Surface
  {
    const { renderer } = this.ctx;
    const frame = new Surface(this.settings.size.w, this.settings.size.h);

    if (this.machine.isPaused())
    {
      frame.clear(COLOR_BG);
      renderer.drawDialogue(frame, this.machine.dialogue());
      return frame;
    }

    if (this.court) frame.blit(this.court);
    renderer.drawMatch(frame, this.match);
    renderer.drawScores(frame, this.match.scores);
    return frame;
  }

  handleInput(key: string): void
  {
    if (this.machine.isPaused()) return;

    if (key === KEY_MOVE_UP)   this.match.controlPlayer('UP');
    if (key === KEY_MOVE_DOWN) this.match.controlPlayer('DOWN');
  }

  handleMousePress(_button: MouseButton, _pos: Vector2): void
  {
    /* keyboard only */
  }

  handleEvent(event: RawEvent): void
  {
    if (event.type !== 'KEY_DOWN') return;

    switch (event.key)
    {
      case KEY_ADVANCE:
      case KEY_CONFIRM:
        this.machine.advance();
        break;
      case KEY_SHOOT:
        if (!this.machine.isPaused()) this.match.playerShoot();
        break;
      case KEY_BACK:
        this.leave();
        break;
      default:
        break;
    }
  }

  private leave(): void
  {
    this.machine.notifyLeft();
    this.match.resetScores();
    this.ctx.host.scene = 'MENU';
  }
}
