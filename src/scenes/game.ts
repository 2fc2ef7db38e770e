/**
 * @file game.ts
 * @description Free play against the basic bot.  W / S move the player's
 *              paddle, Escape goes back to the menu.  Scores persist across
 *              visits.
 */

import type { MouseButton, RawEvent, Scene, SceneSettings, Vector2 } from '../types.js';
import type { SceneContext } from './sceneManager.js';
import { KEY_BACK, KEY_MOVE_DOWN, KEY_MOVE_UP, SURFACE_SIZE } from '../constants.js';
import { BasicBotPolicy } from '../ai.js';
import { Match } from '../match.js';
import { Surface } from '../surface.js';

export class GameScene implements Scene
{
  readonly settings: SceneSettings;
  readonly match: Match;

  private court: Surface | null = null;

  constructor(private readonly ctx: SceneContext)
  {
    this.settings = { size: { ...SURFACE_SIZE }, scale: { ...ctx.scale }, title: 'Pong' };
    this.match    = new Match({ policy: new BasicBotPolicy(), logger: ctx.logger, rng: ctx.rng });
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
    this.match.tick();
  }

  draw(): Surface
  {
    const { renderer } = this.ctx;
    const frame = new Surface(this.settings.size.w, this.settings.size.h);

    if (this.court) frame.blit(this.court);
    renderer.drawMatch(frame, this.match);
    renderer.drawScores(frame, this.match.scores);

    return frame;
  }

  handleInput(key: string): void
  {
    if (key === KEY_MOVE_UP)   this.match.controlPlayer('UP');
    if (key === KEY_MOVE_DOWN) this.match.controlPlayer('DOWN');
  }

  handleMousePress(_button: MouseButton, _pos: Vector2): void
  {
    /* no mouse controls in play */
  }

  handleEvent(event: RawEvent): void
  {
    if (event.type === 'KEY_DOWN' && event.key === KEY_BACK)
    {
      this.ctx.host.scene = 'MENU';
    }
  }
}
