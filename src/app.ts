/**
 * @file app.ts
 * @description App: the fixed-rate run loop and the scene switch.
 *
 * ONE FRAME
 * ---------
 *   1. update()   on the active scene
 *   2. draw()     on the active scene, presented by the Display
 *   3. events     QUIT sets done; other events outside the scene's filter
 *                 are dropped
 *   4. input      held keys → handleInput, mouse presses → handleMousePress
 *                 (positions converted from display to logical coordinates)
 *   5. delay      1000 / fps ms
 *
 * Each phase asks the SceneManager for the active scene afresh, so a scene
 * switch during update() already routes draw and input to the new scene.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import type { AudioSink, Display, FontSet, InputSource, Rng, SceneHost, SceneId, SceneSettings, Size, Vector2 } from './types.js';
import { InvariantViolation } from './errors.js';
import { Renderer } from './renderer.js';
import { SceneManager, type SceneContext } from './scenes/sceneManager.js';
import { MenuScene } from './scenes/menu.js';
import { GameScene } from './scenes/game.js';
import { TutorialScene } from './scenes/tutorial.js';

/** Looped from the moment the loop starts. */
export const MUSIC_TRACK = 'music.ogg';

export interface AppOptions
{
  fps: number;
  scale: Size;
  display: Display;
  input: InputSource;
  audio: AudioSink;
  fonts: FontSet;
  logger: Logger;
  rng?: Rng;
}

/** Display coordinates → logical surface coordinates. */
export function toLogical(pos: Vector2, settings: SceneSettings): Vector2
{
  return {
    x: pos.x * settings.size.w / settings.scale.w,
    y: pos.y * settings.size.h / settings.scale.h,
  };
}

export class App implements SceneHost
{
  done = false;

  readonly menu: MenuScene;
  readonly game: GameScene;
  readonly tutorial: TutorialScene;

  private readonly manager: SceneManager;
  private readonly log: Logger;
  private started = false;

  constructor(private readonly options: AppOptions)
  {
    this.log = options.logger.child({ component: 'app' });

    const ctx: SceneContext = {
      host:     this,
      renderer: new Renderer(options.fonts),
      logger:   options.logger,
      scale:    options.scale,
      rng:      options.rng,
    };
    this.menu     = new MenuScene(ctx);
    this.game     = new GameScene(ctx);
    this.tutorial = new TutorialScene(ctx);

    this.manager = new SceneManager(
      { MENU: this.menu, GAME: this.game, TUTORIAL: this.tutorial },
      options.logger,
    );
  }

  get scene(): SceneId
  {
    return this.manager.activeId;
  }

  set scene(id: SceneId)
  {
    this.manager.activate(id);
  }

  /**
   * @method start
   * @description Marks the loop as running, initializes the active scene
   *              and starts the music.  Safe to call more than once.
   */
  start(): void
  {
    if (this.started) return;
    this.started = true;

    this.manager.start();
    this.options.audio.playLoop(MUSIC_TRACK);
    this.log.info({ fps: this.options.fps, scene: this.scene }, 'started');
  }

  /** Runs one frame without the trailing delay. */
  step(): void
  {
    this.start();

    this.manager.current.update();

    const drawn = this.manager.current;
    this.options.display.present(drawn.draw(), drawn.settings);

    const frame = this.options.input.poll();

    for (const event of frame.events)
    {
      if (event.type === 'QUIT')
      {
        this.done = true;
        continue;
      }

      const scene  = this.manager.current;
      const filter = scene.settings.eventsFilter;
      if (filter && !filter.has(event.type)) continue;
      scene.handleEvent(event);
    }

    for (const key of frame.keys)
    {
      this.manager.current.handleInput(key);
    }

    for (const press of frame.mouse)
    {
      const scene = this.manager.current;
      scene.handleMousePress(press.button, toLogical(press.pos, scene.settings));
    }
  }

  /**
   * @method run
   * @description Steps until `done`.  Any error stops the loop; an
   *              InvariantViolation is logged as fatal first.
   */
  async run(): Promise<void>
  {
    const frameMs = 1000 / this.options.fps;

    try
    {
      while (!this.done)
      {
        this.step();
        if (!this.done) await delay(frameMs);
      }
    }
    catch (err)
    {
      this.done = true;
      if (err instanceof InvariantViolation)
      {
        this.log.fatal({ err, details: err.details }, 'invariant violated, stopping');
      }
      else
      {
        this.log.error({ err }, 'frame failed, stopping');
      }
      throw err;
    }

    this.log.info('stopped');
  }
}
