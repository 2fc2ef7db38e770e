/**
 * @file sceneManager.ts
 * @description Registry of the three scenes plus the active scene tag.
 *
 * A scene is initialized the first time it becomes active while the loop is
 * running, and never again.  Layouts built in initialize() are static, so a
 * scene that is re-entered reuses them as they are.
 */

import type { Logger } from 'pino';
import type { Rng, Scene, SceneHost, SceneId, Size } from '../types.js';
import type { Renderer } from '../renderer.js';

/** What every scene is constructed with. */
export interface SceneContext
{
  host: SceneHost;
  renderer: Renderer;
  logger: Logger;

  /** Display size the scene's logical surface is scaled to. */
  scale: Size;

  rng?: Rng;
}

export class SceneManager
{
  private active: SceneId;
  private running = false;
  private readonly log: Logger;

  constructor(
    private readonly scenes: Readonly<Record<SceneId, Scene>>,
    logger: Logger,
    initial: SceneId = 'MENU',
  )
  {
    this.active = initial;
    this.log    = logger.child({ component: 'scenes' });
  }

  get activeId(): SceneId
  {
    return this.active;
  }

  get current(): Scene
  {
    return this.scenes[this.active];
  }

  get isRunning(): boolean
  {
    return this.running;
  }

  get(id: SceneId): Scene
  {
    return this.scenes[id];
  }

  /** Marks the loop as running and initializes the active scene. */
  start(): void
  {
    this.running = true;
    this.initializeIfNeeded(this.active);
  }

  activate(id: SceneId): void
  {
    if (id !== this.active) this.log.info({ from: this.active, to: id }, 'scene changed');
    this.active = id;
    if (this.running) this.initializeIfNeeded(id);
  }

  private initializeIfNeeded(id: SceneId): void
  {
    const scene = this.scenes[id];
    if (scene.isInitialized()) return;

    scene.initialize();
    this.log.debug({ scene: id }, 'scene initialized');
  }
}
