/**
 * @file menu.ts
 * @description Main menu: PLAY, TUTORIAL and QUIT buttons.
 *
 * Buttons are laid out in initialize() and reused on every return to the
 * menu.  Arrow keys move the selection and Enter activates it; a left click
 * on a button activates that button directly.
 */

import type { MouseButton, RawEvent, RawEventType, Rect, Scene, SceneSettings, Vector2 } from '../types.js';
import type { SceneContext } from './sceneManager.js';
import
{
  COLOR_BG, COLOR_FG, KEY_CONFIRM, KEY_MENU_DOWN, KEY_MENU_UP, SURFACE_SIZE,
} from '../constants.js';
import { containsPoint } from '../geometry.js';
import { Surface } from '../surface.js';

export type MenuAction = 'PLAY' | 'TUTORIAL' | 'QUIT';

export interface MenuButton
{
  action: MenuAction;
  label: string;
  rect: Rect;
}

const BUTTON_SIZE = { w: 160, h: 30 };
const BUTTON_TOP  = 100;
const BUTTON_STEP = 40;
const TITLE       = 'PONG TRAINER';
const TITLE_Y     = 40;

const ACTIONS: ReadonlyArray<{ action: MenuAction; label: string }> = [
  { action: 'PLAY',     label: 'PLAY' },
  { action: 'TUTORIAL', label: 'TUTORIAL' },
  { action: 'QUIT',     label: 'QUIT' },
];

export class MenuScene implements Scene
{
  readonly settings: SceneSettings;

  private buttons: MenuButton[] = [];
  private selected = 0;
  private initialized = false;

  constructor(private readonly ctx: SceneContext)
  {
    this.settings = {
      size:         { ...SURFACE_SIZE },
      scale:        { ...ctx.scale },
      title:        'Pong Menu',
      eventsFilter: new Set<RawEventType>(['KEY_DOWN']),
    };
  }

  /** Laid-out buttons; empty until initialize() has run. */
  get layout(): readonly MenuButton[]
  {
    return this.buttons;
  }

  get selection(): MenuAction
  {
    return ACTIONS[this.selected].action;
  }

  initialize(): void
  {
    if (this.initialized) return;

    const x = (this.settings.size.w - BUTTON_SIZE.w) / 2;
    this.buttons = ACTIONS.map(({ action, label }, index) => ({
      action,
      label,
      rect: { x, y: BUTTON_TOP + index * BUTTON_STEP, w: BUTTON_SIZE.w, h: BUTTON_SIZE.h },
    }));
    this.initialized = true;
  }

  isInitialized(): boolean
  {
    return this.initialized;
  }

  update(): void
  {
    /* static */
  }

  draw(): Surface
  {
    const { renderer } = this.ctx;
    const frame = new Surface(this.settings.size.w, this.settings.size.h);
    frame.clear(COLOR_BG);

    renderer.drawText(frame, TITLE, { x: (frame.width - renderer.measureText(TITLE)) / 2, y: TITLE_Y });

    this.buttons.forEach((button, index) =>
    {
      const label = index === this.selected ? `> ${button.label}` : button.label;
      const width = renderer.measureText(label);
      renderer.drawText(frame, label, {
        x: button.rect.x + (button.rect.w - width) / 2,
        y: button.rect.y + button.rect.h / 4,
      }, COLOR_FG);
    });

    return frame;
  }

  handleInput(_key: string): void
  {
    /* the menu reacts to key presses, not held keys */
  }

  handleMousePress(button: MouseButton, pos: Vector2): void
  {
    if (button !== 'LEFT') return;

    const hit = this.buttons.find((b) => containsPoint(b.rect, pos));
    if (hit) this.activate(hit.action);
  }

  handleEvent(event: RawEvent): void
  {
    if (event.type !== 'KEY_DOWN') return;

    switch (event.key)
    {
      case KEY_MENU_UP:
        this.selected = (this.selected + ACTIONS.length - 1) % ACTIONS.length;
        break;
      case KEY_MENU_DOWN:
        this.selected = (this.selected + 1) % ACTIONS.length;
        break;
      case KEY_CONFIRM:
        this.activate(this.selection);
        break;
      default:
        break;
    }
  }

  private activate(action: MenuAction): void
  {
    const { host, logger } = this.ctx;
    logger.debug({ action }, 'menu action');

    switch (action)
    {
      case 'PLAY':     host.scene = 'GAME';     break;
      case 'TUTORIAL': host.scene = 'TUTORIAL'; break;
      case 'QUIT':     host.done  = true;       break;
    }
  }
}
