/**
 * @file surface.ts
 * @description Off-screen drawing surface.
 *
 * A Surface does not own pixels.  It records draw commands in logical
 * coordinates and leaves rasterizing to whichever Display presents it, so
 * the core stays independent of the output device.
 */

import type { Glyph, Rect, Vector2 } from './types.js';
import { COLOR_BG } from './constants.js';

export type DrawCommand =
  | { kind: 'fill';  color: string }
  | { kind: 'rect';  rect: Rect; color: string }
  | { kind: 'glyph'; glyph: Glyph; at: Vector2; color: string };

export class Surface
{
  private commands: DrawCommand[] = [];

  constructor(readonly width: number, readonly height: number) {}

  /** Recorded commands, oldest first. */
  get drawn(): readonly DrawCommand[]
  {
    return this.commands;
  }

  /** Discards everything drawn so far and fills with `color`. */
  clear(color: string = COLOR_BG): void
  {
    this.commands = [{ kind: 'fill', color }];
  }

  fill(color: string): void
  {
    this.commands.push({ kind: 'fill', color });
  }

  fillRect(rect: Rect, color: string): void
  {
    this.commands.push({ kind: 'rect', rect: { ...rect }, color });
  }

  drawGlyph(glyph: Glyph, at: Vector2, color: string): void
  {
    this.commands.push({ kind: 'glyph', glyph, at: { ...at }, color });
  }

  /** Copies another surface's commands, translated by `offset`. */
  blit(source: Surface, offset: Vector2 = { x: 0, y: 0 }): void
  {
    for (const command of source.drawn)
    {
      switch (command.kind)
      {
        case 'fill':
          this.commands.push(command);
          break;
        case 'rect':
          this.commands.push({
            ...command,
            rect: { ...command.rect, x: command.rect.x + offset.x, y: command.rect.y + offset.y },
          });
          break;
        case 'glyph':
          this.commands.push({ ...command, at: { x: command.at.x + offset.x, y: command.at.y + offset.y } });
          break;
      }
    }
  }
}
