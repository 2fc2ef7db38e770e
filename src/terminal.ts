/**
 * @file terminal.ts
 * @description Display that draws frames as text in an ANSI terminal.
 *
 * Each character cell covers CELL_SIZE logical pixels, so the 512 × 256
 * surface becomes a 52 × 16 grid.  A rectangle fills every cell it overlaps;
 * a glyph prints its own character in the cell under its top-left corner.
 */

import type { Display, SceneSettings, Size } from './types.js';
import type { DrawCommand, Surface } from './surface.js';
import { COLOR_BG, COLOR_PROJECTILE, COLOR_STUNNED } from './constants.js';

export const CELL_SIZE: Size = { w: 10, h: 16 };

const ESC = '\x1b[';

/** Character used to fill a rectangle of the given colour. */
function shade(color: string): string
{
  if (color === COLOR_BG)         return ' ';
  if (color === COLOR_STUNNED)    return '▒';
  if (color === COLOR_PROJECTILE) return '=';
  return '█';
}

function apply(grid: string[][], command: DrawCommand): void
{
  const rows = grid.length;
  const cols = rows > 0 ? grid[0].length : 0;

  switch (command.kind)
  {
    case 'fill':
    {
      const ch = shade(command.color);
      for (const row of grid) row.fill(ch);
      break;
    }

    case 'rect':
    {
      const { rect } = command;
      if (rect.w <= 0 || rect.h <= 0) break;

      const ch = shade(command.color);
      const c0 = Math.max(0, Math.floor(rect.x / CELL_SIZE.w));
      const c1 = Math.min(cols, Math.ceil((rect.x + rect.w) / CELL_SIZE.w));
      const r0 = Math.max(0, Math.floor(rect.y / CELL_SIZE.h));
      const r1 = Math.min(rows, Math.ceil((rect.y + rect.h) / CELL_SIZE.h));
      for (let r = r0; r < r1; r++)
      {
        for (let c = c0; c < c1; c++) grid[r][c] = ch;
      }
      break;
    }

    case 'glyph':
    {
      const c = Math.floor(command.at.x / CELL_SIZE.w);
      const r = Math.floor(command.at.y / CELL_SIZE.h);
      if (r >= 0 && r < rows && c >= 0 && c < cols) grid[r][c] = command.glyph.key;
      break;
    }
  }
}

/**
 * @function rasterize
 * @description Replays the surface's commands onto a character grid.
 * @returns One string per terminal row.
 */
export function rasterize(surface: Surface): string[]
{
  const cols = Math.ceil(surface.width / CELL_SIZE.w);
  const rows = Math.ceil(surface.height / CELL_SIZE.h);
  const grid = Array.from({ length: rows }, () => new Array<string>(cols).fill(' '));

  for (const command of surface.drawn) apply(grid, command);

  return grid.map((row) => row.join(''));
}

/**
 * @class TerminalDisplay
 * @description Redraws the whole grid in place every frame.
 */
export class TerminalDisplay implements Display
{
  private opened = false;

  constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

  present(surface: Surface, settings: SceneSettings): void
  {
    if (!this.opened)
    {
      this.out.write(`${ESC}?25l${ESC}2J`); // hide cursor, clear screen
      this.opened = true;
    }

    const lines = [settings.title, ...rasterize(surface)];
    this.out.write(`${ESC}H${lines.join('\n')}\n`);
  }

  /** Shows the cursor again and moves below the last frame. */
  restore(): void
  {
    if (!this.opened) return;
    this.out.write(`${ESC}?25h\n`);
    this.opened = false;
  }
}
