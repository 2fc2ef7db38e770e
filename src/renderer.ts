/**
 * @file renderer.ts
 * @description Renderer: composes scene frames onto a Surface.
 *
 * PURE OUTPUT
 * -----------
 * The Renderer reads match state and writes draw commands.  It never mutates
 * game state.  The one thing it does touch is the glyph sheets, which are
 * generated lazily on first use.
 *
 * LAYER ORDER (bottom to top)
 * ---------------------------
 *   1. Background + court lines (built once per scene, then blitted)
 *   2. Paddles (grey while stunned)
 *   3. Ball
 *   4. Projectiles
 *   5. Scores
 */

import type { FontSet, GlyphSheet, MatchState, Rect, ScoreBoard, Size, Vector2 } from './types.js';
import
{
  COLOR_BG, COLOR_FG, COLOR_PROJECTILE, COLOR_STUNNED,
  COURT_LINE, GLYPH_ADVANCE, GLYPH_WIDTH, SCORE_GAP, SCORE_Y,
} from './constants.js';
import { ballHitbox, isStunned, paddleHitbox, projectileRect } from './physics.js';
import { InvariantViolation } from './errors.js';
import { Surface } from './surface.js';

/* ═══════════════════════════════════════════════════════════════════════════
   MODULE-LEVEL HELPER FUNCTIONS
   ═══════════════════════════════════════════════════════════════════════════ */

/** Left edge of the dialogue block and of its first line. */
const DIALOGUE_ORIGIN: Vector2 = { x: 16, y: 40 };
const DIALOGUE_LINE_HEIGHT = 20;

/**
 * @interface ScoreLayout
 * @description Where each score's first digit goes.  The player's score is
 *              right-aligned against the centre line, the bot's starts just
 *              after it.
 */
export interface ScoreLayout
{
  playerX: number;
  botX: number;
  y: number;

  /** Distance between consecutive digits. */
  advance: number;
}

export function layoutScores(scores: Readonly<ScoreBoard>, scale: number, centreX: number): ScoreLayout
{
  const playerWidth = String(scores.playerScore).length * scale * GLYPH_WIDTH;
  return {
    playerX: centreX - playerWidth - SCORE_GAP,
    botX:    centreX + SCORE_GAP,
    y:       SCORE_Y,
    advance: scale * GLYPH_ADVANCE,
  };
}

/**
 * @function assertScoreSides
 * @description Both scores on the wrong side of the centre line at once
 *              means the layout is broken beyond recovery.
 * @throws {InvariantViolation}
 */
export function assertScoreSides(layout: ScoreLayout, centreX: number): void
{
  if (layout.playerX >= centreX && layout.botX < centreX)
  {
    throw new InvariantViolation('Score displays are on the wrong sides of the court', {
      playerX: layout.playerX,
      botX:    layout.botX,
      centreX,
    });
  }
}

/** Width in px of `text` drawn with `sheet`. */
export function textWidth(text: string, sheet: GlyphSheet): number
{
  return text.length * sheet.scale * GLYPH_ADVANCE;
}

function ensureGenerated(sheet: GlyphSheet): void
{
  if (!sheet.generated) sheet.generate();
}

/* ═══════════════════════════════════════════════════════════════════════════
   RENDERER CLASS
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @class Renderer
 * @description Shared by all scenes.  Holds the two glyph sheets.
 */
export class Renderer
{
  constructor(private readonly fonts: FontSet) {}

  /**
   * @method buildCourt
   * @description Background with the four walls and the centre line.
   *              Scenes build it once in initialize() and blit it each frame.
   */
  buildCourt(size: Size): Surface
  {
    const court = new Surface(size.w, size.h);
    court.clear(COLOR_BG);

    const inset = COURT_LINE;
    const walls: Rect[] = [
      { x: inset,                   y: inset,                   w: COURT_LINE,         h: size.h - inset * 2 },
      { x: inset,                   y: inset,                   w: size.w - inset * 2, h: COURT_LINE },
      { x: size.w - inset * 2,      y: inset,                   w: COURT_LINE,         h: size.h - inset * 2 },
      { x: inset,                   y: size.h - inset * 2,      w: size.w - inset * 2, h: COURT_LINE },
      { x: size.w / 2 - COURT_LINE / 2, y: inset,               w: COURT_LINE,         h: size.h - inset * 2 },
    ];
    for (const wall of walls) court.fillRect(wall, COLOR_FG);

    return court;
  }

  drawMatch(frame: Surface, state: MatchState): void
  {
    for (const paddle of [state.player, state.bot])
    {
      frame.fillRect(paddleHitbox(paddle), isStunned(paddle) ? COLOR_STUNNED : COLOR_FG);
    }

    frame.fillRect(ballHitbox(state.ball), COLOR_FG);

    for (const projectile of state.projectiles)
    {
      frame.fillRect(projectileRect(projectile), COLOR_PROJECTILE);
    }
  }

  /**
   * @method drawScores
   * @throws {InvariantViolation} from assertScoreSides().
   */
  drawScores(frame: Surface, scores: Readonly<ScoreBoard>): void
  {
    const sheet = this.fonts.score;
    ensureGenerated(sheet);

    const centreX = frame.width / 2;
    const layout  = layoutScores(scores, sheet.scale, centreX);
    assertScoreSides(layout, centreX);

    this.drawString(frame, String(scores.playerScore), { x: layout.playerX, y: layout.y }, sheet, COLOR_FG);
    this.drawString(frame, String(scores.botScore),    { x: layout.botX,    y: layout.y }, sheet, COLOR_FG);
  }

  /**
   * @method drawText
   * @description Small text (menus, dialogue).  Letters are upper-cased; the
   *              font has no lower case.
   * @returns x just past the last glyph.
   */
  drawText(frame: Surface, text: string, at: Vector2, color: string = COLOR_FG): number
  {
    const sheet = this.fonts.text;
    ensureGenerated(sheet);
    return this.drawString(frame, text.toUpperCase(), at, sheet, color);
  }

  /** One line of dialogue per entry, top-left aligned. */
  drawDialogue(frame: Surface, lines: readonly string[]): void
  {
    lines.forEach((line, index) =>
    {
      this.drawText(frame, line, {
        x: DIALOGUE_ORIGIN.x,
        y: DIALOGUE_ORIGIN.y + index * DIALOGUE_LINE_HEIGHT,
      });
    });
  }

  /** Width of `text` in the small font. */
  measureText(text: string): number
  {
    return textWidth(text, this.fonts.text);
  }

  private drawString(frame: Surface, text: string, at: Vector2, sheet: GlyphSheet, color: string): number
  {
    let x = at.x;
    for (const letter of text)
    {
      frame.drawGlyph(sheet.get(letter), { x, y: at.y }, color);
      x += sheet.scale * GLYPH_ADVANCE;
    }
    return x;
  }
}
