/**
 * @file geometry.ts
 * @description Small vector and rectangle helpers used by the physics.
 *
 * Vector helpers return new objects unless their name ends in "InPlace".
 * Rectangle overlap is strict (touching edges do not overlap); containment
 * is inclusive (a rectangle contains itself).
 */

import type { Rect, Size, Vector2 } from './types.js';

/* ═══════════════════════════════════════════════════════════════════════════
   VECTORS
   ═══════════════════════════════════════════════════════════════════════════ */

export function add(a: Vector2, b: Vector2): Vector2
{
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subtract(a: Vector2, b: Vector2): Vector2
{
  return { x: a.x - b.x, y: a.y - b.y };
}

/** target += delta */
export function addInPlace(target: Vector2, delta: Vector2): void
{
  target.x += delta.x;
  target.y += delta.y;
}

export function scale(v: Vector2, factor: number): Vector2
{
  return { x: v.x * factor, y: v.y * factor };
}

/** Component-wise product. */
export function multiply(a: Vector2, b: Vector2): Vector2
{
  return { x: a.x * b.x, y: a.y * b.y };
}

export function length(v: Vector2): number
{
  return Math.hypot(v.x, v.y);
}

/**
 * @function withLength
 * @description Rescales v to the given magnitude.  Returns null for a
 *              zero-length vector so callers pick their own fallback.
 */
export function withLength(v: Vector2, magnitude: number): Vector2 | null
{
  const len = length(v);
  if (len === 0) return null;
  return scale(v, magnitude / len);
}

/**
 * @function copySign
 * @description |magnitude| carrying the sign of `sign`.  Negative zero
 *              counts as negative.
 */
export function copySign(magnitude: number, sign: number): number
{
  const negative = sign < 0 || Object.is(sign, -0);
  return negative ? -Math.abs(magnitude) : Math.abs(magnitude);
}

/* ═══════════════════════════════════════════════════════════════════════════
   RECTANGLES
   ═══════════════════════════════════════════════════════════════════════════ */

/** Rectangle of `size` placed at position + offset. */
export function rectAt(position: Vector2, offset: Vector2, size: Size): Rect
{
  return { x: position.x + offset.x, y: position.y + offset.y, w: size.w, h: size.h };
}

export function right(r: Rect): number
{
  return r.x + r.w;
}

export function bottom(r: Rect): number
{
  return r.y + r.h;
}

export function centerOf(r: Rect): Vector2
{
  return { x: r.x + r.w / 2, y: r.y + r.h / 2 };
}

export function overlaps(a: Rect, b: Rect): boolean
{
  return a.x < right(b) && right(a) > b.x && a.y < bottom(b) && bottom(a) > b.y;
}

/** True when `inner` lies entirely inside `outer` (edges may touch). */
export function contains(outer: Rect, inner: Rect): boolean
{
  return inner.x >= outer.x && right(inner) <= right(outer) &&
         inner.y >= outer.y && bottom(inner) <= bottom(outer);
}

export function containsPoint(r: Rect, p: Vector2): boolean
{
  return p.x >= r.x && p.x < right(r) && p.y >= r.y && p.y < bottom(r);
}
