/**
 * @file geometry.test.ts
 * @description Unit tests for the vector and rectangle helpers.
 */

import { describe, test, expect } from 'vitest';
import { contains, containsPoint, copySign, overlaps, withLength } from '../src/geometry.js';

describe('withLength', () =>
{
  test('rescales to the requested magnitude', () =>
  {
    expect(withLength({ x: 3, y: 4 }, 10)).toEqual({ x: 6, y: 8 });
  });

  test('returns null for the zero vector', () =>
  {
    expect(withLength({ x: 0, y: 0 }, 10)).toBeNull();
  });
});

describe('copySign', () =>
{
  test('takes the sign of the second argument', () =>
  {
    expect(copySign(5, -2)).toBe(-5);
    expect(copySign(-5, 2)).toBe(5);
  });

  test('treats negative zero as negative', () =>
  {
    expect(copySign(5, -0)).toBe(-5);
    expect(copySign(5, 0)).toBe(5);
  });
});

describe('rectangles', () =>
{
  const box = { x: 0, y: 0, w: 10, h: 10 };

  test('rectangles sharing only an edge do not overlap', () =>
  {
    expect(overlaps(box, { x: 10, y: 0, w: 5, h: 5 })).toBe(false);
    expect(overlaps(box, { x: 9, y: 9, w: 5, h: 5 })).toBe(true);
  });

  test('containment allows touching edges', () =>
  {
    expect(contains(box, { x: 0, y: 0, w: 10, h: 10 })).toBe(true);
    expect(contains(box, { x: 1, y: 0, w: 10, h: 10 })).toBe(false);
  });

  test('points on the far edges are outside', () =>
  {
    expect(containsPoint(box, { x: 0, y: 0 })).toBe(true);
    expect(containsPoint(box, { x: 10, y: 5 })).toBe(false);
  });
});
