import { describe, it, expect } from 'vitest';
import {
  isPos2,
  posMin,
  rectContains,
  rectFromMinSize,
  rectFromTwoPos,
  rectShrink,
  rectSize,
  rectUnion,
} from '../../src/core/Geometry';

describe('Geometry', () => {
  it('rectFromMinSize spans min to min + size', () => {
    const r = rectFromMinSize({ x: 10, y: 20 }, { x: 30, y: 40 });
    expect(r).toEqual({ min: { x: 10, y: 20 }, max: { x: 40, y: 60 } });
    expect(rectSize(r)).toEqual({ x: 30, y: 40 });
  });

  it('rectFromTwoPos normalizes swapped corners', () => {
    const r = rectFromTwoPos({ x: 50, y: 5 }, { x: 10, y: 25 });
    expect(r).toEqual({ min: { x: 10, y: 5 }, max: { x: 50, y: 25 } });
  });

  it('rectContains includes the edges', () => {
    const r = rectFromMinSize({ x: 0, y: 0 }, { x: 10, y: 10 });
    expect(rectContains(r, { x: 10, y: 10 })).toBe(true);
    expect(rectContains(r, { x: 10.5, y: 5 })).toBe(false);
  });

  it('rectUnion covers both rects', () => {
    const a = rectFromMinSize({ x: 0, y: 10 }, { x: 5, y: 5 });
    const b = rectFromMinSize({ x: 20, y: 0 }, { x: 5, y: 5 });
    expect(rectUnion(a, b)).toEqual({ min: { x: 0, y: 0 }, max: { x: 25, y: 15 } });
  });

  it('rectShrink insets every side', () => {
    const r = rectFromMinSize({ x: 0, y: 0 }, { x: 100, y: 50 });
    expect(rectShrink(r, 10)).toEqual({ min: { x: 10, y: 10 }, max: { x: 90, y: 40 } });
  });

  it('posMin is component-wise', () => {
    expect(posMin({ x: 3, y: 9 }, { x: 7, y: 1 })).toEqual({ x: 3, y: 1 });
  });

  it('isPos2 accepts only objects with numeric x and y', () => {
    expect(isPos2({ x: 1, y: 2 })).toBe(true);
    expect(isPos2({ x: '1', y: 2 })).toBe(false);
    expect(isPos2(null)).toBe(false);
    expect(isPos2([1, 2])).toBe(false);
  });
});
