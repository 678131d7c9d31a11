import { describe, it, expect } from 'vitest';
import { rectFromMinSize } from '../../src/core/Geometry';
import {
  type Direction,
  advanceCursor,
  layoutFromMainDirAndCrossAlign,
  nextItemRect,
  prefersRightToLeft,
  remainingRect,
  rowRegion,
  startCursor,
} from '../../src/host/Layout';

const region = rectFromMinSize({ x: 0, y: 0 }, { x: 100, y: 80 });
const size = { x: 20, y: 10 };
const spacing = { x: 5, y: 3 };

describe('Layout', () => {
  it('startCursor sits on the leading edge of the main axis', () => {
    const starts: Array<[Direction, number]> = [
      ['top-down', 0],
      ['bottom-up', 80],
      ['left-to-right', 0],
      ['right-to-left', 100],
    ];
    for (const [dir, expected] of starts) {
      const layout = layoutFromMainDirAndCrossAlign(dir, 'min');
      expect(startCursor(layout, region)).toBe(expected);
    }
  });

  it('top-down places items at the cursor and hugs the cross edge', () => {
    const min = layoutFromMainDirAndCrossAlign('top-down', 'min');
    const max = layoutFromMainDirAndCrossAlign('top-down', 'max');
    expect(nextItemRect(min, region, 12, size)).toEqual({ min: { x: 0, y: 12 }, max: { x: 20, y: 22 } });
    expect(nextItemRect(max, region, 12, size)).toEqual({ min: { x: 80, y: 12 }, max: { x: 100, y: 22 } });
  });

  it('bottom-up places items above the cursor', () => {
    const layout = layoutFromMainDirAndCrossAlign('bottom-up', 'min');
    const rect = nextItemRect(layout, region, 80, size);
    expect(rect).toEqual({ min: { x: 0, y: 70 }, max: { x: 20, y: 80 } });
    expect(advanceCursor(layout, rect, spacing)).toBe(67);
  });

  it('right-to-left places items left of the cursor', () => {
    const layout = layoutFromMainDirAndCrossAlign('right-to-left', 'max');
    const rect = nextItemRect(layout, region, 100, size);
    expect(rect).toEqual({ min: { x: 80, y: 70 }, max: { x: 100, y: 80 } });
    expect(advanceCursor(layout, rect, spacing)).toBe(75);
  });

  it('left-to-right advances past the item plus spacing', () => {
    const layout = layoutFromMainDirAndCrossAlign('left-to-right', 'min');
    const rect = nextItemRect(layout, region, 0, size);
    expect(advanceCursor(layout, rect, spacing)).toBe(25);
  });

  it('remainingRect excludes what the cursor has passed', () => {
    expect(remainingRect(layoutFromMainDirAndCrossAlign('top-down', 'min'), region, 30))
      .toEqual({ min: { x: 0, y: 30 }, max: { x: 100, y: 80 } });
    expect(remainingRect(layoutFromMainDirAndCrossAlign('right-to-left', 'min'), region, 60))
      .toEqual({ min: { x: 0, y: 0 }, max: { x: 60, y: 80 } });
  });

  it('rowRegion is a full-width strip in vertical layouts', () => {
    expect(rowRegion(layoutFromMainDirAndCrossAlign('top-down', 'min'), region, 10, 16))
      .toEqual({ min: { x: 0, y: 10 }, max: { x: 100, y: 26 } });
    expect(rowRegion(layoutFromMainDirAndCrossAlign('bottom-up', 'min'), region, 80, 16))
      .toEqual({ min: { x: 0, y: 64 }, max: { x: 100, y: 80 } });
    expect(rowRegion(layoutFromMainDirAndCrossAlign('left-to-right', 'min'), region, 40, 16))
      .toEqual({ min: { x: 40, y: 0 }, max: { x: 100, y: 80 } });
  });

  it('prefersRightToLeft for rtl rows and right-hugging vertical stacks', () => {
    expect(prefersRightToLeft(layoutFromMainDirAndCrossAlign('right-to-left', 'min'))).toBe(true);
    expect(prefersRightToLeft(layoutFromMainDirAndCrossAlign('top-down', 'max'))).toBe(true);
    expect(prefersRightToLeft(layoutFromMainDirAndCrossAlign('bottom-up', 'max'))).toBe(true);
    expect(prefersRightToLeft(layoutFromMainDirAndCrossAlign('top-down', 'min'))).toBe(false);
    expect(prefersRightToLeft(layoutFromMainDirAndCrossAlign('left-to-right', 'max'))).toBe(false);
  });
});
