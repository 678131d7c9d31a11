/**
 * Layout — how a Ui places successive items inside its region.
 *
 * A layout has a main direction (the axis and sense items advance along)
 * and a cross alignment (which edge of the other axis items hug). The
 * cursor is a single coordinate on the main axis marking the next free
 * edge of the region.
 */

import { type Rect, type Vec2 } from '../core/Geometry';

export type Direction = 'left-to-right' | 'right-to-left' | 'top-down' | 'bottom-up';

export type Align = 'min' | 'max';

export interface Layout {
  mainDir: Direction;
  crossAlign: Align;
}

export function layoutFromMainDirAndCrossAlign(mainDir: Direction, crossAlign: Align): Layout {
  return { mainDir, crossAlign };
}

export function topDown(crossAlign: Align = 'min'): Layout {
  return { mainDir: 'top-down', crossAlign };
}

export function leftToRight(crossAlign: Align = 'min'): Layout {
  return { mainDir: 'left-to-right', crossAlign };
}

export function rightToLeft(crossAlign: Align = 'min'): Layout {
  return { mainDir: 'right-to-left', crossAlign };
}

export function isHorizontal(dir: Direction): boolean {
  return dir === 'left-to-right' || dir === 'right-to-left';
}

/**
 * Whether horizontal content placed in this layout should flow from the
 * right edge: either the layout itself runs right-to-left, or it is a
 * vertical stack hugging its right edge.
 */
export function prefersRightToLeft(layout: Layout): boolean {
  return layout.mainDir === 'right-to-left' || (!isHorizontal(layout.mainDir) && layout.crossAlign === 'max');
}

export function startCursor(layout: Layout, region: Rect): number {
  switch (layout.mainDir) {
    case 'top-down': return region.min.y;
    case 'bottom-up': return region.max.y;
    case 'left-to-right': return region.min.x;
    case 'right-to-left': return region.max.x;
  }
}

/** The part of `region` not yet consumed by the cursor. */
export function remainingRect(layout: Layout, region: Rect, cursor: number): Rect {
  const { min, max } = region;
  switch (layout.mainDir) {
    case 'top-down': return { min: { x: min.x, y: cursor }, max: { x: max.x, y: max.y } };
    case 'bottom-up': return { min: { x: min.x, y: min.y }, max: { x: max.x, y: cursor } };
    case 'left-to-right': return { min: { x: cursor, y: min.y }, max: { x: max.x, y: max.y } };
    case 'right-to-left': return { min: { x: min.x, y: min.y }, max: { x: cursor, y: max.y } };
  }
}

/**
 * Rect for the next item of the given size: at the cursor on the main
 * axis, against the aligned edge on the cross axis.
 */
export function nextItemRect(layout: Layout, region: Rect, cursor: number, size: Vec2): Rect {
  const crossX = layout.crossAlign === 'max' ? region.max.x - size.x : region.min.x;
  const crossY = layout.crossAlign === 'max' ? region.max.y - size.y : region.min.y;

  switch (layout.mainDir) {
    case 'top-down':
      return { min: { x: crossX, y: cursor }, max: { x: crossX + size.x, y: cursor + size.y } };
    case 'bottom-up':
      return { min: { x: crossX, y: cursor - size.y }, max: { x: crossX + size.x, y: cursor } };
    case 'left-to-right':
      return { min: { x: cursor, y: crossY }, max: { x: cursor + size.x, y: crossY + size.y } };
    case 'right-to-left':
      return { min: { x: cursor - size.x, y: crossY }, max: { x: cursor, y: crossY + size.y } };
  }
}

/** Cursor position after `rect` has been placed, including item spacing. */
export function advanceCursor(layout: Layout, rect: Rect, spacing: Vec2): number {
  switch (layout.mainDir) {
    case 'top-down': return rect.max.y + spacing.y;
    case 'bottom-up': return rect.min.y - spacing.y;
    case 'left-to-right': return rect.max.x + spacing.x;
    case 'right-to-left': return rect.min.x - spacing.x;
  }
}

/**
 * Region for a horizontal row of the given height. In a vertical layout
 * the row spans the full width at the cursor; in a horizontal layout it is
 * simply whatever is left.
 */
export function rowRegion(layout: Layout, region: Rect, cursor: number, height: number): Rect {
  switch (layout.mainDir) {
    case 'top-down':
      return { min: { x: region.min.x, y: cursor }, max: { x: region.max.x, y: cursor + height } };
    case 'bottom-up':
      return { min: { x: region.min.x, y: cursor - height }, max: { x: region.max.x, y: cursor } };
    default:
      return remainingRect(layout, region, cursor);
  }
}
