/**
 * Placement — where the toast stack may grow on screen.
 *
 * The viewport is split at the anchor; the (direction, alignToEnd) pair
 * picks the part of the screen the stack lives in. The mapping is not
 * symmetric between the two flags:
 *
 *   LTR / TopDown,  start -> from anchor to bottom-right of the screen
 *   RTL / BottomUp, end   -> from screen origin to anchor
 *   BottomUp start, LTR end -> right of anchor.x, above anchor.y
 *   RTL start, TopDown end  -> left of anchor.x, below anchor.y
 */

import {
  type Pos2,
  type Rect,
  EVERYTHING,
  posMin,
  rectFromMinSize,
  rectHeight,
  rectWidth,
} from '../core/Geometry';
import { type Align, type Direction } from '../host/Layout';

export function stackingRect(anchor: Pos2, direction: Direction, alignToEnd: boolean, screen: Rect): Rect {
  const screenW = rectWidth(screen);
  const screenH = rectHeight(screen);

  if (!alignToEnd && (direction === 'left-to-right' || direction === 'top-down')) {
    return rectFromMinSize(anchor, { x: screenW - anchor.x, y: screenH - anchor.y });
  }
  if (alignToEnd && (direction === 'right-to-left' || direction === 'bottom-up')) {
    return rectFromMinSize({ x: 0, y: 0 }, { x: anchor.x, y: anchor.y });
  }
  if ((direction === 'bottom-up' && !alignToEnd) || (direction === 'left-to-right' && alignToEnd)) {
    return rectFromMinSize({ x: anchor.x, y: 0 }, { x: screenW - anchor.x, y: anchor.y });
  }
  // right-to-left without alignToEnd, or top-down with it
  return rectFromMinSize({ x: 0, y: anchor.y }, { x: anchor.x, y: screenH - anchor.y });
}

export function crossAlignFor(alignToEnd: boolean): Align {
  return alignToEnd ? 'max' : 'min';
}

/**
 * Origin for next frame's area: the component-wise minimum of every
 * rendered toast's top-left corner, or the configured anchor when nothing
 * was rendered.
 */
export function nextAnchor(rects: readonly Rect[], anchor: Pos2): Pos2 {
  if (rects.length === 0) return { ...anchor };
  return rects.reduce<Pos2>((acc, r) => posMin(acc, r.min), EVERYTHING);
}
