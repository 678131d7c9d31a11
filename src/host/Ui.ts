/**
 * Ui — an immediate-mode region that places widgets with a Layout.
 *
 * A Ui owns a max rect, a layout and a cursor. Each widget call allocates
 * the next rect, paints into the Ui's layer and returns a Response. Child
 * Uis (scopes, rows, frames) share the parent's painter and report the
 * rect they actually used back to the parent.
 */

import {
  type Rect,
  type Vec2,
  rectUnion,
  rectShrink,
} from '../core/Geometry';
import type { Context } from './Context';
import {
  type Layout,
  advanceCursor,
  isHorizontal,
  leftToRight,
  nextItemRect,
  prefersRightToLeft,
  remainingRect,
  rightToLeft,
  rowRegion,
  startCursor,
} from './Layout';
import type { Painter, Stroke } from './Painter';

export interface Response {
  id: string;
  rect: Rect;
  /** Pointer is over the widget. */
  hovered: boolean;
  /** Widget was clicked this frame. */
  clicked: boolean;
}

export interface InnerResponse<R> {
  inner: R;
  response: Response;
}

export interface FrameOptions {
  /** Space between the frame edge and its contents. */
  innerMargin: number;
  fill?: string;
  stroke?: Stroke;
  rounding?: number;
}

export interface Spacing {
  itemSpacing: Vec2;
}

/** Placement and paint state of a Ui at one point in the frame. */
export interface UiCheckpoint {
  cursor: number;
  usedRect: Rect | null;
  nextChild: number;
  shapeCount: number;
}

export class Ui {
  readonly ctx: Context;
  readonly id: string;
  readonly layout: Layout;
  readonly painter: Painter;
  spacing: Spacing;

  private readonly region: Rect;
  private cursor: number;
  private usedRect: Rect | null = null;
  private nextChild = 0;

  constructor(ctx: Context, id: string, region: Rect, layout: Layout, painter: Painter, spacing?: Spacing) {
    this.ctx = ctx;
    this.id = id;
    this.region = region;
    this.layout = layout;
    this.painter = painter;
    this.spacing = { itemSpacing: { ...(spacing?.itemSpacing ?? ctx.style.itemSpacing) } };
    this.cursor = startCursor(layout, region);
  }

  /** The full rect this Ui may place widgets in. */
  maxRect(): Rect {
    return this.region;
  }

  /** What is left of the max rect after the widgets placed so far. */
  availableRect(): Rect {
    return remainingRect(this.layout, this.region, this.cursor);
  }

  /**
   * Bounding rect of everything placed so far. Before anything is placed
   * this is an empty rect at the cursor's starting corner.
   */
  minRect(): Rect {
    if (this.usedRect) return this.usedRect;
    return nextItemRect(this.layout, this.region, startCursor(this.layout, this.region), { x: 0, y: 0 });
  }

  /** Place an item of `size` at the cursor. */
  allocateSize(size: Vec2): Rect {
    const rect = nextItemRect(this.layout, this.region, this.cursor, size);
    this.allocateRect(rect);
    return rect;
  }

  /** Mark `rect` as used and move the cursor past it. */
  allocateRect(rect: Rect): void {
    this.usedRect = this.usedRect ? rectUnion(this.usedRect, rect) : rect;
    this.cursor = advanceCursor(this.layout, rect, this.spacing.itemSpacing);
  }

  /** Run `addContents` in a child confined to `rect`, with this Ui's layout. */
  allocateUiAtRect<R>(rect: Rect, addContents: (ui: Ui) => R): InnerResponse<R> {
    return this.scope(rect, this.layout, addContents);
  }

  /** Run `addContents` in the remaining space using a different layout. */
  withLayout<R>(layout: Layout, addContents: (ui: Ui) => R): InnerResponse<R> {
    return this.scope(this.availableRect(), layout, addContents);
  }

  /**
   * Lay out `addContents` in a row. The row flows right-to-left when this
   * Ui prefers it, so contents hug the same edge as the enclosing stack.
   * Inside a horizontal Ui the row spans the remaining rect and keeps this
   * Ui's cross alignment.
   */
  horizontal<R>(addContents: (ui: Ui) => R): InnerResponse<R> {
    const height = this.ctx.style.fontSize + 2 * this.ctx.style.buttonPadding.y;
    const region = rowRegion(this.layout, this.region, this.cursor, height);
    const crossAlign = isHorizontal(this.layout.mainDir) ? this.layout.crossAlign : 'min';
    const layout = prefersRightToLeft(this.layout) ? rightToLeft(crossAlign) : leftToRight(crossAlign);
    return this.scope(region, layout, addContents);
  }

  /** Contents surrounded by a margin, painted over a filled background. */
  frame<R>(options: FrameOptions, addContents: (ui: Ui) => R): InnerResponse<R> {
    const style = this.ctx.style;
    const {
      innerMargin,
      fill = style.windowFill,
      stroke = { width: style.windowStrokeWidth, color: style.windowStroke },
      rounding = style.windowRounding,
    } = options;

    const background = this.painter.reserve();
    const child = this.child(rectShrink(this.availableRect(), innerMargin), this.layout);
    const inner = addContents(child);

    const content = child.minRect();
    const outer: Rect = {
      min: { x: content.min.x - innerMargin, y: content.min.y - innerMargin },
      max: { x: content.max.x + innerMargin, y: content.max.y + innerMargin },
    };
    this.painter.set(background, { kind: 'rect', rect: outer, rounding, fill, stroke });
    this.allocateRect(outer);

    return { inner, response: this.ctx.interact(child.id, outer) };
  }

  label(text: string, color: string = this.ctx.style.textColor): Response {
    const fontSize = this.ctx.style.fontSize;
    const size = this.ctx.measureText(text, fontSize);
    const rect = this.allocateSize(size);
    this.painter.text(rect.min, text, color, fontSize);
    return this.ctx.interact(this.nextId(), rect);
  }

  button(text: string): Response {
    const style = this.ctx.style;
    const textSize = this.ctx.measureText(text, style.fontSize);
    const pad = style.buttonPadding;
    const rect = this.allocateSize({ x: textSize.x + 2 * pad.x, y: textSize.y + 2 * pad.y });
    const response = this.ctx.interact(this.nextId(), rect);

    this.painter.rect(rect, style.buttonRounding, response.hovered ? style.buttonHoverFill : style.buttonFill);
    this.painter.text({ x: rect.min.x + pad.x, y: rect.min.y + pad.y }, text, style.textColor, style.fontSize);
    return response;
  }

  checkpoint(): UiCheckpoint {
    return {
      cursor: this.cursor,
      usedRect: this.usedRect,
      nextChild: this.nextChild,
      shapeCount: this.painter.length,
    };
  }

  /**
   * Undo everything placed and painted in this Ui's layer since
   * `checkpoint` was taken. Shapes on other layers are kept.
   */
  restore(checkpoint: UiCheckpoint): void {
    this.cursor = checkpoint.cursor;
    this.usedRect = checkpoint.usedRect;
    this.nextChild = checkpoint.nextChild;
    this.painter.truncate(checkpoint.shapeCount);
  }

  private scope<R>(region: Rect, layout: Layout, addContents: (ui: Ui) => R): InnerResponse<R> {
    const child = this.child(region, layout);
    const inner = addContents(child);
    const used = child.minRect();
    this.allocateRect(used);
    return { inner, response: this.ctx.interact(child.id, used) };
  }

  private child(region: Rect, layout: Layout): Ui {
    return new Ui(this.ctx, this.nextId(), region, layout, this.painter, this.spacing);
  }

  private nextId(): string {
    return `${this.id}/${this.nextChild++}`;
  }
}
