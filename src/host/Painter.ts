/**
 * Painter — display-list shapes and the writer that appends them.
 *
 * Nothing is drawn while a frame runs. Widgets push shapes into their
 * layer's list; the backend replays the sorted lists once the frame ends.
 */

import { type Pos2, type Rect } from '../core/Geometry';

export type LayerOrder = 'background' | 'middle' | 'foreground' | 'tooltip';

export const LAYER_ORDERS: readonly LayerOrder[] = ['background', 'middle', 'foreground', 'tooltip'];

export interface LayerId {
  order: LayerOrder;
  id: string;
}

export interface Stroke {
  width: number;
  color: string;
}

export interface RectShape {
  kind: 'rect';
  rect: Rect;
  rounding: number;
  fill: string;
  stroke?: Stroke;
}

export interface TextShape {
  kind: 'text';
  /** Top-left corner of the text's bounding box. */
  pos: Pos2;
  text: string;
  color: string;
  fontSize: number;
}

/** Placeholder for a shape whose geometry is only known later. */
export interface NoopShape {
  kind: 'noop';
}

export type Shape = RectShape | TextShape | NoopShape;

export interface LayeredShape {
  layer: LayerId;
  shape: RectShape | TextShape;
}

export function layerKey(layer: LayerId): string {
  return `${layer.order}:${layer.id}`;
}

export class Painter {
  private shapes: Shape[];

  constructor(shapes: Shape[]) {
    this.shapes = shapes;
  }

  add(shape: Shape): number {
    this.shapes.push(shape);
    return this.shapes.length - 1;
  }

  /** Reserve a slot so a background can be filled in under later shapes. */
  reserve(): number {
    return this.add({ kind: 'noop' });
  }

  set(index: number, shape: Shape): void {
    this.shapes[index] = shape;
  }

  /** Number of shapes in the layer so far. */
  get length(): number {
    return this.shapes.length;
  }

  /** Drop every shape added after the first `length`. */
  truncate(length: number): void {
    this.shapes.length = Math.min(length, this.shapes.length);
  }

  rect(rect: Rect, rounding: number, fill: string, stroke?: Stroke): number {
    return this.add({ kind: 'rect', rect, rounding, fill, stroke });
  }

  text(pos: Pos2, text: string, color: string, fontSize: number): number {
    return this.add({ kind: 'text', pos, text, color, fontSize });
  }
}
