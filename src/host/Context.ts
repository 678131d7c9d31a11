/**
 * Context — the per-frame entry point of the immediate-mode host.
 *
 * A host backend calls `run()` once per frame with the current input. The
 * app callback builds its UI through the context; `run()` returns the
 * display list and whether another frame was requested. Keyed temp data
 * and widget rects carry over from one frame to the next.
 */

import {
  type Pos2,
  type Rect,
  type Vec2,
  rectContains,
  rectFromMinSize,
} from '../core/Geometry';
import { type Clock, type Instant, systemClock } from '../core/Time';
import { topDown } from './Layout';
import {
  LAYER_ORDERS,
  type LayerId,
  type LayeredShape,
  Painter,
  type Shape,
  layerKey,
} from './Painter';
import { type Style, defaultStyle } from './Style';
import { TempStore } from './TempStore';
import { Ui, type Response } from './Ui';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Measures the size of a single line of text at the given font size. */
export type TextMeasurer = (text: string, fontSize: number) => Vec2;

/** Fixed advance of 0.6em per character; good enough without a font engine. */
export const monospaceMeasurer: TextMeasurer = (text, fontSize) => ({
  x: Array.from(text).length * fontSize * 0.6,
  y: fontSize,
});

export interface RawInput {
  /** Viewport size in CSS pixels. The viewport always starts at (0,0). */
  screenSize: Vec2;
  /** Frame time. Defaults to the context clock's current reading. */
  time?: Instant;
  /** Pointer position, or null when the pointer is outside the viewport. */
  pointer?: Pos2 | null;
  /** Primary button was pressed since the last frame. */
  clicked?: boolean;
}

export interface FrameOutput {
  /** Shapes in paint order: by layer order, then by first use of the layer. */
  shapes: LayeredShape[];
  repaintRequested: boolean;
}

export interface AreaOptions {
  fixedPos: Pos2;
  order: LayerId['order'];
}

export interface ContextOptions {
  clock?: Clock;
  measurer?: TextMeasurer;
  style?: Partial<Style>;
}

interface LayerEntry {
  layer: LayerId;
  shapes: Shape[];
}

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

export class Context {
  /** Keyed scratch storage that outlives a single frame. */
  readonly data = new TempStore();
  readonly style: Style;
  readonly clock: Clock;

  private measurer: TextMeasurer;
  private screenRect: Rect = rectFromMinSize({ x: 0, y: 0 }, { x: 0, y: 0 });
  private frameTime: Instant;
  private pointer: Pos2 | null = null;
  private clicked = false;
  private repaintRequested = false;
  private layers: Map<string, LayerEntry> = new Map();
  private widgetRects: Map<string, Rect> = new Map();
  private prevWidgetRects: Map<string, Rect> = new Map();

  constructor(options: ContextOptions = {}) {
    const { clock = systemClock, measurer = monospaceMeasurer, style = {} } = options;
    this.clock = clock;
    this.measurer = measurer;
    this.style = { ...defaultStyle(), ...style };
    this.frameTime = clock.now();
  }

  /** Run one frame of `app` against `input`. */
  run(input: RawInput, app: (ctx: Context) => void): FrameOutput {
    this.beginFrame(input);
    app(this);
    return this.endFrame();
  }

  /** Viewport rect available to the app. */
  availableRect(): Rect {
    return this.screenRect;
  }

  /** Time of the current frame. Constant for the whole frame. */
  now(): Instant {
    return this.frameTime;
  }

  pointerPos(): Pos2 | null {
    return this.pointer;
  }

  /** Ask the backend to run another frame soon, even without new input. */
  requestRepaint(): void {
    this.repaintRequested = true;
  }

  measureText(text: string, fontSize: number): Vec2 {
    return this.measurer(text, fontSize);
  }

  layerPainter(layer: LayerId): Painter {
    const key = layerKey(layer);
    let entry = this.layers.get(key);
    if (!entry) {
      entry = { layer, shapes: [] };
      this.layers.set(key, entry);
    }
    return new Painter(entry.shapes);
  }

  /**
   * A Ui on its own layer, starting at `fixedPos` and extending to the
   * bottom-right of the viewport.
   */
  area<R>(id: string, options: AreaOptions, addContents: (ui: Ui) => R): R {
    const region: Rect = { min: { ...options.fixedPos }, max: { ...this.screenRect.max } };
    const painter = this.layerPainter({ order: options.order, id });
    const ui = new Ui(this, id, region, topDown(), painter);
    return addContents(ui);
  }

  /**
   * Register a widget's rect for this frame and report pointer state for
   * it. Hit-testing uses the rect the widget had in the previous frame,
   * which is where the user saw it when they clicked.
   */
  interact(id: string, rect: Rect): Response {
    this.widgetRects.set(id, rect);
    const seen = this.prevWidgetRects.get(id);
    const hovered = this.pointer !== null && seen !== undefined && rectContains(seen, this.pointer);
    return { id, rect, hovered, clicked: hovered && this.clicked };
  }

  private beginFrame(input: RawInput): void {
    this.screenRect = rectFromMinSize({ x: 0, y: 0 }, input.screenSize);
    this.frameTime = input.time ?? this.clock.now();
    this.pointer = input.pointer ?? null;
    this.clicked = input.clicked ?? false;
    this.repaintRequested = false;
    this.layers = new Map();
    this.prevWidgetRects = this.widgetRects;
    this.widgetRects = new Map();
  }

  private endFrame(): FrameOutput {
    const shapes: LayeredShape[] = [];
    for (const order of LAYER_ORDERS) {
      for (const entry of this.layers.values()) {
        if (entry.layer.order !== order) continue;
        for (const shape of entry.shapes) {
          if (shape.kind === 'noop') continue;
          shapes.push({ layer: entry.layer, shape });
        }
      }
    }
    return { shapes, repaintRequested: this.repaintRequested };
  }
}
