/**
 * CanvasRenderer — replays a frame's display list onto a 2D canvas.
 *
 * The host produces shapes in CSS pixels; this scales them for the
 * device pixel ratio and draws them in the order given.
 */

import { type Rect, rectHeight, rectWidth } from '../core/Geometry';
import type { FrameOutput, TextMeasurer } from '../host/Context';
import type { RectShape, TextShape } from '../host/Painter';

export const FONT_FAMILY = `-apple-system, BlinkMacSystemFont, 'Segoe UI', system-ui, sans-serif`;

export interface CanvasRenderOptions {
  /** Canvas dimensions in CSS pixels. */
  canvasWidth: number;
  canvasHeight: number;
  /** Colour the canvas is cleared to; transparent when omitted. */
  clearColor?: string;
}

export class CanvasRenderer {
  private canvas: HTMLCanvasElement;
  private ctx: CanvasRenderingContext2D;

  constructor(canvas: HTMLCanvasElement) {
    this.canvas = canvas;
    const ctx = canvas.getContext('2d');
    if (!ctx) throw new Error('Failed to get 2D context for toast canvas');
    this.ctx = ctx;
  }

  /** A TextMeasurer backed by this canvas's font metrics. */
  measurer(): TextMeasurer {
    return canvasMeasurer(this.ctx);
  }

  render(output: FrameOutput, opts: CanvasRenderOptions): void {
    const { canvasWidth, canvasHeight, clearColor } = opts;
    const ctx = this.ctx;

    // Resize canvas to match display (retina-aware)
    const dpr = (typeof window !== 'undefined' ? window.devicePixelRatio : 1) || 1;
    const displayW = Math.floor(canvasWidth * dpr);
    const displayH = Math.floor(canvasHeight * dpr);

    if (this.canvas.width !== displayW || this.canvas.height !== displayH) {
      this.canvas.width = displayW;
      this.canvas.height = displayH;
    }

    ctx.clearRect(0, 0, displayW, displayH);
    if (clearColor) {
      ctx.fillStyle = clearColor;
      ctx.fillRect(0, 0, displayW, displayH);
    }

    ctx.save();
    ctx.scale(dpr, dpr);
    ctx.textBaseline = 'top';
    ctx.textAlign = 'left';

    for (const { shape } of output.shapes) {
      if (shape.kind === 'rect') {
        this.drawRect(shape);
      } else {
        this.drawText(shape);
      }
    }

    ctx.restore();
  }

  private drawRect(shape: RectShape): void {
    const ctx = this.ctx;
    // Zero-area rects (e.g. a zero-width progress bar) draw nothing.
    if (rectWidth(shape.rect) <= 0 || rectHeight(shape.rect) <= 0) return;

    traceRoundedRect(ctx, shape.rect, shape.rounding);
    ctx.fillStyle = shape.fill;
    ctx.fill();

    if (shape.stroke && shape.stroke.width > 0) {
      ctx.strokeStyle = shape.stroke.color;
      ctx.lineWidth = shape.stroke.width;
      ctx.stroke();
    }
  }

  private drawText(shape: TextShape): void {
    const ctx = this.ctx;
    ctx.font = `${shape.fontSize}px ${FONT_FAMILY}`;
    ctx.fillStyle = shape.color;
    ctx.fillText(shape.text, shape.pos.x, shape.pos.y);
  }
}

/**
 * Trace a rounded rectangle path. The radius is clamped so opposite
 * corners never overlap.
 */
export function traceRoundedRect(ctx: CanvasRenderingContext2D, rect: Rect, rounding: number): void {
  const w = rectWidth(rect);
  const h = rectHeight(rect);
  const r = Math.max(0, Math.min(rounding, w / 2, h / 2));
  const { x, y } = rect.min;

  ctx.beginPath();
  ctx.moveTo(x + r, y);
  ctx.lineTo(x + w - r, y);
  ctx.arcTo(x + w, y, x + w, y + r, r);
  ctx.lineTo(x + w, y + h - r);
  ctx.arcTo(x + w, y + h, x + w - r, y + h, r);
  ctx.lineTo(x + r, y + h);
  ctx.arcTo(x, y + h, x, y + h - r, r);
  ctx.lineTo(x, y + r);
  ctx.arcTo(x, y, x + r, y, r);
  ctx.closePath();
}

export function canvasMeasurer(ctx: CanvasRenderingContext2D): TextMeasurer {
  return (text, fontSize) => {
    ctx.font = `${fontSize}px ${FONT_FAMILY}`;
    return { x: ctx.measureText(text).width, y: fontSize };
  };
}
