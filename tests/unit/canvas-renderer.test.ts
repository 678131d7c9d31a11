import { describe, it, expect, vi } from 'vitest';
import { rectFromTwoPos } from '../../src/core/Geometry';
import type { FrameOutput } from '../../src/host/Context';
import type { LayerId } from '../../src/host/Painter';
import { CanvasRenderer, FONT_FAMILY, canvasMeasurer, traceRoundedRect } from '../../src/renderer/CanvasRenderer';

function createMockContext() {
  return {
    fillStyle: '',
    strokeStyle: '',
    lineWidth: 1,
    font: '',
    textBaseline: '',
    textAlign: '',
    clearRect: vi.fn(),
    fillRect: vi.fn(),
    save: vi.fn(),
    restore: vi.fn(),
    scale: vi.fn(),
    beginPath: vi.fn(),
    moveTo: vi.fn(),
    lineTo: vi.fn(),
    arcTo: vi.fn(),
    closePath: vi.fn(),
    fill: vi.fn(),
    stroke: vi.fn(),
    fillText: vi.fn(),
    measureText: vi.fn((_text: string) => ({ width: 42 })),
  };
}

function createMockCanvas(ctx: ReturnType<typeof createMockContext> | null) {
  return {
    width: 0,
    height: 0,
    getContext: () => ctx,
  } as unknown as HTMLCanvasElement;
}

const layer: LayerId = { order: 'foreground', id: 'test' };

describe('CanvasRenderer', () => {
  it('throws when the canvas has no 2D context', () => {
    expect(() => new CanvasRenderer(createMockCanvas(null))).toThrow('Failed to get 2D context for toast canvas');
  });

  it('resizes the backing store and clears before drawing', () => {
    const ctx = createMockContext();
    const canvas = createMockCanvas(ctx);
    const renderer = new CanvasRenderer(canvas);

    renderer.render({ shapes: [], repaintRequested: false }, { canvasWidth: 200, canvasHeight: 100, clearColor: '#111' });

    expect(canvas.width).toBe(200);
    expect(canvas.height).toBe(100);
    expect(ctx.clearRect).toHaveBeenCalledWith(0, 0, 200, 100);
    expect(ctx.fillRect).toHaveBeenCalledWith(0, 0, 200, 100);
    expect(ctx.save).toHaveBeenCalledTimes(1);
    expect(ctx.restore).toHaveBeenCalledTimes(1);
  });

  it('does not fill when no clear colour is given', () => {
    const ctx = createMockContext();
    const renderer = new CanvasRenderer(createMockCanvas(ctx));
    renderer.render({ shapes: [], repaintRequested: false }, { canvasWidth: 10, canvasHeight: 10 });
    expect(ctx.fillRect).not.toHaveBeenCalled();
  });

  it('draws text at its top-left position with the shape font', () => {
    const ctx = createMockContext();
    const renderer = new CanvasRenderer(createMockCanvas(ctx));
    const output: FrameOutput = {
      shapes: [{ layer, shape: { kind: 'text', pos: { x: 5, y: 6 }, text: 'Hi', color: 'red', fontSize: 12 } }],
      repaintRequested: false,
    };

    renderer.render(output, { canvasWidth: 10, canvasHeight: 10 });

    expect(ctx.fillText).toHaveBeenCalledWith('Hi', 5, 6);
    expect(ctx.font).toBe(`12px ${FONT_FAMILY}`);
    expect(ctx.fillStyle).toBe('red');
    expect(ctx.textBaseline).toBe('top');
  });

  it('fills rects and strokes them only when a stroke is given', () => {
    const ctx = createMockContext();
    const renderer = new CanvasRenderer(createMockCanvas(ctx));
    const rect = rectFromTwoPos({ x: 0, y: 0 }, { x: 20, y: 10 });
    const output: FrameOutput = {
      shapes: [
        { layer, shape: { kind: 'rect', rect, rounding: 2, fill: 'blue' } },
        { layer, shape: { kind: 'rect', rect, rounding: 2, fill: 'green', stroke: { width: 3, color: 'white' } } },
      ],
      repaintRequested: false,
    };

    renderer.render(output, { canvasWidth: 10, canvasHeight: 10 });

    expect(ctx.fill).toHaveBeenCalledTimes(2);
    expect(ctx.stroke).toHaveBeenCalledTimes(1);
    expect(ctx.lineWidth).toBe(3);
    expect(ctx.strokeStyle).toBe('white');
  });

  it('skips rects with no area', () => {
    const ctx = createMockContext();
    const renderer = new CanvasRenderer(createMockCanvas(ctx));
    const output: FrameOutput = {
      shapes: [{ layer, shape: { kind: 'rect', rect: rectFromTwoPos({ x: 10, y: 30 }, { x: 68, y: 30 }), rounding: 0, fill: 'x' } }],
      repaintRequested: false,
    };

    renderer.render(output, { canvasWidth: 10, canvasHeight: 10 });

    expect(ctx.beginPath).not.toHaveBeenCalled();
    expect(ctx.fill).not.toHaveBeenCalled();
  });

  it('measures text with the canvas font', () => {
    const ctx = createMockContext();
    const renderer = new CanvasRenderer(createMockCanvas(ctx));
    expect(renderer.measurer()('Hello', 14)).toEqual({ x: 42, y: 14 });
    expect(ctx.font).toBe(`14px ${FONT_FAMILY}`);
    expect(ctx.measureText).toHaveBeenCalledWith('Hello');
  });
});

describe('traceRoundedRect', () => {
  it('clamps the corner radius to half the shorter side', () => {
    const ctx = createMockContext();
    traceRoundedRect(ctx as unknown as CanvasRenderingContext2D, rectFromTwoPos({ x: 0, y: 0 }, { x: 20, y: 10 }), 100);
    expect(ctx.moveTo).toHaveBeenCalledWith(5, 0);
    expect(ctx.arcTo).toHaveBeenNthCalledWith(1, 20, 0, 20, 5, 5);
    expect(ctx.closePath).toHaveBeenCalledTimes(1);
  });

  it('traces square corners for zero rounding', () => {
    const ctx = createMockContext();
    traceRoundedRect(ctx as unknown as CanvasRenderingContext2D, rectFromTwoPos({ x: 1, y: 2 }, { x: 11, y: 12 }), 0);
    expect(ctx.moveTo).toHaveBeenCalledWith(1, 2);
    expect(ctx.lineTo).toHaveBeenNthCalledWith(1, 11, 2);
  });
});

describe('canvasMeasurer', () => {
  it('uses the font size as the line height', () => {
    const ctx = createMockContext();
    const measure = canvasMeasurer(ctx as unknown as CanvasRenderingContext2D);
    expect(measure('abc', 20)).toEqual({ x: 42, y: 20 });
  });
});
