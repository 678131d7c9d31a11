/**
 * FrameLoop — drives a Context from a canvas: pointer input in, rendered
 * frames out.
 *
 * Frames are reactive: a new one is scheduled only when the previous frame
 * asked for a repaint, when pointer input arrives, or when the caller asks
 * via `requestFrame()`. An idle UI costs nothing.
 */

import { type Pos2 } from '../core/Geometry';
import { type Clock } from '../core/Time';
import { Context } from '../host/Context';
import type { Style } from '../host/Style';
import { CanvasRenderer } from '../renderer/CanvasRenderer';

export interface FrameLoopOptions {
  clock?: Clock;
  style?: Partial<Style>;
  clearColor?: string;
  /** Frame scheduler. Defaults to requestAnimationFrame. */
  scheduleFrame?: (callback: () => void) => number;
  /** Cancels a handle returned by `scheduleFrame`. Defaults to cancelAnimationFrame. */
  cancelFrame?: (handle: number) => void;
}

export interface FrameLoop {
  readonly ctx: Context;
  /** Schedule a frame, e.g. after changing app state from outside. */
  requestFrame(): void;
  /** Cancel the pending frame and detach input listeners. */
  stop(): void;
}

export function startFrameLoop(
  canvas: HTMLCanvasElement,
  app: (ctx: Context) => void,
  options: FrameLoopOptions = {},
): FrameLoop {
  const {
    clock,
    style,
    clearColor,
    scheduleFrame = (cb: () => void) => requestAnimationFrame(cb),
    cancelFrame = (handle: number) => cancelAnimationFrame(handle),
  } = options;

  const renderer = new CanvasRenderer(canvas);
  const ctx = new Context({ clock, style, measurer: renderer.measurer() });

  let pointer: Pos2 | null = null;
  let clicked = false;
  let pending: number | null = null;
  let stopped = false;

  const renderFrame = () => {
    pending = null;
    if (stopped) return;

    const canvasWidth = canvas.clientWidth;
    const canvasHeight = canvas.clientHeight;
    const output = ctx.run({ screenSize: { x: canvasWidth, y: canvasHeight }, pointer, clicked }, app);
    clicked = false;

    renderer.render(output, { canvasWidth, canvasHeight, clearColor });

    if (output.repaintRequested) requestFrame();
  };

  const requestFrame = () => {
    if (stopped || pending !== null) return;
    pending = scheduleFrame(renderFrame);
  };

  const toCanvasPos = (e: PointerEvent): Pos2 => {
    const rect = canvas.getBoundingClientRect();
    return { x: e.clientX - rect.left, y: e.clientY - rect.top };
  };

  const onPointerMove = (e: PointerEvent) => {
    pointer = toCanvasPos(e);
    requestFrame();
  };

  const onPointerDown = (e: PointerEvent) => {
    if (e.button !== 0) return;
    pointer = toCanvasPos(e);
    clicked = true;
    requestFrame();
  };

  const onPointerLeave = () => {
    pointer = null;
    requestFrame();
  };

  canvas.addEventListener('pointermove', onPointerMove);
  canvas.addEventListener('pointerdown', onPointerDown);
  canvas.addEventListener('pointerleave', onPointerLeave);

  renderFrame();

  return {
    ctx,
    requestFrame,
    stop() {
      stopped = true;
      if (pending !== null) {
        cancelFrame(pending);
        pending = null;
      }
      canvas.removeEventListener('pointermove', onPointerMove);
      canvas.removeEventListener('pointerdown', onPointerDown);
      canvas.removeEventListener('pointerleave', onPointerLeave);
    },
  };
}
