/**
 * Progress — expiry checks and the countdown bar drawn under a toast.
 */

import { type Rect, rectFromTwoPos, rectWidth } from '../core/Geometry';
import { type Instant } from '../core/Time';
import type { Context } from '../host/Context';
import type { LayerId } from '../host/Painter';
import type { Toast, ToastOptions } from './Toast';

export interface ProgressBarConfig {
  color: string;
  /** Bar height in pixels. Zero hides the bar. */
  width: number;
  outlineColor: string;
}

export const PROGRESS_BAR_LAYER: LayerId = { order: 'foreground', id: 'progress_bar' };

/** Horizontal inset of the bar from the toast edges. */
const BAR_MARGIN = 10;
/** Gap between the bar and the toast's bottom edge. */
const BAR_BOTTOM_GAP = 2;

/** A toast is alive until its expiry time has been reached. */
export function isAlive(options: ToastOptions, now: Instant): boolean {
  return options.expiresAt === undefined || options.expiresAt.isAfter(now);
}

/**
 * Fraction of the lifetime still remaining, from 1 at creation down to 0
 * at expiry. Undefined when the toast has no expiry or no creation time.
 */
export function progressFraction(options: ToastOptions, now: Instant): number | undefined {
  const { expiresAt, createdAt } = options;
  if (!expiresAt || !createdAt) return undefined;

  const lifetime = expiresAt.durationSince(createdAt);
  if (lifetime <= 0) return 0;

  const remaining = expiresAt.durationSince(now);
  return Math.min(1, Math.max(0, remaining / lifetime));
}

export interface ProgressBarRects {
  outline: Rect;
  fill: Rect;
}

export function progressBarRects(toastRect: Rect, fraction: number, width: number): ProgressBarRects {
  const left = toastRect.min.x + BAR_MARGIN;
  const right = toastRect.max.x - BAR_MARGIN;
  const bottom = toastRect.max.y - BAR_BOTTOM_GAP;
  const top = bottom - width;
  const span = rectWidth(toastRect) - 2 * BAR_MARGIN;

  return {
    outline: rectFromTwoPos({ x: left, y: top }, { x: right, y: bottom }),
    fill: rectFromTwoPos({ x: left, y: top }, { x: right - span * (1 - fraction), y: bottom }),
  };
}

/** Paint the countdown for `toast` over its rendered `rect`. */
export function addProgressBar(ctx: Context, toast: Toast, rect: Rect, config: ProgressBarConfig): void {
  const fraction = progressFraction(toast.options, ctx.now());
  if (fraction === undefined) return;

  const painter = ctx.layerPainter(PROGRESS_BAR_LAYER);
  const { outline, fill } = progressBarRects(rect, fraction, config.width);
  const rounding = config.width / 2;

  painter.rect(outline, rounding, config.outlineColor);
  painter.rect(fill, rounding, config.color);
}
