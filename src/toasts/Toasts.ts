/**
 * Toasts — the toast registry and its per-frame `show()` pass.
 *
 * Create one Toasts (or one per frame with the same id), push toasts into
 * it with `add()` or the per-kind helpers, and call `show(ctx)` every
 * frame. Toasts that have been shown live in the context's temp storage,
 * so state survives even if the Toasts object itself is rebuilt.
 *
 *   const toasts = new Toasts()
 *     .anchor({ x: 300, y: 300 })
 *     .direction('bottom-up')
 *     .alignToEnd(true);
 *
 *   toasts.info('Hello, World!', 5000);
 *   toasts.show(ctx);
 */

import { EventBus } from '../core/EventBus';
import { type Pos2, type Rect, isPos2 } from '../core/Geometry';
import { type Clock, type Instant } from '../core/Time';
import type { Context } from '../host/Context';
import { type Direction, layoutFromMainDirAndCrossAlign } from '../host/Layout';
import type { Response, Ui } from '../host/Ui';
import { defaultToastContents } from './DefaultContents';
import { crossAlignFor, nextAnchor, stackingRect } from './Placement';
import { type ProgressBarConfig, addProgressBar, isAlive } from './Progress';
import {
  type DurationOrOptions,
  Toast,
  type ToastKind,
  isToastList,
  toToastKind,
  toToastOptions,
  toastKindKey,
  toastOptionsWithDuration,
} from './Toast';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Renders a toast and returns the response covering everything it drew. */
export type ToastContents = (ui: Ui, toast: Toast) => Response;

export interface ToastEvents {
  'toast:added': { toast: Toast };
  'toast:removed': { toast: Toast; reason: 'expired' | 'closed' };
}

export interface ToastsConfig {
  /** Storage id; two Toasts with the same id share their toasts. */
  id: string;
  anchor: Pos2;
  direction: Direction;
  alignToEnd: boolean;
  progressBar: ProgressBarConfig;
  /**
   * Clock used to stamp toasts created from a duration. When unset, such
   * toasts are stamped with the frame time of the first `show()` that sees
   * them, so expiry runs on the Context's clock.
   */
  clock?: Clock;
}

export function defaultToastsConfig(): ToastsConfig {
  return {
    id: '__toasts',
    anchor: { x: 0, y: 0 },
    direction: 'top-down',
    alignToEnd: false,
    progressBar: { color: 'rgb(0, 100, 0)', width: 0, outlineColor: 'rgb(160, 160, 160)' },
  };
}

/** Space between stacked toasts, on both axes. */
const TOAST_SPACING = 5;

// ---------------------------------------------------------------------------
// Toasts
// ---------------------------------------------------------------------------

export class Toasts {
  readonly events = new EventBus<ToastEvents>();

  private config: ToastsConfig;
  private renderers: Map<string, ToastContents> = new Map();
  private pending: Toast[] = [];
  /** Durations of pending toasts still waiting for a creation time. */
  private unstamped: Map<Toast, number | null> = new Map();

  constructor(config: Partial<ToastsConfig> = {}) {
    this.config = { ...defaultToastsConfig(), ...config };
  }

  // -----------------------------------------------------------------------
  // Configuration
  // -----------------------------------------------------------------------

  id(id: string): this {
    this.config.id = id;
    return this;
  }

  /** Starting position for the toasts. */
  anchor(anchor: Pos2): this {
    this.config.anchor = { ...anchor };
    return this;
  }

  /** Direction the toasts stack up in. */
  direction(direction: Direction): this {
    this.config.direction = direction;
    return this;
  }

  /** Align toasts to the right or bottom edge, depending on direction. */
  alignToEnd(alignToEnd: boolean): this {
    this.config.alignToEnd = alignToEnd;
    return this;
  }

  progressBar(color: string, width: number, outlineColor: string): this {
    if (width < 0) {
      console.warn(`Toasts: progress bar width ${width} is negative, using 0`);
    }
    this.config.progressBar = { color, width: Math.max(0, width), outlineColor };
    return this;
  }

  clock(clock: Clock): this {
    this.config.clock = clock;
    return this;
  }

  /** Use `contents` instead of the default look for toasts of `kind`. */
  customContents(kind: ToastKind | number, contents: ToastContents): this {
    this.renderers.set(toastKindKey(toToastKind(kind)), contents);
    return this;
  }

  getConfig(): Readonly<ToastsConfig> {
    return this.config;
  }

  // -----------------------------------------------------------------------
  // Adding toasts
  // -----------------------------------------------------------------------

  add(toast: Toast): this {
    this.pending.push(toast);
    this.events.emit('toast:added', { toast });
    return this;
  }

  info(text: string, options: DurationOrOptions): this {
    return this.addKind('info', text, options);
  }

  warning(text: string, options: DurationOrOptions): this {
    return this.addKind('warning', text, options);
  }

  error(text: string, options: DurationOrOptions): this {
    return this.addKind('error', text, options);
  }

  success(text: string, options: DurationOrOptions): this {
    return this.addKind('success', text, options);
  }

  /**
   * Toasts as of the last `show()`, followed by those added since. The
   * returned array is a snapshot. Pending toasts created from a duration
   * without a configured clock have no timestamps until they are shown.
   */
  active(ctx: Context): Toast[] {
    const stored = ctx.data.getTemp(this.config.id, isToastList) ?? [];
    return [...stored, ...this.pending];
  }

  // -----------------------------------------------------------------------
  // Per-frame pass
  // -----------------------------------------------------------------------

  /** Show and update all toasts. Call once per frame. */
  show(ctx: Context): void {
    const { id, anchor, direction, alignToEnd, progressBar } = this.config;
    const posId = `${id}/pos`;

    this.stampPending(ctx.now());
    const toasts = [...(ctx.data.getTemp(id, isToastList) ?? []), ...this.pending];
    this.pending = [];

    const screen = ctx.availableRect();
    const areaPos = ctx.data.getTemp(posId, isPos2) ?? { x: 0, y: 0 };

    ctx.area(`${id}/area`, { fixedPos: areaPos, order: 'foreground' }, ui => {
      const now = ctx.now();
      const rect = stackingRect(anchor, direction, alignToEnd, screen);
      const layout = layoutFromMainDirAndCrossAlign(direction, crossAlignFor(alignToEnd));

      ui.allocateUiAtRect(rect, atRect => {
        atRect.withLayout(layout, stack => {
          stack.spacing.itemSpacing = { x: TOAST_SPACING, y: TOAST_SPACING };

          const rendered: Rect[] = [];
          for (const toast of toasts) {
            rendered.push(this.renderToast(stack, toast, progressBar).rect);
          }
          ctx.data.insertTemp(posId, nextAnchor(rendered, anchor));

          const survivors: Toast[] = [];
          for (const toast of toasts) {
            if (!isAlive(toast.options, now)) {
              this.events.emit('toast:removed', { toast, reason: toast.closed ? 'closed' : 'expired' });
            } else {
              survivors.push(toast);
            }
          }

          // Keep frames coming so countdowns animate without input.
          if (survivors.length > 0) ctx.requestRepaint();

          ctx.data.insertTemp(id, survivors);
        });
      });
    });
  }

  private addKind(kind: ToastKind, text: string, options: DurationOrOptions): this {
    const { clock } = this.config;
    if (clock) {
      return this.add(new Toast({ kind, text, options: toToastOptions(options, clock.now()) }));
    }
    if (options !== null && typeof options === 'object') {
      return this.add(new Toast({ kind, text, options }));
    }
    const toast = new Toast({ kind, text });
    this.unstamped.set(toast, options);
    return this.add(toast);
  }

  private stampPending(now: Instant): void {
    for (const [toast, durationMs] of this.unstamped) {
      toast.options = { ...toastOptionsWithDuration(durationMs, now), showIcon: toast.options.showIcon };
    }
    this.unstamped.clear();
  }

  private renderToast(ui: Ui, toast: Toast, progressBar: ProgressBarConfig): Response {
    const custom = this.renderers.get(toastKindKey(toast.kind));
    if (custom) {
      const checkpoint = ui.checkpoint();
      try {
        return custom(ui, toast);
      } catch (e) {
        console.error(`Toasts: custom contents for '${toastKindKey(toast.kind)}' failed, using default:`, e);
        ui.restore(checkpoint);
      }
    }

    const { response } = defaultToastContents(ui, toast);
    addProgressBar(ui.ctx, toast, response.rect, progressBar);
    return response;
  }
}
