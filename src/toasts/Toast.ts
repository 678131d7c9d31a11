/**
 * Toast — a single notification: its kind, text and lifetime options.
 */

import { type Instant } from '../core/Time';

// ---------------------------------------------------------------------------
// Kinds
// ---------------------------------------------------------------------------

export interface CustomKind {
  custom: number;
}

export type ToastKind = 'info' | 'warning' | 'error' | 'success' | CustomKind;

export function customKind(id: number): CustomKind {
  return { custom: id };
}

/** Stable string key for a kind, usable in Maps. */
export function toastKindKey(kind: ToastKind): string {
  return typeof kind === 'string' ? kind : `custom:${kind.custom}`;
}

/** Numbers are shorthand for custom kinds. */
export function toToastKind(kind: ToastKind | number): ToastKind {
  return typeof kind === 'number' ? customKind(kind) : kind;
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ToastOptions {
  /** Show or hide the kind icon. */
  showIcon: boolean;
  /** When set, the toast is removed once this time has passed. */
  expiresAt?: Instant;
  /** Creation time; needed to draw the countdown bar. */
  createdAt?: Instant;
}

export function defaultToastOptions(): ToastOptions {
  return { showIcon: true };
}

/**
 * Options for a toast created at `now` that lives for `durationMs`, or
 * forever when the duration is null.
 */
export function toastOptionsWithDuration(durationMs: number | null, now: Instant): ToastOptions {
  return {
    ...defaultToastOptions(),
    createdAt: now,
    expiresAt: durationMs === null ? undefined : now.plus(durationMs),
  };
}

/** A bare number is a duration in milliseconds. */
export type DurationOrOptions = number | null | ToastOptions;

export function toToastOptions(value: DurationOrOptions, now: Instant): ToastOptions {
  if (value === null || typeof value === 'number') {
    return toastOptionsWithDuration(value, now);
  }
  return { ...value };
}

// ---------------------------------------------------------------------------
// Toast
// ---------------------------------------------------------------------------

export interface ToastInit {
  kind: ToastKind;
  text: string;
  options?: ToastOptions;
}

export class Toast {
  kind: ToastKind;
  text: string;
  options: ToastOptions;
  /** Set once the toast has been dismissed rather than timed out. */
  closed = false;

  constructor(init: ToastInit) {
    this.kind = init.kind;
    this.text = init.text;
    this.options = init.options ? { ...init.options } : defaultToastOptions();
  }

  /**
   * Expire the toast at `now`. It disappears at the next prune, which is
   * the end of the frame it was closed in.
   */
  close(now: Instant): void {
    this.options.expiresAt = now;
    this.closed = true;
  }
}

export function isToastList(value: unknown): value is Toast[] {
  return Array.isArray(value) && value.every(item => item instanceof Toast);
}
