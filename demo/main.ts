/**
 * Demo page: toasts stacked from the bottom-right corner of a canvas.
 */

import {
  type Direction,
  Toast,
  Toasts,
  customKind,
  startFrameLoop,
  toastOptionsWithDuration,
} from '../src';

const DIRECTIONS: readonly Direction[] = ['left-to-right', 'right-to-left', 'top-down', 'bottom-up'];
const CORNER_MARGIN = 12;
const REMINDER = 0;

function isDirection(value: string): value is Direction {
  return DIRECTIONS.some(d => d === value);
}

const canvas = document.getElementById('toast-canvas');
if (!(canvas instanceof HTMLCanvasElement)) throw new Error('Canvas #toast-canvas not found');

const toasts = new Toasts()
  .direction('bottom-up')
  .alignToEnd(true)
  .progressBar('rgb(0, 160, 60)', 4, 'rgb(70, 70, 70)')
  .customContents(REMINDER, (ui, toast) =>
    ui.frame({ innerMargin: 8, fill: 'rgb(40, 30, 60)' }, inner => {
      inner.label(`⏰ ${toast.text}`, 'rgb(220, 190, 255)');
    }).response,
  );

const loop = startFrameLoop(canvas, ctx => {
  const screen = ctx.availableRect();
  const { direction, alignToEnd } = toasts.getConfig();
  // Pick the screen corner that the stacking rect grows away from.
  const right = direction === 'right-to-left' || (alignToEnd && direction !== 'left-to-right');
  const bottom = direction === 'bottom-up' || (alignToEnd && direction !== 'top-down');
  const anchorX = right ? screen.max.x - CORNER_MARGIN : CORNER_MARGIN;
  const anchorY = bottom ? screen.max.y - CORNER_MARGIN : CORNER_MARGIN;
  toasts.anchor({ x: anchorX, y: anchorY });
  toasts.show(ctx);
}, { clearColor: '#111' });

toasts.events.on('toast:removed', ({ toast, reason }) => {
  console.info(`toast "${toast.text}" ${reason}`);
});

let counter = 0;

for (const button of document.querySelectorAll<HTMLButtonElement>('#controls button')) {
  button.addEventListener('click', () => {
    counter++;
    const now = loop.ctx.clock.now();
    switch (button.dataset.kind) {
      case 'info': toasts.info(`Info #${counter}`, 4000); break;
      case 'warning': toasts.warning(`Warning #${counter}`, 6000); break;
      case 'error': toasts.error(`Error #${counter}: stays until dismissed`, null); break;
      case 'success': toasts.success(`Saved #${counter}`, { ...toastOptionsWithDuration(3000, now), showIcon: false }); break;
      default:
        toasts.add(new Toast({
          kind: customKind(REMINDER),
          text: `Reminder #${counter}`,
          options: toastOptionsWithDuration(5000, now),
        }));
    }
    loop.requestFrame();
  });
}

const directionSelect = document.getElementById('direction');
if (directionSelect instanceof HTMLSelectElement) {
  directionSelect.addEventListener('change', () => {
    if (isDirection(directionSelect.value)) toasts.direction(directionSelect.value);
    loop.requestFrame();
  });
}

const alignBox = document.getElementById('align-to-end');
if (alignBox instanceof HTMLInputElement) {
  alignBox.addEventListener('change', () => {
    toasts.alignToEnd(alignBox.checked);
    loop.requestFrame();
  });
}

window.addEventListener('resize', () => loop.requestFrame());
