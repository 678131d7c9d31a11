/**
 * DefaultContents — the built-in look of a toast: a window frame holding
 * the kind icon, the text and a dismiss button.
 */

import { prefersRightToLeft } from '../host/Layout';
import type { InnerResponse, Ui } from '../host/Ui';
import type { Toast, ToastKind } from './Toast';

export const INFO_COLOR = 'rgb(0, 155, 255)';
export const WARNING_COLOR = 'rgb(255, 212, 0)';
export const ERROR_COLOR = 'rgb(255, 32, 0)';
export const SUCCESS_COLOR = 'rgb(0, 255, 32)';

export const CLOSE_GLYPH = '🗙';

const INNER_MARGIN = 10;

export function kindIcon(kind: ToastKind): { icon: string; color: string } {
  switch (kind) {
    case 'warning': return { icon: '⚠', color: WARNING_COLOR };
    case 'error': return { icon: '❗', color: ERROR_COLOR };
    case 'success': return { icon: '✔', color: SUCCESS_COLOR };
    default: return { icon: 'ℹ', color: INFO_COLOR };
  }
}

export function defaultToastContents(ui: Ui, toast: Toast): InnerResponse<void> {
  return ui.frame({ innerMargin: INNER_MARGIN }, frameUi => {
    frameUi.horizontal(row => {
      const { icon, color } = kindIcon(toast.kind);

      const addIcon = () => {
        if (toast.options.showIcon) row.label(icon, color);
      };
      const addText = () => {
        row.label(toast.text);
      };
      const addClose = () => {
        if (row.button(CLOSE_GLYPH).clicked) toast.close(row.ctx.now());
      };

      // Reverse on right-to-left rows so the toast reads the same way.
      if (prefersRightToLeft(row.layout)) {
        addClose();
        addText();
        addIcon();
      } else {
        addIcon();
        addText();
        addClose();
      }
    });
  });
}
