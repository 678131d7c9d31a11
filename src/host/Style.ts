/**
 * Style — visual constants shared by every widget the host draws.
 */

import { type Vec2 } from '../core/Geometry';

export interface Style {
  fontSize: number;
  textColor: string;
  /** Background of window frames. */
  windowFill: string;
  windowStroke: string;
  windowStrokeWidth: number;
  windowRounding: number;
  buttonFill: string;
  buttonHoverFill: string;
  /** Space between the button text and its edge. */
  buttonPadding: Vec2;
  buttonRounding: number;
  /** Gap left between consecutive items in a layout. */
  itemSpacing: Vec2;
}

export function defaultStyle(): Style {
  return {
    fontSize: 14,
    textColor: 'rgb(210, 210, 210)',
    windowFill: 'rgb(27, 27, 27)',
    windowStroke: 'rgb(60, 60, 60)',
    windowStrokeWidth: 1,
    windowRounding: 6,
    buttonFill: 'rgb(60, 60, 60)',
    buttonHoverFill: 'rgb(70, 70, 70)',
    buttonPadding: { x: 4, y: 1 },
    buttonRounding: 2,
    itemSpacing: { x: 8, y: 3 },
  };
}
