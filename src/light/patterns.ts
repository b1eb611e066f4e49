/**
 * Code -> light action table
 */
import type { LightAction, LightBehavior, Rgb } from '../types';
import { ConfigurationError } from '../types';
import { hexToRgb } from '../utils/color';

export const PALETTE = {
  red: hexToRgb('#FF0000'),
  green: hexToRgb('#00FF00'),
  blue: hexToRgb('#0000FF'),
  yellow: hexToRgb('#FFFF00'),
  pink: hexToRgb('#EA9198'),
  pinkWhite: hexToRgb('#FFC0CB'),
  purple: hexToRgb('#A757A8'),
  lightBlue: hexToRgb('#9DCCE0'),
  orange: hexToRgb('#FFA500'),
} as const satisfies Record<string, Rgb>;

const { red, green, blue, yellow, pink, pinkWhite, purple, lightBlue, orange } = PALETTE;

const lighting = (color: Rgb): LightBehavior => ({ kind: 'lighting', color });
const turnOff = (): LightBehavior => ({ kind: 'turnOff' });
const blinking = (color: Rgb, durationMs: number): LightBehavior => ({
  kind: 'blinking',
  color,
  durationMs,
});
const gradation = (
  colors: Rgb[],
  durationMs: number,
  repeatDurationMs?: number,
): LightBehavior => ({ kind: 'gradation', colors, durationMs, repeatDurationMs });

export const LIGHT_ACTIONS: readonly LightAction[] = [
  { code: 1, name: 'Long yellow, short green', behavior: gradation([yellow, yellow, green], 1050) },
  { code: 5, name: 'Yellow', behavior: lighting(yellow) },
  { code: 21, name: 'Pale pink blink', behavior: blinking(pinkWhite, 1800) },
  { code: 22, name: 'Blue blink', behavior: blinking(blue, 2100) },
  { code: 23, name: 'Orange blink', behavior: blinking(orange, 1800) },
  {
    code: 25,
    name: 'Red orange pink yellow green blue purple',
    behavior: gradation([red, orange, pink, yellow, green, blue, purple], 1200),
  },
  { code: 26, name: 'Light blue blink', behavior: blinking(lightBlue, 2100) },
  { code: 27, name: 'Green blink', behavior: blinking(green, 1800) },
  { code: 32, name: 'Purple blue', behavior: gradation([purple, blue], 1500, 950) },
  {
    code: 35,
    name: 'Pink yellow green light-blue blue purple red orange',
    behavior: gradation([pink, yellow, green, lightBlue, blue, purple, red, orange], 1100),
  },
  { code: 42, name: 'Pink yellow light blue', behavior: gradation([pink, yellow, lightBlue], 1100) },
  { code: 52, name: 'Light blue', behavior: lighting(lightBlue) },
  { code: 57, name: 'Fast purple blue', behavior: gradation([purple, blue], 650, 550) },
  {
    code: 61,
    name: 'Long pale pink, short green',
    behavior: gradation([pinkWhite, pinkWhite, green], 1050),
  },
  { code: 62, name: 'Off', behavior: turnOff() },
  { code: 66, name: 'Pale pink', behavior: lighting(pinkWhite) },
  {
    code: 67,
    name: 'Long light blue, short yellow',
    behavior: gradation([lightBlue, lightBlue, yellow], 1050, 900),
  },
  { code: 70, name: 'Off', behavior: turnOff() },
  { code: 76, name: 'Orange', behavior: lighting(orange) },
  { code: 78, name: 'Green blink (slow)', behavior: blinking(green, 2100) },
  { code: 90, name: 'Pink yellow light blue (quickening)', behavior: gradation([pink, yellow, lightBlue], 1000, 850) },
  { code: 95, name: 'Pale pink blink (slow)', behavior: blinking(pinkWhite, 2100) },
  { code: 99, name: 'Long pink, short red', behavior: gradation([pink, pink, red], 1100, 850) },
  { code: 101, name: 'Yellow blink', behavior: blinking(yellow, 1800) },
  { code: 103, name: 'Light blue blink (fast)', behavior: blinking(lightBlue, 1800) },
  {
    code: 105,
    name: 'Fast red orange pink yellow green light-blue purple',
    behavior: gradation([red, orange, pink, yellow, green, lightBlue, purple], 600),
  },
  { code: 107, name: 'Red blink', behavior: blinking(red, 2100) },
  { code: 111, name: 'Pink blink', behavior: blinking(pink, 1800) },
  { code: 113, name: 'Purple', behavior: lighting(purple) },
  { code: 120, name: 'Blue', behavior: lighting(blue) },
  { code: 123, name: 'Pink blink (slow)', behavior: blinking(pink, 2100) },
  { code: 124, name: 'Pink', behavior: lighting(pink) },
];

function validateBehavior(action: LightAction): void {
  const { behavior } = action;
  const fail = (reason: string) => {
    throw new ConfigurationError(`Light action ${action.code} (${action.name}): ${reason}`);
  };

  switch (behavior.kind) {
    case 'lighting':
    case 'turnOff':
      return;
    case 'blinking':
      if (!(behavior.durationMs > 0)) fail('blink duration must be positive');
      return;
    case 'gradation': {
      if (behavior.colors.length === 0) fail('gradation needs at least one color');
      const durations = [behavior.durationMs, behavior.firstDurationMs, behavior.repeatDurationMs];
      if (durations.some((d) => d !== undefined && !(d > 0))) {
        fail('gradation durations must be positive');
      }
      return;
    }
  }
}

/**
 * Index actions by code, rejecting duplicates and unusable timings
 */
export function buildActionMap(actions: readonly LightAction[]): ReadonlyMap<number, LightAction> {
  const map = new Map<number, LightAction>();
  for (const action of actions) {
    if (map.has(action.code)) {
      throw new ConfigurationError(`Duplicate light action for code ${action.code}`);
    }
    validateBehavior(action);
    map.set(action.code, action);
  }
  return map;
}
