/**
 * Easing curves for blink and transition animations
 */
import type { EasingFunction } from '../types';

/**
 * Sine pulse: fades in over the first half, out over the second
 */
export const normalBlink: EasingFunction = (progress) => Math.sin(progress * Math.PI);

/**
 * Pulse with a held peak and a held off phase.
 *
 * - 0% - 25%: fade in (0 -> 1)
 * - 25% - 50%: hold on (1)
 * - 50% - 75%: fade out (1 -> 0)
 * - 75% - 100%: hold off (0)
 */
export const blinkEasing: EasingFunction = (progress) => {
  if (progress < 0.25) {
    return normalBlink(progress * 2);
  } else if (progress < 0.5) {
    return 1.0;
  } else if (progress < 0.75) {
    return normalBlink((progress - 0.5) * 2 + 0.5);
  }
  return 0.0;
};

/**
 * CSS-style cubic bezier through (0,0), (x1,y1), (x2,y2), (1,1)
 */
export function cubicBezier(x1: number, y1: number, x2: number, y2: number): EasingFunction {
  // Polynomial coefficients of one bezier axis
  const cx = 3 * x1;
  const bx = 3 * (x2 - x1) - cx;
  const ax = 1 - cx - bx;
  const cy = 3 * y1;
  const by = 3 * (y2 - y1) - cy;
  const ay = 1 - cy - by;

  const sampleX = (t: number) => ((ax * t + bx) * t + cx) * t;
  const sampleY = (t: number) => ((ay * t + by) * t + cy) * t;
  const slopeX = (t: number) => (3 * ax * t + 2 * bx) * t + cx;

  const solveT = (x: number): number => {
    // Newton first, bisection if the slope flattens out
    let t = x;
    for (let i = 0; i < 8; i++) {
      const err = sampleX(t) - x;
      if (Math.abs(err) < 1e-7) return t;
      const d = slopeX(t);
      if (Math.abs(d) < 1e-6) break;
      t -= err / d;
    }

    let lo = 0;
    let hi = 1;
    t = x;
    while (lo < hi) {
      const value = sampleX(t);
      if (Math.abs(value - x) < 1e-7) return t;
      if (x > value) lo = t;
      else hi = t;
      if (hi - lo < 1e-9) break;
      t = (lo + hi) / 2;
    }
    return t;
  };

  return (progress) => {
    if (progress <= 0) return 0;
    if (progress >= 1) return 1;
    return sampleY(solveT(progress));
  };
}

export const easeOut: EasingFunction = cubicBezier(0, 0, 0.58, 1);

/**
 * Ease-out at double speed: reaches the target at 50% and holds it
 */
export const transitionEasing: EasingFunction = (progress) => {
  const scaled = Math.min(Math.max(progress * 2, 0), 1);
  return easeOut(scaled);
};
