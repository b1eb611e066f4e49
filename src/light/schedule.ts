/**
 * Light behaviors expressed as timed color segments
 */
import type { GradationBehavior, LightBehavior, Rgb, Segment } from '../types';
import { lerpColor } from '../utils/color';
import { blinkEasing, transitionEasing } from '../utils/easing';

const instant = () => 1;

/**
 * Color of a segment `elapsedMs` after it started
 */
export function colorAt(segment: Segment, elapsedMs: number): Rgb {
  if (segment.durationMs <= 0) return segment.to;
  const progress = Math.min(Math.max(elapsedMs / segment.durationMs, 0), 1);
  return lerpColor(segment.from, segment.to, segment.easing(progress));
}

function* blinkSegments(color: Rgb, durationMs: number, offColor: Rgb): Generator<Segment> {
  while (true) {
    yield { from: offColor, to: color, durationMs, easing: blinkEasing };
  }
}

function* gradationSegments(behavior: GradationBehavior, offColor: Rgb): Generator<Segment> {
  const { colors, durationMs } = behavior;
  const firstDurationMs = behavior.firstDurationMs ?? durationMs / 2;
  const repeatDurationMs = behavior.repeatDurationMs ?? durationMs;

  let current = offColor;
  for (let loop = 0; ; loop++) {
    for (let i = 0; i < colors.length; i++) {
      let duration = repeatDurationMs;
      if (loop === 0) duration = i === 0 ? firstDurationMs : durationMs;

      yield { from: current, to: colors[i], durationMs: duration, easing: transitionEasing };
      current = colors[i];
    }
  }
}

/**
 * Segment sequence for a behavior. Steady behaviors yield one zero-length
 * segment; animated ones never end.
 */
export function* buildSegments(behavior: LightBehavior, offColor: Rgb): Generator<Segment> {
  switch (behavior.kind) {
    case 'lighting':
      yield { from: behavior.color, to: behavior.color, durationMs: 0, easing: instant };
      return;
    case 'turnOff':
      yield { from: offColor, to: offColor, durationMs: 0, easing: instant };
      return;
    case 'blinking':
      yield* blinkSegments(behavior.color, behavior.durationMs, offColor);
      return;
    case 'gradation':
      yield* gradationSegments(behavior, offColor);
      return;
  }
}
