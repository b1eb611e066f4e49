/**
 * Color helpers
 */
import type { Rgb } from '../types';

const HEX_PATTERN = /^#?([0-9a-f]{6})$/i;

/**
 * Parse "#RRGGBB" (leading # optional)
 */
export function hexToRgb(hex: string): Rgb {
  const match = HEX_PATTERN.exec(hex.trim());
  if (!match) {
    throw new Error(`Invalid hex color: ${hex}`);
  }
  const value = parseInt(match[1], 16);
  return { r: (value >> 16) & 0xff, g: (value >> 8) & 0xff, b: value & 0xff };
}

export function rgbToHex(color: Rgb): string {
  const hex = (c: number) => c.toString(16).padStart(2, '0');
  return `#${hex(color.r)}${hex(color.g)}${hex(color.b)}`.toUpperCase();
}

/**
 * Per-channel linear blend from `from` to `to`, fraction clamped to [0, 1]
 */
export function lerpColor(from: Rgb, to: Rgb, fraction: number): Rgb {
  const f = Math.min(Math.max(fraction, 0), 1);
  return {
    r: Math.round(from.r + (to.r - from.r) * f),
    g: Math.round(from.g + (to.g - from.g) * f),
    b: Math.round(from.b + (to.b - from.b) * f),
  };
}
