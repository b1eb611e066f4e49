/**
 * Terminal renderer: a true-color swatch redrawn in place
 */
import type { Renderer, Rgb } from '../types';
import { rgbToHex } from '../utils/color';

export interface TerminalRendererOptions {
  /** Swatch width in columns */
  width?: number;
  /** Text shown after the hex code, read on every frame */
  label?: () => string;
}

const RESET = '\x1b[0m';
const CLEAR_LINE = '\x1b[2K';

export function swatch(color: Rgb, width: number): string {
  return `\x1b[48;2;${color.r};${color.g};${color.b}m${' '.repeat(width)}${RESET}`;
}

export function formatFrame(color: Rgb, width: number, label?: string): string {
  const text = label ? ` ${rgbToHex(color)} ${label}` : ` ${rgbToHex(color)}`;
  return `\r${CLEAR_LINE}${swatch(color, width)}${text}`;
}

export function createTerminalRenderer(
  stream: NodeJS.WritableStream,
  options: TerminalRendererOptions = {},
): Renderer {
  const width = options.width ?? 24;
  return (color) => {
    stream.write(formatFrame(color, width, options.label?.()));
  };
}
