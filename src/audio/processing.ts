/**
 * Symbol extraction and pattern decoding
 */
import type { BeaconSymbol, MagnitudeMap, TargetFrequency } from '../types';
import { CODE_BITS, MAX_CODE, PATTERN_LENGTH, PATTERN_TEMPLATE } from '../utils/constants';

/**
 * Pick the carrier that clearly dominates a block, or null.
 *
 * The strongest entry wins when it reaches `floor` and exceeds `ratio` times
 * the mean of the remaining entries. Ties go to the first entry.
 */
export function dominantSymbol(
  magnitudes: MagnitudeMap,
  floor: number,
  ratio: number,
): BeaconSymbol {
  if (magnitudes.size < 2) return null;

  let maxFreq: TargetFrequency | null = null;
  let maxValue = -Infinity;
  for (const [freq, value] of magnitudes) {
    if (value > maxValue) {
      maxValue = value;
      maxFreq = freq;
    }
  }
  if (maxFreq === null || !Number.isFinite(maxValue)) return null;

  let otherSum = 0;
  for (const [freq, value] of magnitudes) {
    if (freq !== maxFreq) otherSum += value;
  }
  const noiseLevel = otherSum / (magnitudes.size - 1);

  if (maxValue >= floor && maxValue > noiseLevel * ratio) {
    return maxFreq;
  }
  return null;
}

/**
 * Drop empty symbols and repeats, keeping only the points where the carrier changes
 */
export function runLengthCompress(history: readonly BeaconSymbol[]): TargetFrequency[] {
  const edges: TargetFrequency[] = [];
  for (const symbol of history) {
    if (symbol === null) continue;
    if (edges.length > 0 && edges[edges.length - 1] === symbol) continue;
    edges.push(symbol);
  }
  return edges;
}

/**
 * Whether an edge window satisfies every template slot
 */
export function matchesTemplate(window: readonly TargetFrequency[]): boolean {
  if (window.length !== PATTERN_LENGTH) return false;
  return window.every((symbol, i) => PATTERN_TEMPLATE[i].includes(symbol));
}

/**
 * Most recent template-matching window of the edge sequence, or null
 */
export function findLatestMatch(edges: readonly TargetFrequency[]): TargetFrequency[] | null {
  for (let start = edges.length - PATTERN_LENGTH; start >= 0; start--) {
    const window = edges.slice(start, start + PATTERN_LENGTH);
    if (matchesTemplate(window)) return window;
  }
  return null;
}

/**
 * Fold the slot choices of a matching window into a code, most significant bit first
 */
export function decodeWindow(window: readonly TargetFrequency[]): number {
  let code = 0;
  for (let i = 1; i < PATTERN_LENGTH; i++) {
    const bit = PATTERN_TEMPLATE[i].indexOf(window[i]);
    if (bit < 0) {
      throw new RangeError(`${window[i]} Hz is not allowed in pattern slot ${i}`);
    }
    code = (code << 1) | bit;
  }
  return code;
}

/**
 * Carrier sequence that decodes to `code`
 */
export function encodeCode(code: number): TargetFrequency[] {
  if (!Number.isInteger(code) || code < 0 || code > MAX_CODE) {
    throw new RangeError(`Code must be an integer in 0..${MAX_CODE}, got ${code}`);
  }
  const sequence: TargetFrequency[] = [PATTERN_TEMPLATE[0][0]];
  for (let i = 1; i < PATTERN_LENGTH; i++) {
    const bit = (code >> (CODE_BITS - i)) & 1;
    sequence.push(PATTERN_TEMPLATE[i][bit]);
  }
  return sequence;
}

/**
 * Full decode of a symbol history; null when no window matches
 */
export function decodeHistory(history: readonly BeaconSymbol[]): number | null {
  const match = findLatestMatch(runLengthCompress(history));
  return match ? decodeWindow(match) : null;
}
