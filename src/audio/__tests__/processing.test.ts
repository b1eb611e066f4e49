/**
 * Tests for symbol extraction and pattern decoding
 */
import * as fc from 'fast-check';
import type { BeaconSymbol, TargetFrequency } from '../../types';
import { mapOf } from '../../__tests__/helpers/magnitudes';
import {
  decodeHistory,
  decodeWindow,
  dominantSymbol,
  encodeCode,
  findLatestMatch,
  matchesTemplate,
  runLengthCompress,
} from '../processing';

const FLOOR = 500;
const RATIO = 3;

// Code 25 = 0b0011001
const CODE_25 = [18500, 18750, 19000, 19250, 19500, 18750, 19000, 19250] as const;
// Code 99 = 0b1100011
const CODE_99 = [18500, 19250, 19500, 18750, 19000, 18750, 19500, 19250] as const;

describe('dominantSymbol', () => {
  test('picks the carrier that clears the floor and the ratio', () => {
    expect(dominantSymbol(mapOf([10, 10, 2000, 10, 10]), FLOOR, RATIO)).toBe(19000);
  });

  test('needs the absolute floor', () => {
    expect(dominantSymbol(mapOf([0, 0, 499, 0, 0]), FLOOR, RATIO)).toBeNull();
    expect(dominantSymbol(mapOf([0, 0, 500, 0, 0]), FLOOR, RATIO)).toBe(19000);
  });

  test('needs to strictly exceed ratio times the mean of the others', () => {
    // others average 300, 3x is 900
    expect(dominantSymbol(mapOf([900, 300, 300, 300, 300]), FLOOR, RATIO)).toBeNull();
    expect(dominantSymbol(mapOf([901, 300, 300, 300, 300]), FLOOR, RATIO)).toBe(18500);
  });

  test('ties go to the first carrier', () => {
    expect(dominantSymbol(mapOf([0, 1000, 0, 1000, 0]), FLOOR, 0.5)).toBe(18750);
  });

  test('all-equal magnitudes never dominate', () => {
    expect(dominantSymbol(mapOf([800, 800, 800, 800, 800]), FLOOR, RATIO)).toBeNull();
  });

  test('degenerate maps', () => {
    expect(dominantSymbol(new Map(), FLOOR, RATIO)).toBeNull();
    expect(dominantSymbol(new Map<TargetFrequency, number>([[18500, 5000]]), FLOOR, RATIO)).toBeNull();
    expect(dominantSymbol(mapOf([NaN, NaN, NaN, NaN, NaN]), FLOOR, RATIO)).toBeNull();
    expect(dominantSymbol(mapOf([Infinity, 0, 0, 0, 0]), FLOOR, RATIO)).toBeNull();
  });

  test('a winner is the maximum and satisfies both thresholds', () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: 0, max: 5000 }), { minLength: 5, maxLength: 5 }), (values) => {
        const symbol = dominantSymbol(mapOf(values), FLOOR, RATIO);
        if (symbol === null) return;

        const index = [18500, 18750, 19000, 19250, 19500].indexOf(symbol);
        const winner = values[index];
        const others = values.filter((_, i) => i !== index);
        const mean = others.reduce((a, b) => a + b, 0) / others.length;

        expect(winner).toBe(Math.max(...values));
        expect(winner).toBeGreaterThanOrEqual(FLOOR);
        expect(winner).toBeGreaterThan(mean * RATIO);
      })
    );
  });

  test('without a floor the choice is scale invariant', () => {
    fc.assert(
      fc.property(
        fc.array(fc.integer({ min: 0, max: 1000 }), { minLength: 5, maxLength: 5 }),
        fc.integer({ min: 1, max: 8 }),
        (values, scale) => {
          const scaled = values.map((v) => v * scale);
          expect(dominantSymbol(mapOf(scaled), 0, RATIO)).toBe(dominantSymbol(mapOf(values), 0, RATIO));
        }
      )
    );
  });
});

describe('runLengthCompress', () => {
  test('drops empty symbols and repeats', () => {
    const history: BeaconSymbol[] = [null, 18500, 18500, null, 18750, 18750, 19000, null];
    expect(runLengthCompress(history)).toEqual([18500, 18750, 19000]);
  });

  test('a gap inside a run does not split it', () => {
    expect(runLengthCompress([18750, null, 18750])).toEqual([18750]);
  });

  test('empty and silent histories', () => {
    expect(runLengthCompress([])).toEqual([]);
    expect(runLengthCompress([null, null, null])).toEqual([]);
  });
});

describe('template matching', () => {
  test('accepts a valid window only at full length', () => {
    expect(matchesTemplate([...CODE_25])).toBe(true);
    expect(matchesTemplate(CODE_25.slice(0, 7))).toBe(false);
  });

  test('rejects a window without the start marker', () => {
    expect(matchesTemplate([19000, ...CODE_25.slice(1)])).toBe(false);
  });

  test('fewer than eight edges never match', () => {
    expect(findLatestMatch(CODE_25.slice(0, 7))).toBeNull();
  });

  test('the most recent window wins', () => {
    expect(findLatestMatch([...CODE_25, ...CODE_99])).toEqual([...CODE_99]);
    expect(findLatestMatch([...CODE_99, ...CODE_25, 19500])).toEqual([...CODE_25]);
  });
});

describe('code folding', () => {
  test('decodes most significant bit first', () => {
    expect(decodeWindow(CODE_25)).toBe(25);
    expect(decodeWindow(CODE_99)).toBe(99);
  });

  test('extremes', () => {
    expect(encodeCode(0)).toEqual([18500, 18750, 19000, 18750, 19000, 18750, 19000, 18750]);
    expect(encodeCode(127)).toEqual([18500, 19250, 19500, 19250, 19500, 19250, 19500, 19250]);
  });

  test('encodes known codes', () => {
    expect(encodeCode(25)).toEqual([...CODE_25]);
    expect(encodeCode(99)).toEqual([...CODE_99]);
  });

  test('rejects symbols a slot does not allow', () => {
    expect(() => decodeWindow([18500, 19000, ...CODE_25.slice(2)])).toThrow(RangeError);
  });

  test('rejects codes outside 0..127', () => {
    expect(() => encodeCode(128)).toThrow(RangeError);
    expect(() => encodeCode(-1)).toThrow(RangeError);
    expect(() => encodeCode(1.5)).toThrow(RangeError);
  });

  test('any code survives repetition and gaps in the history', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 127 }), fc.integer({ min: 1, max: 4 }), (code, hold) => {
        const history: BeaconSymbol[] = [null];
        for (const symbol of encodeCode(code)) {
          for (let i = 0; i < hold; i++) history.push(symbol);
          history.push(null);
        }
        expect(decodeHistory(history)).toBe(code);
      })
    );
  });

  test('silence decodes to nothing', () => {
    expect(decodeHistory(new Array<BeaconSymbol>(43).fill(null))).toBeNull();
  });
});
