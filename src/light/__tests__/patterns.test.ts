import { ConfigurationError, type LightAction } from '../../types';
import { MAX_CODE } from '../../utils/constants';
import { buildActionMap, LIGHT_ACTIONS, PALETTE } from '../patterns';

describe('LIGHT_ACTIONS', () => {
  const actions = buildActionMap(LIGHT_ACTIONS);

  test('codes are unique and encodable', () => {
    expect(actions.size).toBe(LIGHT_ACTIONS.length);
    for (const code of actions.keys()) {
      expect(code).toBeGreaterThanOrEqual(0);
      expect(code).toBeLessThanOrEqual(MAX_CODE);
    }
  });

  test('known entries', () => {
    expect(actions.get(5)?.behavior).toEqual({ kind: 'lighting', color: PALETTE.yellow });
    expect(actions.get(62)?.behavior).toEqual({ kind: 'turnOff' });
    expect(actions.get(107)?.behavior).toEqual({ kind: 'blinking', color: PALETTE.red, durationMs: 2100 });
    expect(actions.get(32)?.behavior).toMatchObject({
      kind: 'gradation',
      colors: [PALETTE.purple, PALETTE.blue],
      durationMs: 1500,
      repeatDurationMs: 950,
    });
  });

  test('unassigned codes have no action', () => {
    expect(actions.get(0)).toBeUndefined();
    expect(actions.get(2)).toBeUndefined();
  });

  test('palette colors', () => {
    expect(PALETTE.pink).toEqual({ r: 0xea, g: 0x91, b: 0x98 });
    expect(PALETTE.orange).toEqual({ r: 255, g: 165, b: 0 });
  });
});

describe('buildActionMap', () => {
  const yellow: LightAction = { code: 1, name: 'Yellow', behavior: { kind: 'lighting', color: PALETTE.yellow } };

  test('rejects duplicate codes', () => {
    expect(() => buildActionMap([yellow, { ...yellow, name: 'Again' }])).toThrow(
      'Duplicate light action for code 1'
    );
  });

  test('rejects a gradation without colors', () => {
    const empty: LightAction = { code: 2, name: 'Empty', behavior: { kind: 'gradation', colors: [], durationMs: 500 } };
    expect(() => buildActionMap([empty])).toThrow(ConfigurationError);
  });

  test('rejects non-positive durations', () => {
    const blink: LightAction = {
      code: 3,
      name: 'Stuck',
      behavior: { kind: 'blinking', color: PALETTE.red, durationMs: 0 },
    };
    const fade: LightAction = {
      code: 4,
      name: 'Bad repeat',
      behavior: { kind: 'gradation', colors: [PALETTE.red], durationMs: 500, repeatDurationMs: -1 },
    };
    expect(() => buildActionMap([blink])).toThrow('Light action 3 (Stuck): blink duration must be positive');
    expect(() => buildActionMap([fade])).toThrow(ConfigurationError);
  });
});
