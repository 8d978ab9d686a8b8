import { describe, expect, it } from 'vitest';

import {
  ALL_KEY_IDS,
  isButton,
  isLongPress,
  isValidKeyId,
  keyName,
  toBaseKey,
  toLongPress,
} from './actions';

describe('key IDs', () => {
  it('classifies matrix keys, buttons and long presses', () => {
    expect(isValidKeyId(15)).toBe(true);
    expect(isButton(16)).toBe(true);
    expect(isLongPress(115)).toBe(true);
    expect(isValidKeyId(20)).toBe(false);
    expect(isValidKeyId(99)).toBe(false);
    expect(isValidKeyId(1.5)).toBe(false);
  });

  it('maps between short and long press', () => {
    expect(toLongPress(3)).toBe(103);
    expect(toLongPress(17)).toBeNull();
    expect(toBaseKey(103)).toBe(3);
    expect(toBaseKey(17)).toBe(17);
  });

  it('lists every key in ascending order', () => {
    expect(ALL_KEY_IDS).toHaveLength(36);
    expect(ALL_KEY_IDS[0]).toBe(0);
    expect(ALL_KEY_IDS[19]).toBe(19);
    expect(ALL_KEY_IDS[20]).toBe(100);
    expect(ALL_KEY_IDS[35]).toBe(115);
  });

  it('names keys by matrix position', () => {
    expect(keyName(6)).toBe('Key [1,2]');
    expect(keyName(106)).toBe('Key [1,2] Long Press');
    expect(keyName(18)).toBe('Power Button Single-Press');
    expect(keyName(50)).toBe('Key 50');
  });
});
