import { describe, it, expect } from 'vitest';
import { NAVIGATION_ACTIONS, decodeCallback, encodeCallback } from '../../src/bot/callback-token.js';
import { TODAY } from '../helpers/stub-engine.js';

describe('callback tokens', () => {
  it.each(NAVIGATION_ACTIONS)('round-trips the %s action', (action) => {
    const wire = encodeCallback(action, TODAY);
    expect(wire).toBe(`${action}:2025-11-30`);
    expect(decodeCallback(wire)).toEqual({ action, date: '2025-11-30' });
  });

  it('keeps a malformed date payload for the router to resolve', () => {
    expect(decodeCallback('mode:not-a-date')).toEqual({ action: 'mode', date: 'not-a-date' });
    expect(decodeCallback('day:')).toEqual({ action: 'day', date: '' });
  });

  it('splits on the first separator only', () => {
    expect(decodeCallback('week:2025-11-30:extra')).toEqual({ action: 'week', date: '2025-11-30:extra' });
  });

  it('marks unknown actions explicitly', () => {
    expect(decodeCallback('refresh:2025-11-30')).toEqual({ action: 'unknown', raw: 'refresh:2025-11-30' });
    expect(decodeCallback('day')).toEqual({ action: 'unknown', raw: 'day' });
    expect(decodeCallback('')).toEqual({ action: 'unknown', raw: '' });
  });

  it('stays within the 64-byte callback data limit', () => {
    for (const action of NAVIGATION_ACTIONS) {
      expect(Buffer.byteLength(encodeCallback(action, TODAY))).toBeLessThanOrEqual(64);
    }
  });
});
