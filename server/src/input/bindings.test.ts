// ============================================
// Input Bindings Unit Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { fileURLToPath } from 'url';
import { loadBindings, parseBindings, readAxes } from './bindings';
import { InputState } from './InputState';

const BINDINGS_FILE = fileURLToPath(new URL('../../config/bindings.json', import.meta.url));

describe('input bindings', () => {
  describe('parseBindings', () => {
    it('reads axes into a map', () => {
      const bindings = parseBindings({ axes: { left_paddle: { pos: 'w', neg: 's' } } });

      expect(bindings.axes.get('left_paddle')).toEqual({ pos: 'w', neg: 's' });
    });

    it('rejects a missing axes object', () => {
      expect(() => parseBindings({})).toThrow('bindings: "axes" must be an object');
    });

    it('rejects an axis without both keys', () => {
      expect(() => parseBindings({ axes: { left_paddle: { pos: 'w' } } })).toThrow(
        'bindings: axis "left_paddle" needs non-empty "pos" and "neg" keys'
      );
    });

    it('rejects non-object input', () => {
      expect(() => parseBindings([], 'keys.json')).toThrow('keys.json: expected an object');
    });
  });

  describe('loadBindings', () => {
    it('loads the shipped bindings file', () => {
      const bindings = loadBindings(BINDINGS_FILE);

      expect(Array.from(bindings.axes.keys())).toEqual(['left_paddle', 'right_paddle']);
      expect(bindings.axes.get('right_paddle')).toEqual({ pos: 'up', neg: 'down' });
    });

    it('throws for a missing file', () => {
      expect(() => loadBindings('/nonexistent/bindings.json')).toThrow(
        /^Failed to read bindings \/nonexistent\/bindings\.json/
      );
    });
  });

  describe('readAxes', () => {
    const bindings = parseBindings({
      axes: {
        left_paddle: { pos: 'w', neg: 's' },
        right_paddle: { pos: 'up', neg: 'down' },
      },
    });
    let state: InputState;

    beforeEach(() => {
      state = new InputState(150);
    });

    it('maps held keys to +1 / -1', () => {
      state.press('w', 1000);
      state.press('down', 1000);

      const axes = readAxes(state, bindings, 1100);

      expect(axes.get('left_paddle')).toBe(1);
      expect(axes.get('right_paddle')).toBe(-1);
    });

    it('cancels opposing keys', () => {
      state.press('w', 1000);
      state.press('s', 1000);

      expect(readAxes(state, bindings, 1000).get('left_paddle')).toBe(0);
    });

    it('releases a key after the hold window', () => {
      state.press('w', 1000);

      expect(readAxes(state, bindings, 1149).get('left_paddle')).toBe(1);
      expect(readAxes(state, bindings, 1150).get('left_paddle')).toBe(0);
    });

    it('matches key names case-insensitively', () => {
      state.press('UP', 1000);

      expect(readAxes(state, bindings, 1000).get('right_paddle')).toBe(1);
    });

    it('reports 0 for every bound action when idle', () => {
      expect(Array.from(readAxes(state, bindings, 0))).toEqual([
        ['left_paddle', 0],
        ['right_paddle', 0],
      ]);
    });
  });
});
