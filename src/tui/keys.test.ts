import { describe, expect, it } from 'vitest';
import { char, describeKey, keyToAction, named, parseTermkitKey } from './keys.js';

describe('keys', () => {
  describe('parseTermkitKey', () => {
    it('should parse single characters', () => {
      expect(parseTermkitKey('q')).toEqual(char('q'));
      expect(parseTermkitKey('W')).toEqual(char('W'));
    });

    it('should parse control combinations', () => {
      expect(parseTermkitKey('CTRL_C')).toEqual({ type: 'key', code: { kind: 'char', char: 'c' }, ctrl: true });
    });

    it('should parse named keys', () => {
      expect(parseTermkitKey('UP')).toEqual(named('up'));
      expect(parseTermkitKey('ESCAPE')).toEqual(named('escape'));
    });

    it('should map unknown names to other', () => {
      expect(parseTermkitKey('F1')).toEqual(named('other'));
      expect(parseTermkitKey('SHIFT_UP')).toEqual(named('other'));
    });
  });

  describe('keyToAction', () => {
    it('should quit on q, Escape and Ctrl+C', () => {
      expect(keyToAction(char('q'))).toEqual({ type: 'quit' });
      expect(keyToAction(named('escape'))).toEqual({ type: 'quit' });
      expect(keyToAction(char('c', true))).toEqual({ type: 'quit' });
    });

    it('should move rows with s/w and the vertical arrows', () => {
      expect(keyToAction(char('s'))).toEqual({ type: 'move', action: 'advanceRow' });
      expect(keyToAction(named('down'))).toEqual({ type: 'move', action: 'advanceRow' });
      expect(keyToAction(char('w'))).toEqual({ type: 'move', action: 'retreatRow' });
      expect(keyToAction(named('up'))).toEqual({ type: 'move', action: 'retreatRow' });
    });

    it('should move columns with d/a and the horizontal arrows', () => {
      expect(keyToAction(char('d'))).toEqual({ type: 'move', action: 'advanceColumn' });
      expect(keyToAction(named('right'))).toEqual({ type: 'move', action: 'advanceColumn' });
      expect(keyToAction(char('a'))).toEqual({ type: 'move', action: 'retreatColumn' });
      expect(keyToAction(named('left'))).toEqual({ type: 'move', action: 'retreatColumn' });
    });

    it('should ignore everything else', () => {
      expect(keyToAction(char('c'))).toEqual({ type: 'none' });
      expect(keyToAction(char('s', true))).toEqual({ type: 'none' });
      expect(keyToAction(char('Q'))).toEqual({ type: 'none' });
      expect(keyToAction(named('enter'))).toEqual({ type: 'none' });
      expect(keyToAction(named('other'))).toEqual({ type: 'none' });
    });
  });

  describe('describeKey', () => {
    it('should label keys for the debug log', () => {
      expect(describeKey(char('c', true))).toBe('CTRL+c');
      expect(describeKey(named('down'))).toBe('down');
      expect(describeKey(char('w'))).toBe('w');
    });
  });
});
