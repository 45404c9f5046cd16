/**
 * Text Layout Tests
 *
 * A monospace measurer (each character is half the font size wide) keeps
 * every wrap decision predictable.
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_FONT_FAMILY,
  centerOffsets,
  fitAndWrap,
  fontString,
  lineHeightFor,
  resolveFontFamily,
  strokeWidthFor,
  wrapText,
} from './text-layout.js';
import type { TextMeasurer } from './text-layout.js';

const mono: TextMeasurer = {
  measure: (text, fontSize) => text.length * fontSize * 0.5,
};

describe('Text Layout', () => {
  describe('metrics', () => {
    it('should derive line height and stroke width from the font size', () => {
      expect(lineHeightFor(96)).toBe(105);
      expect(lineHeightFor(20)).toBe(22);
      expect(strokeWidthFor(20)).toBe(2);
      expect(strokeWidthFor(96)).toBe(6);
    });

    it('should build canvas font strings', () => {
      expect(fontString(40, DEFAULT_FONT_FAMILY)).toBe('bold 40px sans-serif');
      expect(fontString(28, 'MemeDisplay', 'normal')).toBe('normal 28px "MemeDisplay", sans-serif');
    });
  });

  describe('wrapText', () => {
    it('should wrap greedily', () => {
      expect(wrapText(mono, 'HELLO WORLD FOO', 40, 100)).toEqual(['HELLO', 'WORLD', 'FOO']);
    });

    it('should give an oversized token its own truncated line', () => {
      const long = 'x'.repeat(60);
      expect(wrapText(mono, `a ${long} b`, 20, 100)).toEqual(['a', 'x'.repeat(40), 'b']);
    });
  });

  describe('fitAndWrap', () => {
    it('should keep the start size when the text fits', () => {
      expect(fitAndWrap(mono, 'HI THERE', 200, 100, 40)).toEqual({
        fontSize: 40,
        lines: ['HI THERE'],
        lineHeight: 44,
      });
    });

    it('should step down until the block fits', () => {
      expect(fitAndWrap(mono, 'HELLO WORLD FOO', 100, 50, 40)).toEqual({
        fontSize: 20,
        lines: ['HELLO', 'WORLD FOO'],
        lineHeight: 22,
      });
    });

    it('should settle on the minimum size when nothing fits', () => {
      expect(fitAndWrap(mono, 'HELLO WORLD FOO', 100, 10, 40)).toEqual({
        fontSize: 18,
        lines: ['HELLO WORLD', 'FOO'],
        lineHeight: 19,
      });
    });

    it('should return no lines for blank text', () => {
      expect(fitAndWrap(mono, '   ', 100, 100, 40)).toEqual({ fontSize: 18, lines: [], lineHeight: 19 });
    });
  });

  describe('centerOffsets', () => {
    it('should centre each line including its stroke', () => {
      expect(centerOffsets(mono, ['HI'], 20, 200, 2)).toEqual([88]);
    });

    it('should never go closer than 10px to the left edge', () => {
      expect(centerOffsets(mono, ['x'.repeat(30)], 20, 200, 2)).toEqual([10]);
    });
  });

  describe('resolveFontFamily', () => {
    it('should fall back past a missing preferred font and memoize the result', () => {
      const family = resolveFontFamily('/nonexistent/fonts/Missing.ttf');
      expect(['MemeDisplay', DEFAULT_FONT_FAMILY]).toContain(family);
      expect(resolveFontFamily('/nonexistent/fonts/Missing.ttf')).toBe(family);
    });
  });
});
