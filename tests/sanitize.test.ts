/**
 * Source Sanitizer Tests
 */

import { describe, it, expect } from 'vitest';
import { parse, walk } from '../src/atoms/index.js';
import { expandIndentation, sanitizeSource } from '../src/sanitize/index.js';
import { getDefaultSymbolTable } from '../src/symbols/index.js';

describe('Source Sanitizer', () => {
  const raw = '\uFEFF<< GID 32-105 >>\r\nuni_start_stream  \r\n\tuni_void\r\nuni_end_stream';

  it('should normalise line endings, banners, tabs and trailing spaces', () => {
    expect(sanitizeSource(raw, { tabWidth: 4 })).toEqual({
      text: '\nuni_start_stream\n    uni_void\nuni_end_stream',
      bannerLines: 1,
      expandedLines: 1,
    });
  });

  it('should keep line numbers of the lines after a banner', () => {
    const tree = parse(sanitizeSource(raw, { tabWidth: 4 }).text, getDefaultSymbolTable());
    expect([...walk(tree)].map((n) => n.sourceLine)).toEqual([2, 3, 4]);
  });

  it('should keep the banner when asked', () => {
    const result = sanitizeSource(raw, { keepBanner: true });
    expect(result.bannerLines).toBe(0);
    expect(result.text.split('\n')[0]).toBe('<< GID 32-105 >>');
  });

  it('should leave tabs alone without a tab width', () => {
    const result = sanitizeSource('uni_start_stream\n\tuni_void\nuni_end_stream');
    expect(result.text).toBe('uni_start_stream\n\tuni_void\nuni_end_stream');
    expect(result.expandedLines).toBe(0);
  });

  it('should only treat leading lines as banners', () => {
    const source = 'uni_start_stream\n<< GID 1-2 >>\nuni_end_stream';
    expect(sanitizeSource(source).text).toBe(source);
  });

  describe('expandIndentation', () => {
    it('should advance tabs to the next tab stop', () => {
      expect(expandIndentation(' \tx', 4)).toBe('    x');
      expect(expandIndentation('\t\tx', 2)).toBe('    x');
      expect(expandIndentation('  \t x', 4)).toBe('     x');
    });

    it('should leave tabs after the indentation', () => {
      expect(expandIndentation('a\tb', 4)).toBe('a\tb');
    });
  });
});
