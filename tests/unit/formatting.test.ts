import {describe, test, expect} from '@jest/globals';
import {
  capitalize,
  centerVisible,
  expandTabs,
  fitVisible,
  formatClock,
  formatDateTime,
  padEndVisible,
  stripStyles,
  truncateText,
  truncateVisible,
  visibleLength,
} from '../../src/shared/utils/formatting.js';

const RED = '\x1b[31m';
const RESET = '\x1b[0m';

describe('formatting utils', () => {
  describe('stripStyles', () => {
    test('removes SGR sequences', () => {
      expect(stripStyles(`${RED}red${RESET} plain`)).toBe('red plain');
    });

    test('is idempotent', () => {
      const styled = '\x1b[1m\x1b[36mA\x1b[0mB';
      expect(stripStyles(styled)).toBe('AB');
      expect(stripStyles(stripStyles(styled))).toBe(stripStyles(styled));
    });

    test('removes sequences exposed by a previous removal', () => {
      expect(stripStyles('\x1b\x1b[31m[31mX')).toBe('X');
    });

    test('leaves a lone escape that starts no sequence', () => {
      expect(stripStyles('a\x1bb')).toBe('a\x1bb');
    });
  });

  describe('visibleLength', () => {
    test('counts plain text', () => {
      expect(visibleLength('hello')).toBe(5);
      expect(visibleLength('')).toBe(0);
    });

    test('ignores escape sequences', () => {
      expect(visibleLength(`\x1b[32mhi${RESET}`)).toBe(2);
    });

    test('counts wide characters as two columns', () => {
      expect(visibleLength('日本')).toBe(4);
      expect(visibleLength('⛅')).toBe(2);
      expect(visibleLength('🌧️')).toBe(2);
    });

    test('emoji presentation selector widens a narrow symbol', () => {
      expect(visibleLength('☀')).toBe(1);
      expect(visibleLength('☀️')).toBe(2);
    });

    test('combining marks and control characters take no columns', () => {
      expect(visibleLength('é')).toBe(1);
      expect(visibleLength('a\x1bb')).toBe(2);
    });

    test('arrows are narrow by default', () => {
      expect(visibleLength('→')).toBe(1);
    });
  });

  describe('truncateVisible', () => {
    test('keeps styles before the cut and appends a reset', () => {
      expect(truncateVisible(`${RED}hello${RESET}`, 3)).toBe(`${RED}hel${RESET}`);
    });

    test('never splits a wide character', () => {
      expect(truncateVisible('a日b', 2)).toBe('a');
    });

    test('returns the text untouched when it fits', () => {
      expect(truncateVisible('abc', 5)).toBe('abc');
    });
  });

  describe('padding helpers', () => {
    test('padEndVisible measures without escapes', () => {
      expect(padEndVisible(`\x1b[1mab${RESET}`, 4)).toBe(`\x1b[1mab${RESET}  `);
    });

    test('padEndVisible with a custom fill', () => {
      expect(padEndVisible('ab', 4, '─')).toBe('ab──');
    });

    test('centerVisible puts the odd column on the right', () => {
      expect(centerVisible('ab', 5)).toBe(' ab  ');
      expect(centerVisible('toolong', 3)).toBe('toolong');
    });

    test('fitVisible pads or cuts to the exact width', () => {
      expect(fitVisible('abc', 5)).toBe('abc  ');
      expect(fitVisible('abcdef', 4)).toBe('abcd');
    });

    test('tabs become single spaces', () => {
      expect(expandTabs('a\tb\t')).toBe('a b ');
      expect(visibleLength('a\tb')).toBe(3);
      expect(fitVisible('a\tb', 4)).toBe('a b ');
    });
  });

  describe('truncateText', () => {
    test('should not truncate if text is shorter than maxLength', () => {
      expect(truncateText('hello', 10)).toBe('hello');
    });

    test('should truncate if text is longer than maxLength', () => {
      expect(truncateText('hello world', 8)).toBe('hello...');
    });

    test('should use a custom suffix', () => {
      expect(truncateText('hello world', 8, '..')).toBe('hello ..');
    });

    test('clips the suffix when it does not fit', () => {
      expect(truncateText('abc', 2)).toBe('..');
      expect(truncateText('abc', 0)).toBe('');
    });
  });

  test('capitalize lowercases the rest', () => {
    expect(capitalize('PARTLY cloudy')).toBe('Partly cloudy');
    expect(capitalize('')).toBe('');
  });

  test('formats local clock values', () => {
    const date = new Date(2024, 0, 2, 3, 4, 5);
    expect(formatDateTime(date)).toBe('2024-01-02 03:04:05');
    expect(formatClock(date)).toBe('03:04');
  });
});
