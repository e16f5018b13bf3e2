import {describe, test, expect} from '@jest/globals';
import {gaugeColor, gaugeFill, gaugeFraction, renderGauge} from '../../src/layout/gauge.js';
import {visibleLength} from '../../src/shared/utils/formatting.js';

describe('gauge', () => {
  test('fraction is clamped to [0, 1]', () => {
    expect(gaugeFraction(50, 100)).toBe(0.5);
    expect(gaugeFraction(-5, 100)).toBe(0);
    expect(gaugeFraction(150, 100)).toBe(1);
    expect(gaugeFraction(5, 0)).toBe(0);
    expect(gaugeFraction(Number.NaN, 100)).toBe(0);
  });

  test('any positive value fills at least one cell', () => {
    expect(gaugeFill(1, 1000, 30)).toBe(1);
    expect(gaugeFill(0, 100, 30)).toBe(0);
    expect(gaugeFill(150, 100, 10)).toBe(10);
  });

  test('an unusable scale leaves the bar empty', () => {
    expect(gaugeFill(5, 0, 30)).toBe(0);
    expect(gaugeFill(5, -10, 30)).toBe(0);
  });

  test('color bands', () => {
    expect(gaugeColor(0.29)).toBe('blue');
    expect(gaugeColor(0.3)).toBe('green');
    expect(gaugeColor(0.6)).toBe('yellow');
    expect(gaugeColor(0.8)).toBe('red');
  });

  test('renders a bar without a label', () => {
    expect(renderGauge(50, 100, 10)).toBe('[\x1b[32m█████\x1b[0m     ]');
  });

  test('pads the label to a fixed column', () => {
    expect(renderGauge(30, 100, 5, 'Humidity (30%)')).toBe(
      'Humidity (30%)' + ' '.repeat(11) + '[\x1b[32m█\x1b[0m    ]',
    );
  });

  test('zero renders an empty bar', () => {
    expect(renderGauge(0, 100, 20)).toBe('[\x1b[34m\x1b[0m' + ' '.repeat(20) + ']');
  });

  test('a tiny value renders exactly one block', () => {
    expect(renderGauge(1, 100, 20)).toBe('[\x1b[34m█\x1b[0m' + ' '.repeat(19) + ']');
  });

  test('an empty label still takes the label column', () => {
    expect(renderGauge(50, 100, 10, '')).toBe(' '.repeat(25) + '[\x1b[32m█████\x1b[0m     ]');
  });

  test('fill never decreases and stays within the bar', () => {
    let previous = 0;
    for (let value = 0; value <= 120; value++) {
      const filled = gaugeFill(value, 100, 20);
      expect(filled).toBeGreaterThanOrEqual(previous);
      expect(filled).toBeLessThanOrEqual(20);
      expect(visibleLength(renderGauge(value, 100, 20))).toBe(22);
      previous = filled;
    }
  });

  test('a full bar is red', () => {
    expect(renderGauge(10, 10, 3)).toBe('[\x1b[31m███\x1b[0m]');
  });
});
