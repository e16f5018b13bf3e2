import {GAUGE_FILL, GAUGE_LABEL_WIDTH} from '../constants.js';
import {COLORS, type ColorName} from '../shared/utils/ansi.js';
import {padEndVisible} from '../shared/utils/formatting.js';

export function gaugeFraction(value: number, max: number): number {
  if (!Number.isFinite(value) || !Number.isFinite(max) || max <= 0) return 0;
  return Math.min(1, Math.max(0, value / max));
}

/**
 * Filled cells for `value`; any positive value shows at least one cell.
 * An unusable scale (max <= 0, non-finite input) leaves the bar empty.
 */
export function gaugeFill(value: number, max: number, width: number): number {
  if (!Number.isFinite(value) || !Number.isFinite(max) || max <= 0) return 0;
  const cells = Math.max(0, Math.floor(width));
  let filled = Math.floor(cells * gaugeFraction(value, max));
  if (value > 0 && filled === 0 && cells > 0) filled = 1;
  return filled;
}

export function gaugeColor(fraction: number): ColorName {
  if (fraction < 0.3) return 'blue';
  if (fraction < 0.6) return 'green';
  if (fraction < 0.8) return 'yellow';
  return 'red';
}

export function renderGauge(value: number, max: number, width: number, label?: string): string {
  const cells = Math.max(0, Math.floor(width));
  const filled = gaugeFill(value, max, cells);
  const color = COLORS[gaugeColor(gaugeFraction(value, max))];
  const bar = `[${color}${GAUGE_FILL.repeat(filled)}${COLORS.reset}${' '.repeat(cells - filled)}]`;
  return label !== undefined ? padEndVisible(label, GAUGE_LABEL_WIDTH) + bar : bar;
}
