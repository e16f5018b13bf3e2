import {BOX, ROW_ELLIPSIS} from '../constants.js';
import {expandTabs, padEndVisible, truncateVisible, visibleLength} from '../shared/utils/formatting.js';
import {logDebug} from '../shared/utils/logger.js';

/**
 * Fit styled content to exactly `width` columns: pad when it fits, otherwise
 * cut to `width - 3` columns and append `...`. Widths below the ellipsis
 * yield blanks.
 */
export function fitCell(content: string, width: number): string {
  const target = Math.max(0, Math.floor(width));
  if (target < ROW_ELLIPSIS.length) return ' '.repeat(target);
  const text = expandTabs(content);
  if (visibleLength(text) <= target) return padEndVisible(text, target);

  const room = target - ROW_ELLIPSIS.length;
  const cut = truncateVisible(text, room);
  // A wide glyph dropped at the cut leaves one column to fill
  const filler = ' '.repeat(room - visibleLength(cut));
  return cut + filler + ROW_ELLIPSIS;
}

export function renderRow(content: string, innerWidth: number): string {
  return BOX.vertical + fitCell(content, innerWidth) + BOX.vertical;
}

export function renderSplitRow(left: string, right: string, leftWidth: number, rightWidth: number): string {
  const leftCell = fitCell(left, leftWidth);
  const rightCell = fitCell(right, rightWidth);
  const expected = Math.max(0, Math.floor(leftWidth)) + Math.max(0, Math.floor(rightWidth)) + 3;
  const row = BOX.vertical + leftCell + BOX.vertical + rightCell + BOX.vertical;

  const drift = expected - visibleLength(row);
  if (drift === 0) return row;

  logDebug('Split row width drift corrected', {expected, drift});
  return BOX.vertical + leftCell + BOX.vertical + adjustPadding(rightCell, drift) + BOX.vertical;
}

// Grow or shrink trailing spaces by `delta` columns
function adjustPadding(cell: string, delta: number): string {
  if (delta > 0) return cell + ' '.repeat(delta);
  const trailing = cell.length - cell.trimEnd().length;
  return cell.slice(0, cell.length - Math.min(trailing, -delta));
}
