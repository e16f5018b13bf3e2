import {AMBIGUOUS_ARROWS_ARE_WIDE} from '../../constants.js';
import {COLORS} from './ansi.js';

// CSI sequences (ESC [ params intermediates final) and two-byte ESC forms.
const ANSI_SOURCE = String.raw`\x1B(?:\[[0-?]*[ -\/]*[@-~]|[@-Z\\-_])`;
const ANSI_GLOBAL = new RegExp(ANSI_SOURCE, 'g');
const ANSI_STICKY = new RegExp(ANSI_SOURCE, 'y');

const VARIATION_SELECTOR_16 = 0xFE0F;

// Symbols below the emoji planes that terminals draw with emoji presentation
const WIDE_SYMBOLS = new Set([
  0x231A, 0x231B, 0x23F0, 0x23F3, 0x2614, 0x2615, 0x26A1, 0x26C4, 0x26C5,
  0x26D4, 0x2705, 0x2728, 0x274C, 0x2753, 0x2757, 0x2B50, 0x2B55,
]);

const AMBIGUOUS_ARROWS = new Set([0x2190, 0x2191, 0x2192, 0x2193, 0x2196, 0x2197, 0x2198, 0x2199]);

export function truncateText(text: string, maxLength: number, suffix = '...'): string {
  if (maxLength <= 0) return '';
  if (text.length <= maxLength) return text;
  if (suffix.length >= maxLength) return suffix.slice(0, maxLength);
  return text.slice(0, maxLength - suffix.length) + suffix;
}

export function capitalize(text: string): string {
  if (!text) return text;
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

const pad2 = (num: number): string => String(num).padStart(2, '0');

export function formatClock(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

export function formatDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

/**
 * Remove every terminal escape sequence. Repeats until stable, so stripping
 * can never expose a new sequence and the result is idempotent.
 */
export function stripStyles(text: string): string {
  let current = text;
  for (;;) {
    const next = current.replace(ANSI_GLOBAL, '');
    if (next === current) return next;
    current = next;
  }
}

function isZeroWidth(codePoint: number): boolean {
  // Tab is left out: it measures one column
  if ((codePoint <= 0x1F && codePoint !== 0x09) || (codePoint >= 0x7F && codePoint <= 0x9F)) return true;
  // Combining marks
  if (
    (codePoint >= 0x0300 && codePoint <= 0x036F) ||
    (codePoint >= 0x1AB0 && codePoint <= 0x1AFF) ||
    (codePoint >= 0x1DC0 && codePoint <= 0x1DFF) ||
    (codePoint >= 0x20D0 && codePoint <= 0x20FF) ||
    (codePoint >= 0xFE20 && codePoint <= 0xFE2F)
  ) return true;
  // Variation selectors and zero-width joiners/spaces
  return (
    (codePoint >= 0xFE00 && codePoint <= 0xFE0F) ||
    codePoint === 0x200B || codePoint === 0x200C || codePoint === 0x200D
  );
}

function isWide(codePoint: number): boolean {
  if (
    (codePoint >= 0x1100 && codePoint <= 0x115F) ||
    codePoint === 0x2329 || codePoint === 0x232A ||
    (codePoint >= 0x2E80 && codePoint <= 0xA4CF && codePoint !== 0x303F) ||
    (codePoint >= 0xAC00 && codePoint <= 0xD7A3) ||
    (codePoint >= 0xF900 && codePoint <= 0xFAFF) ||
    (codePoint >= 0xFE10 && codePoint <= 0xFE19) ||
    (codePoint >= 0xFE30 && codePoint <= 0xFE6F) ||
    (codePoint >= 0xFF00 && codePoint <= 0xFF60) ||
    (codePoint >= 0xFFE0 && codePoint <= 0xFFE6) ||
    (codePoint >= 0x1F300 && codePoint <= 0x1F64F) ||
    (codePoint >= 0x1F680 && codePoint <= 0x1F6FF) ||
    (codePoint >= 0x1F900 && codePoint <= 0x1F9FF) ||
    (codePoint >= 0x1FA70 && codePoint <= 0x1FAFF) ||
    (codePoint >= 0x20000 && codePoint <= 0x3FFFD)
  ) return true;

  if (WIDE_SYMBOLS.has(codePoint)) return true;
  return AMBIGUOUS_ARROWS_ARE_WIDE && AMBIGUOUS_ARROWS.has(codePoint);
}

export function codePointWidth(codePoint: number): number {
  if (isZeroWidth(codePoint)) return 0;
  return isWide(codePoint) ? 2 : 1;
}

interface Segment {
  text: string;
  width: number;
  style: boolean;
}

/**
 * Split styled text into escape sequences and visible cells. Zero-width code
 * points ride along with the cell before them; VS16 after a narrow symbol
 * switches it to two-column emoji presentation.
 */
function segmentStyled(text: string): Segment[] {
  const segments: Segment[] = [];
  let i = 0;
  while (i < text.length) {
    if (text.charCodeAt(i) === 0x1B) {
      ANSI_STICKY.lastIndex = i;
      const match = ANSI_STICKY.exec(text);
      if (match) {
        segments.push({text: match[0], width: 0, style: true});
        i += match[0].length;
        continue;
      }
    }

    const codePoint = text.codePointAt(i) ?? 0;
    const ch = String.fromCodePoint(codePoint);
    i += ch.length;
    const width = codePointWidth(codePoint);
    const last = segments.length > 0 ? segments[segments.length - 1] : undefined;

    if (width === 0 && last && !last.style && last.width > 0) {
      last.text += ch;
      const base = last.text.codePointAt(0) ?? 0;
      if (codePoint === VARIATION_SELECTOR_16 && last.width === 1 && base >= 0x2000) {
        last.width = 2;
      }
      continue;
    }
    segments.push({text: ch, width, style: false});
  }
  return segments;
}

/** Terminal columns occupied by `text`, ignoring escape sequences. */
export function visibleLength(text: string): number {
  let width = 0;
  for (const segment of segmentStyled(text)) width += segment.width;
  return width;
}

/**
 * Keep at most `targetWidth` visible columns. Escape sequences before the cut
 * are preserved and a reset is appended when any were kept. A wide cell that
 * would straddle the cut is dropped, so the result may be one column short.
 */
export function truncateVisible(text: string, targetWidth: number): string {
  let width = 0;
  let result = '';
  let styled = false;

  for (const segment of segmentStyled(text)) {
    if (segment.style) {
      result += segment.text;
      styled = true;
      continue;
    }
    if (width + segment.width > targetWidth) break;
    result += segment.text;
    width += segment.width;
  }

  return styled ? result + COLORS.reset : result;
}

export function padEndVisible(text: string, targetWidth: number, fill = ' '): string {
  const currentWidth = visibleLength(text);
  if (currentWidth >= targetWidth) return text;
  return text + fill.repeat(targetWidth - currentWidth);
}

/** Center within `targetWidth`; the odd column of padding goes to the right. */
export function centerVisible(text: string, targetWidth: number): string {
  const pad = targetWidth - visibleLength(text);
  if (pad <= 0) return text;
  const left = Math.floor(pad / 2);
  return ' '.repeat(left) + text + ' '.repeat(pad - left);
}

// A tab is measured and drawn as one space
export function expandTabs(text: string): string {
  return text.replace(/\t/g, ' ');
}

/** Truncate-or-pad to exactly `targetWidth` columns, without an ellipsis. */
export function fitVisible(text: string, targetWidth: number): string {
  const width = Math.max(0, targetWidth);
  const plain = expandTabs(text);
  const truncated = visibleLength(plain) > width ? truncateVisible(plain, width) : plain;
  return padEndVisible(truncated, width);
}
