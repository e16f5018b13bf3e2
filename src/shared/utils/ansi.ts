// Raw SGR and cursor sequences. The layout engine builds plain strings, so
// colors are embedded directly rather than going through Ink's <Text color>.

export const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
} as const;

export type ColorName = Exclude<keyof typeof COLORS, 'reset' | 'bold'>;
export type AnsiCode = (typeof COLORS)[keyof typeof COLORS];

export const ALT_SCREEN_ENTER = '\x1b[?1049h';
export const ALT_SCREEN_LEAVE = '\x1b[?1049l';
export const CURSOR_HIDE = '\x1b[?25l';
export const CURSOR_SHOW = '\x1b[?25h';

export function paint(code: AnsiCode | '', text: string): string {
  if (!code) return text;
  return `${code}${text}${COLORS.reset}`;
}

export function bold(text: string): string {
  return paint(COLORS.bold, text);
}
