import {BOX, MIN_BOX_WIDTH, SPLIT_RATIO} from '../constants.js';

export class GeometryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeometryError';
  }
}

/**
 * Column layout for one frame. `split` is the index of the middle border in
 * the two-column box; both column widths exclude every border.
 */
export interface BoxGeometry {
  readonly totalWidth: number;
  readonly innerWidth: number;
  readonly split: number;
  readonly leftWidth: number;
  readonly rightWidth: number;
}

export function createBoxGeometry(totalWidth: number): BoxGeometry {
  if (!Number.isInteger(totalWidth) || totalWidth < MIN_BOX_WIDTH) {
    throw new GeometryError(`Box width ${totalWidth} is below the minimum of ${MIN_BOX_WIDTH} columns`);
  }

  const split = Math.floor(totalWidth * SPLIT_RATIO);
  const leftWidth = split - 1;
  const rightWidth = totalWidth - split - 2;

  if (leftWidth < 1 || rightWidth < 1 || 1 + leftWidth + 1 + rightWidth + 1 !== totalWidth) {
    throw new GeometryError(
      `Columns ${leftWidth} + ${rightWidth} + 3 do not add up to box width ${totalWidth}`,
    );
  }

  return Object.freeze({
    totalWidth,
    innerWidth: totalWidth - 2,
    split,
    leftWidth,
    rightWidth,
  });
}

const line = (left: string, fill: number, right: string): string =>
  left + BOX.horizontal.repeat(fill) + right;

const splitLine = (g: BoxGeometry, left: string, middle: string, right: string): string =>
  left + BOX.horizontal.repeat(g.leftWidth) + middle + BOX.horizontal.repeat(g.rightWidth) + right;

export const singleTop = (g: BoxGeometry): string => line(BOX.topLeft, g.innerWidth, BOX.topRight);
export const singleBottom = (g: BoxGeometry): string => line(BOX.bottomLeft, g.innerWidth, BOX.bottomRight);
export const singleDivider = (g: BoxGeometry): string => line(BOX.leftT, g.innerWidth, BOX.rightT);

export const splitTop = (g: BoxGeometry): string => splitLine(g, BOX.topLeft, BOX.topT, BOX.topRight);
export const splitBottom = (g: BoxGeometry): string => splitLine(g, BOX.bottomLeft, BOX.bottomT, BOX.bottomRight);
// Closes a full-width row and opens the two columns under it
export const splitOpen = (g: BoxGeometry): string => splitLine(g, BOX.leftT, BOX.topT, BOX.rightT);

/** Every border line with its measured length, for `--check-borders`. */
export function describeBorders(g: BoxGeometry): string[] {
  const borders: Array<[string, string]> = [
    ['SINGLE_TOP', singleTop(g)],
    ['SINGLE_BOTTOM', singleBottom(g)],
    ['SINGLE_DIVIDER', singleDivider(g)],
    ['SPLIT_TOP', splitTop(g)],
    ['SPLIT_BOTTOM', splitBottom(g)],
    ['SPLIT_OPEN', splitOpen(g)],
  ];

  const lines: string[] = [];
  for (const [name, border] of borders) {
    lines.push(`${name}:`, border);
  }
  lines.push('');
  for (const [name, border] of borders) {
    lines.push(`${name} length: ${border.length} (should be ${g.totalWidth})`);
  }
  const sum = g.leftWidth + g.rightWidth + 3;
  lines.push(`Column widths: ${g.leftWidth} + ${g.rightWidth} + 3 = ${sum} (should be ${g.totalWidth})`);
  lines.push(`Split position: ${splitTop(g).indexOf(BOX.topT)} (this is where the middle divider is)`);
  return lines;
}
