import type {ColorName} from '../shared/utils/ansi.js';

export type IconKind = 'clear' | 'cloudy' | 'rain' | 'none';

export interface IconLine {
  text: string;
  color: ColorName;
}

export const ICON_WIDTH = 16;

// Five lines each, one per current-conditions row
export const ICON_ART: Record<IconKind, readonly IconLine[]> = {
  clear: [
    {text: '     \\   /', color: 'yellow'},
    {text: '      .-.', color: 'yellow'},
    {text: '   ― (   ) ―', color: 'yellow'},
    {text: "      `-'", color: 'yellow'},
    {text: '     /   \\', color: 'yellow'},
  ],
  cloudy: [
    {text: '       .--.', color: 'cyan'},
    {text: '    .-(    ).', color: 'cyan'},
    {text: '   (___.__)__)', color: 'cyan'},
    {text: '', color: 'cyan'},
    {text: '', color: 'white'},
  ],
  rain: [
    {text: '      .-.', color: 'cyan'},
    {text: '     (   ).', color: 'cyan'},
    {text: '    (___(__)', color: 'cyan'},
    {text: "    ' ' ' '", color: 'blue'},
    {text: "   ' ' ' '", color: 'blue'},
  ],
  none: [],
};

export function iconKind(condition: string): IconKind {
  const text = condition.toLowerCase();
  if (text.includes('clear') || text.includes('sunny')) return 'clear';
  if (text.includes('cloud')) return 'cloudy';
  if (text.includes('rain') || text.includes('shower')) return 'rain';
  return 'none';
}
