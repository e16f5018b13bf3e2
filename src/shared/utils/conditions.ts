import {
  DAILY_RAIN_HEAVY,
  HOURLY_RAIN_HEAVY,
  HOURLY_RAIN_LIGHT,
  LOW_TEMP_COOL,
  OBSERVATION_DEFAULTS,
  TEMP_HOT,
  TEMP_MILD,
  TEMP_WARM,
} from '../../constants.js';
import type {ConditionIcon, Precipitation} from '../../models.js';
import type {ColorName} from './ansi.js';

const COMPASS_16 = ['N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE', 'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW'] as const;
const ARROWS_8 = ['↑', '↗', '→', '↘', '↓', '↙', '←', '↖'] as const;

export function temperatureColor(tempF: number): ColorName {
  if (tempF > TEMP_HOT) return 'red';
  if (tempF > TEMP_WARM) return 'yellow';
  if (tempF > TEMP_MILD) return 'green';
  return 'blue';
}

export function lowTemperatureColor(tempF: number): ColorName {
  if (tempF > TEMP_WARM) return 'yellow';
  if (tempF > TEMP_MILD) return 'green';
  if (tempF > LOW_TEMP_COOL) return 'blue';
  return 'cyan';
}

export function hourlyPrecipitationColor(amount: number): ColorName | null {
  if (amount > HOURLY_RAIN_HEAVY) return 'blue';
  if (amount > HOURLY_RAIN_LIGHT) return 'cyan';
  return null;
}

export function dailyPrecipitationColor(amount: number): ColorName | null {
  if (amount > DAILY_RAIN_HEAVY) return 'blue';
  if (amount > 0) return 'cyan';
  return null;
}

/** Hourly rain + snow, falling back to a third of the 3-hour totals. */
export function hourlyPrecipitation(precipitation?: Readonly<Precipitation>): number {
  if (!precipitation) return 0;
  const hourly = (precipitation.rain1h ?? 0) + (precipitation.snow1h ?? 0);
  if (hourly > 0) return hourly;
  return ((precipitation.rain3h ?? 0) + (precipitation.snow3h ?? 0)) / 3;
}

function normalizeDegrees(degrees: number): number {
  if (!Number.isFinite(degrees)) return 0;
  return ((degrees % 360) + 360) % 360;
}

export function windDirectionName(degrees: number): string {
  return COMPASS_16[Math.round(normalizeDegrees(degrees) / 22.5) % 16];
}

export function windArrow(degrees: number): string {
  return ARROWS_8[Math.round(normalizeDegrees(degrees) / 45) % 8];
}

/** Compass point (N, WSW, ...) to degrees; unknown names read as west. */
export function compassToDegrees(direction: string): number {
  const index = COMPASS_16.findIndex(name => name === direction.trim().toUpperCase());
  return index === -1 ? OBSERVATION_DEFAULTS.windDirection : index * 22.5;
}

/** Daily icon chosen by the first keyword the condition contains. */
export function conditionIcon(condition: string): ConditionIcon {
  if (condition.includes('Sunny') || condition.includes('Clear')) return {glyph: '☀️', color: 'yellow'};
  if (condition.includes('Partly')) return {glyph: '⛅', color: 'cyan'};
  if (condition.includes('Cloud')) return {glyph: '☁️', color: 'white'};
  if (condition.includes('Rain')) return {glyph: '🌧️', color: 'blue'};
  if (condition.includes('Thunder')) return {glyph: '⛈️', color: 'magenta'};
  return {glyph: '🌤️', color: 'white'};
}

/** Drop "Chance"/"chance" qualifiers the forecast office prefixes conditions with. */
export function stripChance(condition: string): string {
  return condition.replace(/chance/gi, '').replace(/\s{2,}/g, ' ').trim();
}

export const fahrenheitToCelsius = (tempF: number): number => (tempF - 32) * 5 / 9;
export const celsiusToFahrenheit = (tempC: number): number => tempC * 9 / 5 + 32;
