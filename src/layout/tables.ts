import {
  BOX,
  CELL_ELLIPSIS,
  COL_CONDITION_WIDTH,
  COL_DATE_WIDTH,
  COL_RAIN_WIDTH,
  COL_TEMP_WIDTH,
  COL_TIME_WIDTH,
  COL_WIND_WIDTH,
  DAILY_LIMIT,
  DAILY_MARGIN,
  DAILY_WIDE_THRESHOLD,
  HOURLY_LIMIT,
  HOURLY_MARGIN,
} from '../constants.js';
import type {DailyForecast, ForecastRecord} from '../models.js';
import {COLORS, paint, type AnsiCode, type ColorName} from '../shared/utils/ansi.js';
import {
  dailyPrecipitationColor,
  hourlyPrecipitation,
  hourlyPrecipitationColor,
  lowTemperatureColor,
  temperatureColor,
  windArrow,
} from '../shared/utils/conditions.js';
import {capitalize, centerVisible, fitVisible, padEndVisible, truncateText, visibleLength} from '../shared/utils/formatting.js';

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})/;

const colorCode = (color: ColorName | null): AnsiCode | '' => (color ? COLORS[color] : '');

function centerCell(text: string, width: number): string {
  const target = Math.max(0, width);
  if (visibleLength(text) > target) return fitVisible(text, target);
  return centerVisible(text, target);
}

function joinCells(margin: number, cells: readonly string[]): string {
  return ' '.repeat(margin) + cells.join(BOX.vertical);
}

function separatorLine(margin: number, widths: readonly number[], columnWidth: number): string {
  const line = ' '.repeat(margin) + widths.map(w => BOX.horizontal.repeat(Math.max(0, w))).join(BOX.cross);
  return fitVisible(padEndVisible(line, columnWidth, BOX.horizontal), columnWidth);
}

/** Date (`M/D`) and time (`HH:MM`) exactly as written in the forecast timestamp. */
export function splitTimestamp(timestamp: string): {date: string; time: string} {
  const match = TIMESTAMP_PATTERN.exec(timestamp);
  if (!match) return {date: '', time: ''};
  const [, , month, day, hour, minute] = match;
  return {date: `${Number(month)}/${Number(day)}`, time: `${hour}:${minute}`};
}

const HOURLY_WIDTHS = [
  COL_DATE_WIDTH,
  COL_TIME_WIDTH,
  COL_TEMP_WIDTH,
  COL_CONDITION_WIDTH,
  COL_WIND_WIDTH,
  COL_RAIN_WIDTH,
] as const;

function hourlyRow(record: ForecastRecord): string[] {
  const {date, time} = splitTimestamp(record.timestamp);
  const temp = paint(colorCode(temperatureColor(record.temperature)), record.temperature.toFixed(1));
  const condition = truncateText(capitalize(record.condition), COL_CONDITION_WIDTH, CELL_ELLIPSIS);
  const wind = `${Math.round(record.windSpeed)}mph${windArrow(record.windDirection)}`;
  const amount = hourlyPrecipitation(record.precipitation);
  const rain = amount > 0 ? paint(colorCode(hourlyPrecipitationColor(amount)), amount.toFixed(1)) : '0';

  return [date, time, temp, condition, wind, rain].map((cell, i) => centerCell(cell, HOURLY_WIDTHS[i]));
}

/**
 * Hourly table lines (header, separator, one per record up to 12), each
 * exactly `columnWidth` columns.
 */
export function buildHourlyTable(records: readonly ForecastRecord[], columnWidth: number): string[] {
  const header = ['Date', 'Time', 'Temp', 'Condition', 'Wind', 'Rain'].map((title, i) =>
    centerCell(title, HOURLY_WIDTHS[i]),
  );

  const lines = [
    fitVisible(joinCells(HOURLY_MARGIN, header), columnWidth),
    separatorLine(HOURLY_MARGIN, HOURLY_WIDTHS, columnWidth),
  ];
  for (const record of records.slice(0, HOURLY_LIMIT)) {
    lines.push(fitVisible(joinCells(HOURLY_MARGIN, hourlyRow(record)), columnWidth));
  }
  return lines;
}

export interface DailyColumns {
  day: number;
  icon: number;
  temps: number;
  weather: number;
  rain: number;
}

/** Daily column widths; narrower columns once the right box is 40 wide or less. */
export function dailyColumns(columnWidth: number): DailyColumns {
  if (columnWidth > DAILY_WIDE_THRESHOLD) {
    return {day: 6, icon: 3, temps: 8, weather: Math.max(0, Math.min(10, columnWidth - 30)), rain: 5};
  }
  return {day: 4, icon: 2, temps: 7, weather: Math.max(0, Math.min(8, columnWidth - 25)), rain: 4};
}

function dailyRow(forecast: DailyForecast, cols: DailyColumns): string[] {
  const high = Math.round(forecast.high);
  const low = Math.round(forecast.low);
  const temps =
    paint(colorCode(temperatureColor(high)), `${high}°`) + '/' + paint(colorCode(lowTemperatureColor(low)), `${low}°`);
  const icon = paint(colorCode(forecast.icon.color), forecast.icon.glyph);
  const condition = truncateText(forecast.condition, cols.weather, CELL_ELLIPSIS);
  const rain = forecast.precipitation > 0
    ? paint(colorCode(dailyPrecipitationColor(forecast.precipitation)), forecast.precipitation.toFixed(1))
    : '0';

  return [
    centerCell(forecast.dayName.slice(0, 3), cols.day),
    fitVisible(icon, cols.icon),
    centerCell(temps, cols.temps),
    centerCell(condition, cols.weather),
    centerCell(rain, cols.rain),
  ];
}

/**
 * Daily table lines (header, separator, one per day up to 7), each exactly
 * `columnWidth` columns.
 */
export function buildDailyTable(records: readonly DailyForecast[], columnWidth: number): string[] {
  const cols = dailyColumns(columnWidth);
  const header = [
    centerCell('Day', cols.day),
    ' '.repeat(cols.icon),
    centerCell('Hi/Lo', cols.temps),
    centerCell('Weather', cols.weather),
    centerCell('Rain', cols.rain),
  ];
  const widths = [cols.day, cols.icon, cols.temps, cols.weather, cols.rain];

  const lines = [
    fitVisible(joinCells(DAILY_MARGIN, header), columnWidth),
    separatorLine(DAILY_MARGIN, widths, columnWidth),
  ];
  for (const forecast of records.slice(0, DAILY_LIMIT)) {
    lines.push(fitVisible(joinCells(DAILY_MARGIN, dailyRow(forecast, cols)), columnWidth));
  }
  return lines;
}
