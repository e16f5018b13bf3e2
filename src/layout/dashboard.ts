import {
  APP_TITLE,
  GAUGE_BAR_WIDTH,
  PRESSURE_RANGE_HPA,
  SECOND_MS,
  UI_MIN_COLUMNS,
  UI_MIN_ROWS,
  VISIBILITY_RANGE_KM,
} from '../constants.js';
import type {CurrentConditions, DashboardState, WeatherSnapshot} from '../models.js';
import {COLORS, bold, paint} from '../shared/utils/ansi.js';
import {fahrenheitToCelsius, temperatureColor, windArrow, windDirectionName} from '../shared/utils/conditions.js';
import {capitalize, centerVisible, fitVisible, formatClock, formatDateTime, visibleLength} from '../shared/utils/formatting.js';
import {logError} from '../shared/utils/logger.js';
import {
  GeometryError,
  createBoxGeometry,
  singleBottom,
  singleTop,
  splitBottom,
  splitOpen,
  type BoxGeometry,
} from './BoxGeometry.js';
import {renderGauge} from './gauge.js';
import {ICON_ART, ICON_WIDTH, iconKind} from './icons.js';
import {renderRow, renderSplitRow} from './rows.js';
import {buildDailyTable, buildHourlyTable} from './tables.js';

export interface ComposeOptions {
  refreshSeconds: number;
}

export interface Viewport {
  columns: number;
  rows: number;
  maxWidth: number;
  forcedWidth?: number;
  refreshIntervalMs: number;
}

const SUN_LINE_INDENT = 20;

/** Box width for a terminal: two columns of margin, capped at `maxWidth`. */
export function frameWidth(columns: number, maxWidth: number): number {
  return Math.min(columns - 2, maxWidth);
}

export function tooSmallFrame(columns: number, rows: number): string[] {
  return [
    `Terminal too small! Minimum size: ${UI_MIN_COLUMNS}x${UI_MIN_ROWS}`,
    `Current size: ${columns}x${rows}`,
  ];
}

export const errorLine = (message: string): string => `Error fetching weather data: ${message}`;

function titleLine(snapshot: WeatherSnapshot, g: BoxGeometry): string {
  const {city, region} = snapshot.location;
  const place = region ? `${city}, ${region}` : city;
  const title = paint(COLORS.cyan, bold(`${APP_TITLE} - Weather Dashboard for ${place}`));
  return ` ${fitVisible(centerVisible(title, g.innerWidth), g.innerWidth)} `;
}

function currentRows(current: CurrentConditions, g: BoxGeometry, now: Date): string[] {
  const art = ICON_ART[iconKind(current.condition)];
  const icon = (row: number): string => {
    const line = art[row];
    return fitVisible(line ? paint(COLORS[line.color], line.text) : '', ICON_WIDTH);
  };

  const tempColor = COLORS[temperatureColor(current.temperature)];
  const fahrenheit = paint(tempColor, `${current.temperature.toFixed(1)}°F`);
  const celsius = paint(tempColor, `${fahrenheitToCelsius(current.temperature).toFixed(1)}°C`);

  const heading = icon(0) + bold('Current Conditions');
  const clock = `${bold('Current Time:')} ${formatDateTime(now)}`;
  const gap = Math.max(1, Math.floor((g.innerWidth - visibleLength(heading) - visibleLength(clock)) / 2));

  const sunrise = current.sunrise ? formatClock(current.sunrise) : 'N/A';
  const sunset = current.sunset ? formatClock(current.sunset) : 'N/A';

  const visibilityKm = current.visibility / 1000;
  const pressureSpan = PRESSURE_RANGE_HPA.max - PRESSURE_RANGE_HPA.min;
  const humidity = Math.round(current.humidity);
  const cloudCover = Math.round(current.cloudCover);
  const pressure = Math.round(current.pressure);

  return [
    heading + ' '.repeat(gap) + clock,
    `${icon(1)} ${bold('Temperature:')} ${fahrenheit} / ${celsius}`,
    `${icon(2)} ${bold('Feels Like:')} ${paint(tempColor, `${current.feelsLike.toFixed(1)}°F`)}`,
    `${icon(3)} ${bold('Condition:')} ${capitalize(current.condition)}`,
    `${icon(4)} ${bold('Wind:')} ${Math.round(current.windSpeed)} mph ${windDirectionName(current.windDirection)} ` +
      paint(COLORS.cyan, windArrow(current.windDirection)),
    `${' '.repeat(SUN_LINE_INDENT)} ${bold('Sunrise:')} ${paint(COLORS.yellow, sunrise)}  ` +
      `${bold('Sunset:')} ${paint(COLORS.magenta, sunset)}`,
    bold('System Stats:'),
    renderGauge(humidity, 100, GAUGE_BAR_WIDTH, `Humidity (${humidity}%)`),
    renderGauge(cloudCover, 100, GAUGE_BAR_WIDTH, `Cloud Cover (${cloudCover}%)`),
    renderGauge(current.pressure - PRESSURE_RANGE_HPA.min, pressureSpan, GAUGE_BAR_WIDTH, `Pressure (${pressure} hPa)`),
    renderGauge(visibilityKm, VISIBILITY_RANGE_KM, GAUGE_BAR_WIDTH, `Visibility (${visibilityKm.toFixed(1)} km)`),
  ];
}

function forecastBox(snapshot: WeatherSnapshot, g: BoxGeometry): string[] {
  const hourly = [bold('  Hourly Forecast (Next 12 Hours)'), ...buildHourlyTable(snapshot.hourly, g.leftWidth)];
  const daily = [bold(' 7-Day Forecast'), ...buildDailyTable(snapshot.daily, g.rightWidth)];

  const lines = [
    singleTop(g),
    renderRow(centerVisible(bold('Weather Forecast'), g.innerWidth), g.innerWidth),
    splitOpen(g),
  ];
  const count = Math.max(hourly.length, daily.length);
  for (let i = 0; i < count; i++) {
    lines.push(renderSplitRow(hourly[i] ?? '', daily[i] ?? '', g.leftWidth, g.rightWidth));
  }
  lines.push(splitBottom(g));
  return lines;
}

function footerLine(g: BoxGeometry, refreshSeconds: number): string {
  const unit = refreshSeconds === 1 ? 'second' : 'seconds';
  const message = `Updates every ${refreshSeconds} ${unit} | Press Ctrl+C to exit`;
  return ' '.repeat(Math.max(0, Math.floor((g.totalWidth - message.length) / 2))) + message;
}

/**
 * One full frame for a fetched snapshot: title, current conditions box,
 * two-column forecast box and footer. Every box line is exactly
 * `geometry.totalWidth` columns.
 */
export function composeDashboard(
  snapshot: WeatherSnapshot,
  geometry: BoxGeometry,
  now: Date,
  options: ComposeOptions = {refreshSeconds: 5},
): string[] {
  return [
    titleLine(snapshot, geometry),
    singleTop(geometry),
    ...currentRows(snapshot.current, geometry, now).map(row => renderRow(row, geometry.innerWidth)),
    singleBottom(geometry),
    ...forecastBox(snapshot, geometry),
    '',
    footerLine(geometry, options.refreshSeconds),
  ];
}

/** Lines to draw for the current state and terminal size. */
export function renderFrame(state: DashboardState, viewport: Viewport, now: Date): string[] {
  const {columns, rows} = viewport;
  if (columns < UI_MIN_COLUMNS || rows < UI_MIN_ROWS) return tooSmallFrame(columns, rows);

  if (state.status === 'loading') return ['Fetching weather data...'];
  if (state.status === 'error') return [errorLine(state.message)];

  try {
    const geometry = createBoxGeometry(viewport.forcedWidth ?? frameWidth(columns, viewport.maxWidth));
    const refreshSeconds = Math.round((viewport.refreshIntervalMs / SECOND_MS) * 10) / 10;
    return composeDashboard(state.snapshot, geometry, now, {refreshSeconds});
  } catch (error) {
    if (error instanceof GeometryError) return [...tooSmallFrame(columns, rows), error.message];
    logError('Failed to compose dashboard', error);
    return [errorLine(error instanceof Error ? error.message : String(error))];
  }
}
