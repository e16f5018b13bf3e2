import {
  DEFAULT_REFRESH_MS,
  DEFAULT_USER_AGENT,
  MAX_REFRESH_SECONDS,
  MIN_BOX_WIDTH,
  MIN_REFRESH_SECONDS,
  SECOND_MS,
  UI_MAX_WIDTH,
} from './constants.js';
import {logWarn} from './shared/utils/logger.js';

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface AppConfig {
  showHelp: boolean;
  checkBorders: boolean;
  refreshIntervalMs: number;
  // Upper bound for the box width; the terminal width still applies
  maxWidth: number;
  // Exact box width, bypassing the terminal size
  forcedWidth?: number;
  // Skips IP geolocation when set
  coordinates?: Coordinates;
  userAgent: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const VALUE_FLAGS = ['--interval', '--lat', '--lon', '--width'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(flag: string): flag is ValueFlag {
  return VALUE_FLAGS.some(candidate => candidate === flag);
}

function parseNumber(raw: string, label: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(`Invalid ${label}: "${raw}" is not a number`);
  }
  return value;
}

function parseInRange(raw: string, label: string, min: number, max: number): number {
  const value = parseNumber(raw, label);
  if (value < min || value > max) {
    throw new ConfigError(`Invalid ${label}: ${raw} (expected ${min} to ${max})`);
  }
  return value;
}

function parseWidth(raw: string, label: string): number {
  const value = parseNumber(raw, label);
  if (!Number.isInteger(value) || value < MIN_BOX_WIDTH) {
    throw new ConfigError(`Invalid ${label}: ${raw} (expected an integer of at least ${MIN_BOX_WIDTH})`);
  }
  return value;
}

function parseRefreshMs(raw: string): number {
  const value = parseNumber(raw, 'SKYBOARD_REFRESH_MS');
  const min = MIN_REFRESH_SECONDS * SECOND_MS;
  const max = MAX_REFRESH_SECONDS * SECOND_MS;
  if (value < min || value > max) {
    throw new ConfigError(`Invalid SKYBOARD_REFRESH_MS: ${raw} (expected ${min} to ${max})`);
  }
  return Math.round(value);
}

/** Split `--flag value` and `--flag=value` into a flag map. Unknown arguments are skipped. */
function readArgs(argv: readonly string[]): {flags: Set<string>; values: Map<ValueFlag, string>} {
  const flags = new Set<string>();
  const values = new Map<ValueFlag, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const name = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;

    if (name === '--help' || name === '-h' || name === '--check-borders') {
      flags.add(name === '-h' ? '--help' : name);
      continue;
    }
    if (!isValueFlag(name)) {
      logWarn(`Ignoring unrecognised argument: ${arg}`);
      continue;
    }

    if (eq > 0 && name !== arg) {
      values.set(name, arg.slice(eq + 1));
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new ConfigError(`Missing value for ${name}`);
    }
    values.set(name, next);
    i++;
  }

  return {flags, values};
}

function resolveCoordinates(lat: string | undefined, lon: string | undefined, source: string): Coordinates | undefined {
  if (lat === undefined && lon === undefined) return undefined;
  if (lat === undefined || lon === undefined) {
    throw new ConfigError(`${source}: latitude and longitude must be given together`);
  }
  return {
    latitude: parseInRange(lat, 'latitude', -90, 90),
    longitude: parseInRange(lon, 'longitude', -180, 180),
  };
}

/**
 * Parse configuration once at startup.
 * Priority: CLI args > Environment variables > Defaults
 */
export function parseConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): AppConfig {
  const {flags, values} = readArgs(argv);

  const intervalArg = values.get('--interval');
  const refreshIntervalMs = intervalArg !== undefined
    ? Math.round(parseInRange(intervalArg, 'interval', MIN_REFRESH_SECONDS, MAX_REFRESH_SECONDS) * SECOND_MS)
    : env.SKYBOARD_REFRESH_MS ? parseRefreshMs(env.SKYBOARD_REFRESH_MS) : DEFAULT_REFRESH_MS;

  const maxWidth = env.SKYBOARD_MAX_WIDTH ? parseWidth(env.SKYBOARD_MAX_WIDTH, 'SKYBOARD_MAX_WIDTH') : UI_MAX_WIDTH;

  const widthArg = values.get('--width');
  const forcedWidth = widthArg !== undefined ? parseWidth(widthArg, 'width') : undefined;

  const coordinates =
    resolveCoordinates(values.get('--lat'), values.get('--lon'), 'Options --lat/--lon') ??
    resolveCoordinates(env.SKYBOARD_LAT || undefined, env.SKYBOARD_LON || undefined, 'SKYBOARD_LAT/SKYBOARD_LON');

  return {
    showHelp: flags.has('--help'),
    checkBorders: flags.has('--check-borders'),
    refreshIntervalMs,
    maxWidth,
    forcedWidth,
    coordinates,
    userAgent: env.SKYBOARD_USER_AGENT || DEFAULT_USER_AGENT,
  };
}

/**
 * Whether periodic app intervals (auto-refresh timers) should run.
 * Centralized here to avoid scattering environment checks.
 */
export function isAppIntervalsEnabled(): boolean {
  return process.env.NO_APP_INTERVALS !== '1';
}
