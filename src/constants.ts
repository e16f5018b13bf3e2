export const PACKAGE_NAME = 'skyboard';
export const APP_TITLE = 'SKYBOARD';

// Time helpers
export const SECOND_MS = 1_000;

export const DEFAULT_REFRESH_MS = 5 * SECOND_MS;
export const MIN_REFRESH_SECONDS = 1;
export const MAX_REFRESH_SECONDS = 3600;

// Terminal / box geometry
export const UI_MIN_COLUMNS = 80;
export const UI_MIN_ROWS = 24;
export const UI_MAX_WIDTH = 130;
export const UI_FALLBACK_COLUMNS = 130;
export const UI_FALLBACK_ROWS = 40;
export const MIN_BOX_WIDTH = 20;
export const SPLIT_RATIO = 0.6;

export const BOX = {
  horizontal: '─',
  vertical: '│',
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  leftT: '├',
  rightT: '┤',
  topT: '┬',
  bottomT: '┴',
  cross: '┼',
} as const;

export const ROW_ELLIPSIS = '...';
export const CELL_ELLIPSIS = '..';

// Gauges
export const GAUGE_BAR_WIDTH = 30;
export const GAUGE_LABEL_WIDTH = 25;
export const GAUGE_FILL = '█';
export const PRESSURE_RANGE_HPA = {min: 970, max: 1030} as const;
export const VISIBILITY_RANGE_KM = 10;

// Hourly table
export const HOURLY_LIMIT = 12;
export const HOURLY_MARGIN = 2;
export const COL_DATE_WIDTH = 5;
export const COL_TIME_WIDTH = 5;
export const COL_TEMP_WIDTH = 6;
export const COL_CONDITION_WIDTH = 10;
export const COL_WIND_WIDTH = 8;
export const COL_RAIN_WIDTH = 4;

// Daily table
export const DAILY_LIMIT = 7;
export const DAILY_MARGIN = 1;
export const DAILY_WIDE_THRESHOLD = 40;

// Temperature thresholds (°F), hottest first
export const TEMP_HOT = 85;
export const TEMP_WARM = 75;
export const TEMP_MILD = 65;
export const LOW_TEMP_COOL = 55;

// Precipitation thresholds (inches)
export const HOURLY_RAIN_HEAVY = 0.5;
export const HOURLY_RAIN_LIGHT = 0.1;
export const DAILY_RAIN_HEAVY = 0.4;

// Weather data source
export const WEATHER_API_BASE = 'https://api.weather.gov';
export const GEOLOCATION_URL = 'https://ipinfo.io/json';
export const DEFAULT_USER_AGENT = `${PACKAGE_NAME}/0.1 (terminal weather dashboard)`;
export const DEFAULT_LOCATION = {
  city: 'San Diego',
  region: 'CA',
  latitude: 32.7153,
  longitude: -117.1573,
} as const;

// Substitutes for observation fields the station leaves null
export const OBSERVATION_DEFAULTS = {
  temperatureF: 70,
  pressureHpa: 1013,
  humidity: 60,
  visibilityM: 10_000,
  windSpeedMph: 8,
  windDirection: 270,
  cloudCover: 10,
} as const;

export const HOURLY_RAIN_ESTIMATE = 0.2;
export const DAILY_RAIN_ESTIMATE = 0.3;
export const DAILY_THUNDER_ESTIMATE = 0.5;

// Some terminals render ambiguous-width arrows at two columns.
// When true, the width table treats them as wide.
export const AMBIGUOUS_ARROWS_ARE_WIDE = process.env.SKYBOARD_WIDE_ARROWS === '1';

export const REQUEST_TIMEOUT_MS = 10 * SECOND_MS;
