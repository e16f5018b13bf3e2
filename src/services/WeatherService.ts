import {
  DAILY_LIMIT,
  DAILY_RAIN_ESTIMATE,
  DAILY_THUNDER_ESTIMATE,
  DEFAULT_USER_AGENT,
  HOURLY_LIMIT,
  HOURLY_RAIN_ESTIMATE,
  OBSERVATION_DEFAULTS,
  REQUEST_TIMEOUT_MS,
  WEATHER_API_BASE,
} from '../constants.js';
import {CurrentConditions, DailyForecast, ForecastRecord, Location, type WeatherResult} from '../models.js';
import {celsiusToFahrenheit, compassToDegrees, conditionIcon, stripChance} from '../shared/utils/conditions.js';
import {asArray, asNumber, asString, readPath} from '../shared/utils/json.js';
import {logDebug, logError} from '../shared/utils/logger.js';
import {calculateSunTimes} from '../shared/utils/sunTimes.js';

const MPS_TO_MPH = 2.237;
const KMH_TO_MPH = 0.621371;
const DAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;
const PERIOD_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})/;

// METAR sky cover codes to percent
const CLOUD_AMOUNTS: Record<string, number> = {
  SKC: 0,
  CLR: 0,
  FEW: 20,
  SCT: 40,
  BKN: 75,
  OVC: 100,
  VV: 100,
};

interface PointsInfo {
  forecast?: string;
  forecastHourly?: string;
  observationStations?: string;
}

export class WeatherApiError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'WeatherApiError';
  }
}

/** Client for the public weather.gov API. */
export class WeatherService {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly pointsCache = new Map<string, PointsInfo>();

  constructor(options: {baseUrl?: string; userAgent?: string} = {}) {
    this.baseUrl = options.baseUrl ?? WEATHER_API_BASE;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async getCurrentConditions(location: Location, now: Date = new Date()): Promise<WeatherResult<CurrentConditions>> {
    try {
      const points = await this.getPoints(location);
      if (!points.observationStations) throw new WeatherApiError('Could not find observation stations URL in API response');

      const stations = await this.fetchJson(points.observationStations);
      const stationId = asString(readPath(asArray(readPath(stations, 'features'))[0], 'properties', 'stationIdentifier'));
      if (!stationId) throw new WeatherApiError('No weather stations found near the specified location');

      const observation = await this.fetchJson(`${this.baseUrl}/stations/${encodeURIComponent(stationId)}/observations/latest`);
      return {ok: true, data: parseObservation(readPath(observation, 'properties'), location, now)};
    } catch (err) {
      logError('Error getting weather data', err);
      return {ok: false, error: describeError(err)};
    }
  }

  async getHourlyForecast(location: Location): Promise<WeatherResult<ForecastRecord[]>> {
    try {
      const points = await this.getPoints(location);
      if (!points.forecastHourly) throw new WeatherApiError('Could not find hourly forecast URL in API response');

      const forecast = await this.fetchJson(points.forecastHourly);
      const periods = asArray(readPath(forecast, 'properties', 'periods'));
      return {ok: true, data: periods.slice(0, HOURLY_LIMIT).map(parseHourlyPeriod)};
    } catch (err) {
      logError('Error getting forecast data', err);
      return {ok: false, error: describeError(err)};
    }
  }

  async getDailyForecast(location: Location): Promise<WeatherResult<DailyForecast[]>> {
    try {
      const points = await this.getPoints(location);
      if (!points.forecast) throw new WeatherApiError('Could not find forecast URL in API response');

      const forecast = await this.fetchJson(points.forecast);
      return {ok: true, data: pairDailyPeriods(asArray(readPath(forecast, 'properties', 'periods')))};
    } catch (err) {
      logError('Error getting 7-day forecast', err);
      return {ok: false, error: describeError(err)};
    }
  }

  private async getPoints(location: Location): Promise<PointsInfo> {
    const key = `${Number(location.latitude.toFixed(4))},${Number(location.longitude.toFixed(4))}`;
    const cached = this.pointsCache.get(key);
    if (cached) return cached;

    const data = await this.fetchJson(`${this.baseUrl}/points/${key}`);
    const properties = readPath(data, 'properties');
    const points: PointsInfo = {
      forecast: asString(readPath(properties, 'forecast')),
      forecastHourly: asString(readPath(properties, 'forecastHourly')),
      observationStations: asString(readPath(properties, 'observationStations')),
    };
    this.pointsCache.set(key, points);
    logDebug('Resolved weather.gov grid point', {key, points});
    return points;
  }

  private async fetchJson(url: string): Promise<unknown> {
    const res = await fetch(url, {
      headers: {'User-Agent': this.userAgent, Accept: 'application/geo+json'},
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!res.ok) {
      throw new WeatherApiError(`HTTP ${res.status} ${res.statusText} for ${url}`.replace(/\s+/g, ' '), res.status);
    }
    const data: unknown = await res.json();
    return data;
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const observedValue = (properties: unknown, field: string): number | undefined =>
  asNumber(readPath(properties, field, 'value'));

function windSpeedMph(properties: unknown): number {
  const value = observedValue(properties, 'windSpeed');
  if (value === undefined) return OBSERVATION_DEFAULTS.windSpeedMph;
  const unit = asString(readPath(properties, 'windSpeed', 'unitCode')) ?? '';
  return Math.round(value * (unit.endsWith('km_h-1') ? KMH_TO_MPH : MPS_TO_MPH));
}

function cloudCover(properties: unknown): number {
  const amounts = asArray(readPath(properties, 'cloudLayers'))
    .map(layer => asString(readPath(layer, 'amount')))
    .map(code => (code === undefined ? undefined : CLOUD_AMOUNTS[code]))
    .filter((amount): amount is number => amount !== undefined);
  return amounts.length > 0 ? Math.max(...amounts) : OBSERVATION_DEFAULTS.cloudCover;
}

function parseObservation(properties: unknown, location: Location, now: Date): CurrentConditions {
  const tempC = observedValue(properties, 'temperature');
  const temperature = tempC === undefined ? OBSERVATION_DEFAULTS.temperatureF : celsiusToFahrenheit(tempC);
  const apparentC = observedValue(properties, 'heatIndex') ?? observedValue(properties, 'windChill');
  const pressurePa = observedValue(properties, 'barometricPressure');
  const humidity = observedValue(properties, 'relativeHumidity');
  const sun = calculateSunTimes(location.latitude, location.longitude, now);

  return new CurrentConditions({
    temperature,
    feelsLike: apparentC === undefined ? temperature : celsiusToFahrenheit(apparentC),
    humidity: humidity === undefined ? OBSERVATION_DEFAULTS.humidity : Math.round(humidity),
    pressure: pressurePa === undefined ? OBSERVATION_DEFAULTS.pressureHpa : pressurePa / 100,
    condition: asString(readPath(properties, 'textDescription')) || 'Unknown',
    windSpeed: windSpeedMph(properties),
    windDirection: observedValue(properties, 'windDirection') ?? OBSERVATION_DEFAULTS.windDirection,
    cloudCover: cloudCover(properties),
    visibility: observedValue(properties, 'visibility') ?? OBSERVATION_DEFAULTS.visibilityM,
    sunrise: sun.sunrise,
    sunset: sun.sunset,
  });
}

/** First number in a wind speed such as "10 mph" or "5 to 10 mph". */
export function parseWindSpeed(text: string | undefined): number {
  const match = /\d+(?:\.\d+)?/.exec(text ?? '');
  return match ? Math.round(Number(match[0])) : 5;
}

function parseHourlyPeriod(period: unknown): ForecastRecord {
  const shortForecast = asString(readPath(period, 'shortForecast')) ?? 'Clear';
  const chance = asNumber(readPath(period, 'probabilityOfPrecipitation', 'value'));
  const wet = /rain|shower/i.test(shortForecast);

  return new ForecastRecord({
    timestamp: asString(readPath(period, 'startTime')) ?? '',
    temperature: asNumber(readPath(period, 'temperature')) ?? OBSERVATION_DEFAULTS.temperatureF,
    condition: stripChance(shortForecast),
    windSpeed: parseWindSpeed(asString(readPath(period, 'windSpeed'))),
    windDirection: compassToDegrees(asString(readPath(period, 'windDirection')) ?? 'W'),
    precipitation: wet ? {rain1h: chance === undefined ? HOURLY_RAIN_ESTIMATE : (chance / 100) * 0.5} : undefined,
  });
}

function periodDate(startTime: string): {date: string; dayName: string} {
  const match = PERIOD_DATE_PATTERN.exec(startTime);
  if (!match) return {date: '', dayName: ''};
  const [, year, month, day] = match;
  const weekday = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day))).getUTCDay();
  return {date: `${month}/${day}`, dayName: DAY_NAMES[weekday]};
}

function dailyPrecipitation(detailedForecast: string): number {
  const text = detailedForecast.toLowerCase();
  if (text.includes('thunder')) return DAILY_THUNDER_ESTIMATE;
  if (text.includes('rain') || text.includes('shower')) return DAILY_RAIN_ESTIMATE;
  return 0;
}

/**
 * Pair day and night periods into at most seven days. A leading night period
 * (forecasts issued in the evening) is skipped.
 */
export function pairDailyPeriods(periods: readonly unknown[]): DailyForecast[] {
  const start = readPath(periods[0], 'isDaytime') === false ? 1 : 0;
  const days: DailyForecast[] = [];

  for (let i = start; i < periods.length && days.length < DAILY_LIMIT; i += 2) {
    const day = periods[i];
    const night = i + 1 < periods.length ? periods[i + 1] : undefined;
    const high = asNumber(readPath(day, 'temperature')) ?? OBSERVATION_DEFAULTS.temperatureF;
    const low = asNumber(readPath(night, 'temperature')) ?? high - 10;
    const condition = stripChance(asString(readPath(day, 'shortForecast')) ?? '');

    days.push(new DailyForecast({
      ...periodDate(asString(readPath(day, 'startTime')) ?? ''),
      high,
      low,
      condition,
      precipitation: dailyPrecipitation(asString(readPath(day, 'detailedForecast')) ?? ''),
      icon: conditionIcon(condition),
    }));
  }
  return days;
}
