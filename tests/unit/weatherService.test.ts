import {describe, test, expect, beforeEach, afterEach, jest} from '@jest/globals';
import {WeatherService, pairDailyPeriods, parseWindSpeed} from '../../src/services/WeatherService.js';
import {getBufferedLogs} from '../../src/shared/utils/logger.js';
import {calculateSunTimes} from '../../src/shared/utils/sunTimes.js';
import {testLocation} from '../fakes/stores.js';

const BASE = 'https://api.test';
const POINTS_URL = `${BASE}/points/30.25,-97.75`;
const STATIONS_URL = `${BASE}/gridpoints/TST/10,20/stations`;
const HOURLY_URL = `${BASE}/gridpoints/TST/10,20/forecast/hourly`;
const DAILY_URL = `${BASE}/gridpoints/TST/10,20/forecast`;
const OBSERVATION_URL = `${BASE}/stations/KTST/observations/latest`;

interface Route {
  status?: number;
  body: unknown;
}

const pointsBody = {
  properties: {
    forecast: DAILY_URL,
    forecastHourly: HOURLY_URL,
    observationStations: STATIONS_URL,
  },
};

const stationsBody = {features: [{properties: {stationIdentifier: 'KTST'}}]};

describe('WeatherService', () => {
  let routes: Map<string, Route>;
  let fetchSpy: jest.SpiedFunction<typeof fetch>;
  let service: WeatherService;
  const now = new Date(2024, 5, 1, 12);

  const fetchedUrls = (): string[] => fetchSpy.mock.calls.map(([input]) => String(input));

  beforeEach(() => {
    routes = new Map<string, Route>([
      [POINTS_URL, {body: pointsBody}],
      [STATIONS_URL, {body: stationsBody}],
    ]);
    fetchSpy = jest.spyOn(globalThis, 'fetch').mockImplementation(async input => {
      const route = routes.get(String(input));
      if (!route) return new Response('not found', {status: 404});
      return new Response(JSON.stringify(route.body), {status: route.status ?? 200});
    });
    service = new WeatherService({baseUrl: BASE, userAgent: 'skyboard-test'});
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  describe('getCurrentConditions', () => {
    test('converts a station observation', async () => {
      routes.set(OBSERVATION_URL, {
        body: {
          properties: {
            temperature: {value: 25},
            heatIndex: {value: 27},
            relativeHumidity: {value: 55.6},
            barometricPressure: {value: 101325},
            textDescription: 'Mostly Cloudy',
            windSpeed: {value: 18, unitCode: 'wmoUnit:km_h-1'},
            windDirection: {value: 180},
            visibility: {value: 16090},
            cloudLayers: [{amount: 'FEW'}, {amount: 'BKN'}],
          },
        },
      });

      const result = await service.getCurrentConditions(testLocation, now);
      if (!result.ok) throw new Error(result.error);
      const current = result.data;
      const sun = calculateSunTimes(testLocation.latitude, testLocation.longitude, now);

      expect(current.temperature).toBe(77);
      expect(current.feelsLike).toBeCloseTo(80.6);
      expect(current.humidity).toBe(56);
      expect(current.pressure).toBe(1013.25);
      expect(current.condition).toBe('Mostly Cloudy');
      expect(current.windSpeed).toBe(11);
      expect(current.windDirection).toBe(180);
      expect(current.visibility).toBe(16090);
      expect(current.cloudCover).toBe(75);
      expect(current.sunrise).toEqual(sun.sunrise);
      expect(current.sunset).toEqual(sun.sunset);
    });

    test('fills missing observation fields with defaults', async () => {
      routes.set(OBSERVATION_URL, {
        body: {properties: {temperature: {value: null}, textDescription: ''}},
      });

      const result = await service.getCurrentConditions(testLocation, now);
      if (!result.ok) throw new Error(result.error);

      expect(result.data).toMatchObject({
        temperature: 70,
        feelsLike: 70,
        humidity: 60,
        pressure: 1013,
        condition: 'Unknown',
        windSpeed: 8,
        windDirection: 270,
        cloudCover: 10,
        visibility: 10000,
      });
    });

    test('converts wind given in metres per second', async () => {
      routes.set(OBSERVATION_URL, {
        body: {properties: {windSpeed: {value: 5, unitCode: 'wmoUnit:m_s-1'}}},
      });

      const result = await service.getCurrentConditions(testLocation, now);
      expect(result.ok && result.data.windSpeed).toBe(11);
    });

    test('sends the user agent and geo+json accept header', async () => {
      routes.set(OBSERVATION_URL, {body: {properties: {}}});
      await service.getCurrentConditions(testLocation, now);

      const [, init] = fetchSpy.mock.calls[0];
      expect(init?.headers).toEqual({'User-Agent': 'skyboard-test', Accept: 'application/geo+json'});
      expect(fetchedUrls()).toEqual([POINTS_URL, STATIONS_URL, OBSERVATION_URL]);
    });

    test('reports an HTTP failure', async () => {
      routes.set(POINTS_URL, {status: 500, body: {}});

      const result = await service.getCurrentConditions(testLocation, now);
      expect(result).toEqual({ok: false, error: `HTTP 500 for ${POINTS_URL}`});
      expect(getBufferedLogs().errors).toHaveLength(1);
      expect(getBufferedLogs().errors[0]).toContain('ERROR: Error getting weather data');
    });

    test('reports a location without stations', async () => {
      routes.set(STATIONS_URL, {body: {features: []}});

      const result = await service.getCurrentConditions(testLocation, now);
      expect(result).toEqual({ok: false, error: 'No weather stations found near the specified location'});
    });

    test('reports a network error', async () => {
      fetchSpy.mockRejectedValueOnce(new Error('network down'));

      const result = await service.getCurrentConditions(testLocation, now);
      expect(result).toEqual({ok: false, error: 'network down'});
    });
  });

  describe('getHourlyForecast', () => {
    const period = (overrides: Record<string, unknown>): Record<string, unknown> => ({
      startTime: '2024-06-01T15:00:00-05:00',
      temperature: 80,
      shortForecast: 'Sunny',
      windSpeed: '5 mph',
      windDirection: 'N',
      ...overrides,
    });

    test('parses periods into records', async () => {
      routes.set(HOURLY_URL, {
        body: {
          properties: {
            periods: [
              period({
                startTime: '2024-06-01T14:00:00-05:00',
                temperature: 88,
                shortForecast: 'Chance Rain Showers',
                windSpeed: '10 to 15 mph',
                windDirection: 'SSE',
                probabilityOfPrecipitation: {value: 40},
              }),
              period({}),
              {shortForecast: 'Light Rain'},
            ],
          },
        },
      });

      const result = await service.getHourlyForecast(testLocation);
      if (!result.ok) throw new Error(result.error);
      const [showers, sunny, sparse] = result.data;

      expect(showers).toMatchObject({
        timestamp: '2024-06-01T14:00:00-05:00',
        temperature: 88,
        condition: 'Rain Showers',
        windSpeed: 10,
        windDirection: 157.5,
        precipitation: {rain1h: 0.2},
      });
      expect(sunny.precipitation).toBeUndefined();
      expect(sparse).toMatchObject({
        timestamp: '',
        temperature: 70,
        condition: 'Light Rain',
        windSpeed: 5,
        windDirection: 270,
        precipitation: {rain1h: 0.2},
      });
    });

    test('keeps the first twelve periods', async () => {
      routes.set(HOURLY_URL, {body: {properties: {periods: Array.from({length: 20}, () => period({}))}}});

      const result = await service.getHourlyForecast(testLocation);
      expect(result.ok && result.data.length).toBe(12);
    });

    test('reuses the resolved grid point', async () => {
      routes.set(HOURLY_URL, {body: {properties: {periods: []}}});
      routes.set(DAILY_URL, {body: {properties: {periods: []}}});

      await service.getHourlyForecast(testLocation);
      await service.getDailyForecast(testLocation);

      expect(fetchedUrls().filter(url => url === POINTS_URL)).toHaveLength(1);
    });

    test('reports a grid point without an hourly forecast', async () => {
      routes.set(POINTS_URL, {body: {properties: {forecast: DAILY_URL}}});

      const result = await service.getHourlyForecast(testLocation);
      expect(result).toEqual({ok: false, error: 'Could not find hourly forecast URL in API response'});
    });
  });

  describe('getDailyForecast', () => {
    test('pairs the forecast periods', async () => {
      routes.set(DAILY_URL, {
        body: {
          properties: {
            periods: [
              {isDaytime: true, startTime: '2024-06-03T06:00:00-05:00', temperature: 90, shortForecast: 'Sunny'},
              {isDaytime: false, startTime: '2024-06-03T18:00:00-05:00', temperature: 72},
            ],
          },
        },
      });

      const result = await service.getDailyForecast(testLocation);
      if (!result.ok) throw new Error(result.error);
      expect(result.data).toHaveLength(1);
      expect(result.data[0]).toMatchObject({date: '06/03', dayName: 'Mon', high: 90, low: 72});
    });

    test('reports an HTTP failure', async () => {
      routes.set(DAILY_URL, {status: 503, body: {}});

      const result = await service.getDailyForecast(testLocation);
      expect(result).toEqual({ok: false, error: `HTTP 503 for ${DAILY_URL}`});
      expect(getBufferedLogs().errors[0]).toContain('ERROR: Error getting 7-day forecast');
    });
  });
});

describe('pairDailyPeriods', () => {
  test('builds one day from each day and night pair', () => {
    const days = pairDailyPeriods([
      {
        isDaytime: true,
        startTime: '2024-06-03T06:00:00-05:00',
        temperature: 90,
        shortForecast: 'Chance Thunderstorms',
        detailedForecast: 'A chance of thunderstorms after noon.',
      },
      {isDaytime: false, startTime: '2024-06-03T18:00:00-05:00', temperature: 72},
      {
        isDaytime: true,
        startTime: '2024-06-04T06:00:00-05:00',
        temperature: 85,
        shortForecast: 'Sunny',
        detailedForecast: 'Sunny, with a high near 85.',
      },
    ]);

    expect(days).toHaveLength(2);
    expect(days[0]).toMatchObject({
      date: '06/03',
      dayName: 'Mon',
      high: 90,
      low: 72,
      condition: 'Thunderstorms',
      precipitation: 0.5,
      icon: {glyph: '⛈️', color: 'magenta'},
    });
    expect(days[1]).toMatchObject({
      date: '06/04',
      dayName: 'Tue',
      high: 85,
      low: 75,
      condition: 'Sunny',
      precipitation: 0,
      icon: {glyph: '☀️', color: 'yellow'},
    });
  });

  test('estimates rain from the detailed forecast', () => {
    const [day] = pairDailyPeriods([
      {isDaytime: true, startTime: '2024-06-05T06:00:00-05:00', temperature: 70, shortForecast: 'Showers', detailedForecast: 'Rain showers likely.'},
    ]);
    expect(day.precipitation).toBe(0.3);
  });

  test('skips a leading night period', () => {
    const days = pairDailyPeriods([
      {isDaytime: false, startTime: '2024-06-02T18:00:00-05:00', temperature: 65},
      {isDaytime: true, startTime: '2024-06-03T06:00:00-05:00', temperature: 90, shortForecast: 'Sunny'},
      {isDaytime: false, startTime: '2024-06-03T18:00:00-05:00', temperature: 70},
    ]);
    expect(days).toHaveLength(1);
    expect(days[0]).toMatchObject({date: '06/03', high: 90, low: 70});
  });

  test('stops at seven days', () => {
    const periods = Array.from({length: 20}, (_, i) => ({
      isDaytime: i % 2 === 0,
      startTime: '2024-06-03T06:00:00-05:00',
      temperature: 80,
      shortForecast: 'Sunny',
    }));
    expect(pairDailyPeriods(periods)).toHaveLength(7);
  });

  test('handles an empty forecast', () => {
    expect(pairDailyPeriods([])).toEqual([]);
  });
});

test('parseWindSpeed takes the first number', () => {
  expect(parseWindSpeed('10 mph')).toBe(10);
  expect(parseWindSpeed('5 to 10 mph')).toBe(5);
  expect(parseWindSpeed('calm')).toBe(5);
  expect(parseWindSpeed(undefined)).toBe(5);
});
