import type {ColorName} from './shared/utils/ansi.js';

export class Location {
  readonly city: string;
  readonly region: string;
  readonly latitude: number;
  readonly longitude: number;
  constructor(init: Partial<Location> = {}) {
    this.city = '';
    this.region = '';
    this.latitude = 0;
    this.longitude = 0;
    Object.assign(this, init);
    Object.freeze(this);
  }
}

export class CurrentConditions {
  readonly temperature: number;   // °F
  readonly feelsLike: number;     // °F
  readonly humidity: number;      // %
  readonly pressure: number;      // hPa
  readonly condition: string;
  readonly windSpeed: number;     // mph
  readonly windDirection: number; // degrees
  readonly cloudCover: number;    // %
  readonly visibility: number;    // metres
  readonly sunrise: Date | null;
  readonly sunset: Date | null;
  constructor(init: Partial<CurrentConditions> = {}) {
    this.temperature = 0;
    this.feelsLike = 0;
    this.humidity = 0;
    this.pressure = 0;
    this.condition = '';
    this.windSpeed = 0;
    this.windDirection = 0;
    this.cloudCover = 0;
    this.visibility = 0;
    this.sunrise = null;
    this.sunset = null;
    Object.assign(this, init);
    Object.freeze(this);
  }
}

// Accumulations in inches
export interface Precipitation {
  rain1h?: number;
  snow1h?: number;
  rain3h?: number;
  snow3h?: number;
}

export class ForecastRecord {
  readonly timestamp: string;     // ISO 8601 with the station's offset
  readonly temperature: number;   // °F
  readonly condition: string;
  readonly windSpeed: number;     // mph
  readonly windDirection: number; // degrees
  readonly precipitation?: Readonly<Precipitation>;
  constructor(init: Partial<ForecastRecord> = {}) {
    this.timestamp = '';
    this.temperature = 0;
    this.condition = '';
    this.windSpeed = 0;
    this.windDirection = 0;
    Object.assign(this, init);
    if (this.precipitation) Object.freeze(this.precipitation);
    Object.freeze(this);
  }
}

export interface ConditionIcon {
  glyph: string;
  color: ColorName;
}

export class DailyForecast {
  readonly date: string;    // MM/DD
  readonly dayName: string; // Mon, Tue, ...
  readonly high: number;
  readonly low: number;
  readonly condition: string;
  readonly precipitation: number;
  readonly icon: ConditionIcon;
  constructor(init: Partial<DailyForecast> = {}) {
    this.date = '';
    this.dayName = '';
    this.high = 0;
    this.low = 0;
    this.condition = '';
    this.precipitation = 0;
    this.icon = {glyph: '🌤️', color: 'white'};
    Object.assign(this, init);
    Object.freeze(this);
  }
}

export interface WeatherSnapshot {
  location: Location;
  current: CurrentConditions;
  hourly: readonly ForecastRecord[];
  daily: readonly DailyForecast[];
  fetchedAt: Date;
}

export type WeatherResult<T> =
  | {ok: true; data: T}
  | {ok: false; error: string};

export type DashboardState =
  | {status: 'loading'}
  | {status: 'ready'; snapshot: WeatherSnapshot}
  | {status: 'error'; message: string};
