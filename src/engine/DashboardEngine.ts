import {EventEmitter} from 'node:events';
import {DEFAULT_REFRESH_MS} from '../constants.js';
import type {DashboardState, Location, WeatherSnapshot} from '../models.js';
import {GeolocationService} from '../services/GeolocationService.js';
import {WeatherService} from '../services/WeatherService.js';
import {startTimeoutIfEnabled} from '../shared/utils/intervals.js';
import {logError, logWarn} from '../shared/utils/logger.js';

export interface DashboardEngineOptions {
  refreshIntervalMs?: number;
}

/**
 * Runs fetch cycles against the weather services. One cycle at a time; the
 * next one is scheduled only after the previous finished, so slow upstreams
 * never stack requests.
 */
export class DashboardEngine extends EventEmitter {
  private weather: WeatherService;
  private geolocation: GeolocationService;
  private refreshIntervalMs: number;
  private location: Location | null = null;
  private state: DashboardState = {status: 'loading'};
  private refreshing = false;
  private running = false;
  private cancelTimer: () => void = () => {};

  constructor(opts: DashboardEngineOptions = {},
              services?: {weather?: WeatherService; geolocation?: GeolocationService}) {
    super();
    this.refreshIntervalMs = opts.refreshIntervalMs ?? DEFAULT_REFRESH_MS;
    this.weather = services?.weather ?? new WeatherService();
    this.geolocation = services?.geolocation ?? new GeolocationService();
  }

  getState(): DashboardState {
    return this.state;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Run one cycle now. Resolves false when a cycle was already in flight or failed. */
  async refreshNow(): Promise<boolean> {
    if (this.refreshing) return false;
    this.refreshing = true;
    try {
      const snapshot = await this.fetchSnapshot();
      if (typeof snapshot === 'string') {
        this.fail(snapshot);
        return false;
      }
      this.state = {status: 'ready', snapshot};
      this.emit('snapshot', snapshot);
      return true;
    } catch (err) {
      logError('Refresh cycle failed', err);
      this.fail(err instanceof Error ? err.message : String(err));
      return false;
    } finally {
      this.refreshing = false;
    }
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    void this.tick();
  }

  stop(): void {
    this.running = false;
    this.cancelTimer();
    this.cancelTimer = () => {};
  }

  private async tick(): Promise<void> {
    await this.refreshNow();
    if (!this.running) return;
    this.cancelTimer = startTimeoutIfEnabled(() => { void this.tick(); }, this.refreshIntervalMs);
  }

  // Snapshot, or the message of the step that failed
  private async fetchSnapshot(): Promise<WeatherSnapshot | string> {
    const location = this.location ?? await this.geolocation.locate();
    this.location = location;

    const current = await this.weather.getCurrentConditions(location);
    if (!current.ok) return current.error;

    const hourly = await this.weather.getHourlyForecast(location);
    if (!hourly.ok) return hourly.error;

    const daily = await this.weather.getDailyForecast(location);
    if (!daily.ok) logWarn('7-day forecast unavailable; showing hourly data only', daily.error);

    return {
      location,
      current: current.data,
      hourly: hourly.data,
      daily: daily.ok ? daily.data : [],
      fetchedAt: new Date(),
    };
  }

  private fail(message: string): void {
    this.state = {status: 'error', message};
    if (this.listenerCount('error') > 0) this.emit('error', message);
  }
}
