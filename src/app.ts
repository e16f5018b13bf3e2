import {render} from 'ink';
import React from 'react';
import App from './App.js';
import type {AppConfig} from './config.js';
import {ServicesProvider} from './contexts/ServicesContext.js';
import {GeolocationService} from './services/GeolocationService.js';
import {WeatherService} from './services/WeatherService.js';

const h = React.createElement;

export function run(config: AppConfig): Promise<void> {
  const weatherService = new WeatherService({userAgent: config.userAgent});
  const geolocationService = new GeolocationService(config.coordinates);
  const settings = {
    refreshIntervalMs: config.refreshIntervalMs,
    maxWidth: config.maxWidth,
    forcedWidth: config.forcedWidth,
  };

  const {waitUntilExit, unmount} = render(
    h(ServicesProvider, {weatherService, geolocationService}, h(App, {settings})),
  );

  // Ink handles Ctrl+C in raw mode; signals from outside still end the app cleanly
  const stop = () => unmount();
  process.once('SIGTERM', stop);
  process.once('SIGINT', stop);

  return waitUntilExit().finally(() => {
    process.off('SIGTERM', stop);
    process.off('SIGINT', stop);
  });
}
