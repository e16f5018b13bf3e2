import {useEffect, useState} from 'react';
import {useServices} from '../contexts/ServicesContext.js';
import {DashboardEngine} from '../engine/DashboardEngine.js';
import type {DashboardState} from '../models.js';

/** Owns a DashboardEngine for the component's lifetime and mirrors its state. */
export function useDashboard(refreshIntervalMs: number): DashboardState {
  const {weatherService, geolocationService} = useServices();
  const [state, setState] = useState<DashboardState>({status: 'loading'});

  useEffect(() => {
    const engine = new DashboardEngine(
      {refreshIntervalMs},
      {weather: weatherService, geolocation: geolocationService},
    );
    const sync = () => setState(engine.getState());
    engine.on('snapshot', sync);
    engine.on('error', sync);
    engine.start();

    return () => {
      engine.stop();
      engine.off('snapshot', sync);
      engine.off('error', sync);
    };
  }, [weatherService, geolocationService, refreshIntervalMs]);

  return state;
}
