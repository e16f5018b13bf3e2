import React, {createContext, useContext, useMemo, ReactNode} from 'react';
import {GeolocationService} from '../services/GeolocationService.js';
import {WeatherService} from '../services/WeatherService.js';

const h = React.createElement;

interface Services {
  weatherService: WeatherService;
  geolocationService: GeolocationService;
}

const ServicesContext = createContext<Services | null>(null);

interface ServicesProviderProps {
  children?: ReactNode;
  weatherService?: WeatherService;
  geolocationService?: GeolocationService;
}

export function ServicesProvider({
  children,
  weatherService,
  geolocationService
}: ServicesProviderProps) {
  const services = useMemo<Services>(() => ({
    weatherService: weatherService || new WeatherService(),
    geolocationService: geolocationService || new GeolocationService()
  }), [weatherService, geolocationService]);

  return h(ServicesContext.Provider, {value: services}, children);
}

export function useServices(): Services {
  const context = useContext(ServicesContext);
  if (!context) {
    throw new Error('useServices must be used within a ServicesProvider');
  }
  return context;
}
