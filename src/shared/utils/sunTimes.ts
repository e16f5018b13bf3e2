const BASE_SUNRISE_HOURS = 6.5;
const BASE_SUNSET_HOURS = 19.5;
const SEASON_AMPLITUDE_HOURS = 1.5;
// Day of year near the March equinox, where the seasonal term crosses zero
const EQUINOX_DAY = 80;

export interface SunTimes {
  sunrise: Date;
  sunset: Date;
}

export function dayOfYear(date: Date): number {
  const start = new Date(date.getFullYear(), 0, 1);
  const startOfDay = new Date(date.getFullYear(), date.getMonth(), date.getDate());
  return Math.round((startOfDay.getTime() - start.getTime()) / 86_400_000) + 1;
}

function toClock(date: Date, hours: number): Date {
  const hour = Math.max(0, Math.min(23, Math.trunc(hours)));
  const minute = Math.max(0, Math.min(59, Math.trunc((hours - Math.trunc(hours)) * 60)));
  return new Date(date.getFullYear(), date.getMonth(), date.getDate(), hour, minute);
}

/**
 * Approximate local sunrise and sunset. A sine over the year shifts both times
 * by up to 1.5 hours, and the offset of the longitude from the centre of its
 * 15° timezone band shifts them together. Not astronomically accurate.
 */
// TODO: scale the seasonal term by latitude and flip it south of the equator.
export function calculateSunTimes(_latitude: number, longitude: number, date: Date): SunTimes {
  const seasonal = Math.sin((dayOfYear(date) - EQUINOX_DAY) * (2 * Math.PI / 365)) * SEASON_AMPLITUDE_HOURS;

  const zoneCenter = Math.round(longitude / 15) * 15;
  const longitudeOffset = (longitude - zoneCenter) / 15;

  return {
    sunrise: toClock(date, BASE_SUNRISE_HOURS - seasonal - longitudeOffset),
    sunset: toClock(date, BASE_SUNSET_HOURS + seasonal - longitudeOffset),
  };
}
