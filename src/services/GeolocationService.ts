import type {Coordinates} from '../config.js';
import {DEFAULT_LOCATION, GEOLOCATION_URL, REQUEST_TIMEOUT_MS} from '../constants.js';
import {Location} from '../models.js';
import {asString, readPath} from '../shared/utils/json.js';
import {logError, logInfo, logWarn} from '../shared/utils/logger.js';

export const FALLBACK_LOCATION = new Location({...DEFAULT_LOCATION});

function parseCoordinates(loc: string | undefined): Coordinates | null {
  const [lat, lon] = (loc ?? '').split(',').map(part => Number(part.trim()));
  if (lat === undefined || lon === undefined || !Number.isFinite(lat) || !Number.isFinite(lon)) return null;
  return {latitude: lat, longitude: lon};
}

/** Resolves where the dashboard reports for, from IP geolocation or fixed coordinates. */
export class GeolocationService {
  private readonly override?: Coordinates;

  constructor(override?: Coordinates) {
    this.override = override;
  }

  async locate(): Promise<Location> {
    if (this.override) {
      const {latitude, longitude} = this.override;
      return new Location({city: `${latitude.toFixed(2)}, ${longitude.toFixed(2)}`, region: '', latitude, longitude});
    }

    try {
      const res = await fetch(GEOLOCATION_URL, {signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS)});
      if (res.status !== 200) {
        logWarn(`Geolocation returned HTTP ${res.status}; using ${FALLBACK_LOCATION.city}`);
        return FALLBACK_LOCATION;
      }
      const data: unknown = await res.json();
      const coords = parseCoordinates(asString(readPath(data, 'loc')));
      const location = new Location({
        city: asString(readPath(data, 'city')) || DEFAULT_LOCATION.city,
        region: asString(readPath(data, 'region')) || DEFAULT_LOCATION.region,
        latitude: coords?.latitude ?? DEFAULT_LOCATION.latitude,
        longitude: coords?.longitude ?? DEFAULT_LOCATION.longitude,
      });
      logInfo(`Located ${location.city}, ${location.region}`, {latitude: location.latitude, longitude: location.longitude});
      return location;
    } catch (err) {
      logError('Error during geolocation', err);
      return FALLBACK_LOCATION;
    }
  }
}
