export {createBoxGeometry, describeBorders, GeometryError} from './layout/BoxGeometry.js';
export type {BoxGeometry} from './layout/BoxGeometry.js';
export {renderRow, renderSplitRow, fitCell} from './layout/rows.js';
export {renderGauge} from './layout/gauge.js';
export {buildHourlyTable, buildDailyTable} from './layout/tables.js';
export {composeDashboard, renderFrame} from './layout/dashboard.js';
export {stripStyles, visibleLength, truncateVisible, padEndVisible, centerVisible, truncateText} from './shared/utils/formatting.js';
export {WeatherService} from './services/WeatherService.js';
export {GeolocationService} from './services/GeolocationService.js';
export {calculateSunTimes} from './shared/utils/sunTimes.js';
export {DashboardEngine} from './engine/DashboardEngine.js';
export * from './models.js';
