import {run} from './app.js';
import {ConfigError, parseConfig, type AppConfig} from './config.js';
import {APP_TITLE, MAX_REFRESH_SECONDS, MIN_REFRESH_SECONDS, PACKAGE_NAME, SECOND_MS, UI_FALLBACK_COLUMNS} from './constants.js';
import {GeometryError, createBoxGeometry, describeBorders} from './layout/BoxGeometry.js';
import {frameWidth} from './layout/dashboard.js';
import {dumpLogsToConsole, logError} from './shared/utils/logger.js';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  columns?: number;
  runDashboard?: (config: AppConfig) => Promise<void>;
}

export function usage(config: AppConfig): string[] {
  const seconds = config.refreshIntervalMs / SECOND_MS;
  return [
    `${APP_TITLE} - A terminal-based weather dashboard`,
    `Usage: ${PACKAGE_NAME} [options]`,
    '',
    'Options:',
    '  -h, --help             Show this help and exit',
    '  --check-borders        Print the box borders for this terminal and exit',
    `  --interval <seconds>   Refresh interval (${MIN_REFRESH_SECONDS}-${MAX_REFRESH_SECONDS})`,
    '  --lat <n> --lon <n>    Fixed coordinates instead of IP geolocation',
    '  --width <n>            Force the dashboard width in columns',
    '',
    'Your location is detected with IP geolocation (ipinfo.io) on each run',
    'unless coordinates are given.',
    'Weather data comes from the Weather.gov API; no API key is required for US locations.',
    '',
    `The dashboard updates automatically every ${seconds} ${seconds === 1 ? 'second' : 'seconds'}.`,
    'Press Ctrl+C or q to exit.',
  ];
}

/** Entry point shared by the bin script and tests. Resolves to the exit code. */
export async function main(argv: readonly string[], io: CliIO = {out: console.log, err: console.error}): Promise<number> {
  let config: AppConfig;
  try {
    config = parseConfig(argv);
  } catch (err) {
    if (err instanceof ConfigError) {
      io.err(`Error: ${err.message}`);
      io.err(`Run "${PACKAGE_NAME} --help" for usage.`);
      return 1;
    }
    throw err;
  }

  if (config.showHelp) {
    usage(config).forEach(line => io.out(line));
    if (!config.checkBorders) return 0;
  }

  if (config.checkBorders) {
    const columns = io.columns ?? process.stdout.columns ?? UI_FALLBACK_COLUMNS;
    try {
      const geometry = createBoxGeometry(config.forcedWidth ?? frameWidth(columns, config.maxWidth));
      io.out('Checking border strings:');
      describeBorders(geometry).forEach(line => io.out(line));
      return 0;
    } catch (err) {
      if (err instanceof GeometryError) {
        io.err(`Error: ${err.message}`);
        return 1;
      }
      throw err;
    }
  }

  try {
    await (io.runDashboard ?? run)(config);
    io.out(`Exiting ${PACKAGE_NAME}. Goodbye!`);
    return 0;
  } catch (err) {
    logError('Dashboard crashed', err);
    return 1;
  } finally {
    dumpLogsToConsole();
  }
}
