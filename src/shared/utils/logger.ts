// In-memory log storage. Ink owns the screen while the dashboard runs, so
// entries are buffered and printed to stderr once the app has exited.
const errorLogs: string[] = [];
const consoleLogs: string[] = [];

type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

function describeData(data: unknown): string {
  if (data === undefined) return '';
  if (data instanceof Error) return ` ${data.stack ?? data.message}`;
  if (typeof data === 'string') return ` ${data}`;
  try {
    return ` ${JSON.stringify(data, null, 2)}`;
  } catch {
    return ` ${String(data)}`;
  }
}

// Format log entry with timestamp
function formatLogEntry(level: LogLevel, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] ${level}: ${message}${describeData(data)}\n`;
}

function storeLogEntry(isError: boolean, entry: string): void {
  if (isError) {
    errorLogs.push(entry);
  } else {
    consoleLogs.push(entry);
  }
}

export function isDebugEnabled(): boolean {
  return process.env.SKYBOARD_DEBUG === '1';
}

export function logError(message: string, error?: unknown): void {
  storeLogEntry(true, formatLogEntry('ERROR', message, error));
}

export function logWarn(message: string, data?: unknown): void {
  storeLogEntry(false, formatLogEntry('WARN', message, data));
}

export function logInfo(message: string, data?: unknown): void {
  storeLogEntry(false, formatLogEntry('INFO', message, data));
}

export function logDebug(message: string, data?: unknown): void {
  if (!isDebugEnabled()) return;
  storeLogEntry(false, formatLogEntry('DEBUG', message, data));
}

/** Buffered entries, errors first. Used by tests and by the exit dump. */
export function getBufferedLogs(): {errors: readonly string[]; entries: readonly string[]} {
  return {errors: [...errorLogs], entries: [...consoleLogs]};
}

export function clearBufferedLogs(): void {
  errorLogs.length = 0;
  consoleLogs.length = 0;
}

// Dump logs to stderr on exit
export function dumpLogsToConsole(): void {
  let hasContent = false;

  if (errorLogs.length > 0) {
    hasContent = true;
    console.error('\n=== ERROR LOGS ===');
    errorLogs.forEach(log => console.error(log.trim()));
  }

  if (consoleLogs.length > 0) {
    hasContent = true;
    console.error('\n=== CONSOLE LOGS ===');
    consoleLogs.forEach(log => console.error(log.trim()));
  }

  if (hasContent) {
    console.error('=== END LOGS ===\n');
  }
}
