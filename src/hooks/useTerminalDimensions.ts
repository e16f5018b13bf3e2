import {useEffect, useState} from 'react';
import {useStdout} from 'ink';
import {UI_FALLBACK_COLUMNS, UI_FALLBACK_ROWS} from '../constants.js';

export interface TerminalDimensions {
  columns: number;
  rows: number;
}

function positiveEnv(name: string): number | null {
  const value = Number(process.env[name] || '');
  return Number.isFinite(value) && value > 0 ? value : null;
}

/**
 * Terminal size from Ink's stdout, updated on every resize event.
 * E2E_TTY_COLS / E2E_TTY_ROWS override the stream for tests.
 */
export function useTerminalDimensions(): TerminalDimensions {
  const {stdout} = useStdout();

  const readDims = (): TerminalDimensions => ({
    columns: positiveEnv('E2E_TTY_COLS') ?? (stdout?.columns || UI_FALLBACK_COLUMNS),
    rows: positiveEnv('E2E_TTY_ROWS') ?? (stdout?.rows || UI_FALLBACK_ROWS),
  });

  const [dimensions, setDimensions] = useState<TerminalDimensions>(readDims);

  useEffect(() => {
    if (!stdout) return;
    const updateDimensions = () => setDimensions(readDims());

    updateDimensions();
    stdout.on('resize', updateDimensions);
    return () => {
      stdout.off('resize', updateDimensions);
    };
  }, [stdout]);

  return dimensions;
}
