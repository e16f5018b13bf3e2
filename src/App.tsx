import React from 'react';
import {useApp, useInput, useStdin} from 'ink';
import type {AppConfig} from './config.js';
import FullScreen from './components/common/FullScreen.js';
import DashboardView from './components/views/DashboardView.js';
import {useDashboard} from './hooks/useDashboard.js';
import {useTerminalDimensions} from './hooks/useTerminalDimensions.js';
import {renderFrame} from './layout/dashboard.js';

export type DashboardSettings = Pick<AppConfig, 'refreshIntervalMs' | 'maxWidth' | 'forcedWidth'>;

interface AppProps {
  settings: DashboardSettings;
  enableAltScreen?: boolean;
}

function Dashboard({settings}: {settings: DashboardSettings}) {
  const {exit} = useApp();
  const {isRawModeSupported} = useStdin();
  const state = useDashboard(settings.refreshIntervalMs);
  const {columns, rows} = useTerminalDimensions();

  useInput((input) => {
    if (input === 'q') exit();
  }, {isActive: isRawModeSupported === true});

  // Geometry follows the terminal on every render, so a resize redraws at once
  const lines = renderFrame(state, {columns, rows, ...settings}, new Date());
  return <DashboardView lines={lines} />;
}

export default function App({settings, enableAltScreen = true}: AppProps) {
  return (
    <FullScreen enableAltScreen={enableAltScreen}>
      <Dashboard settings={settings} />
    </FullScreen>
  );
}
