import React, {useEffect} from 'react';
import {Box, useStdout} from 'ink';
import {ALT_SCREEN_ENTER, ALT_SCREEN_LEAVE, CURSOR_HIDE, CURSOR_SHOW} from '../../shared/utils/ansi.js';
import {useTerminalDimensions} from '../../hooks/useTerminalDimensions.js';

function useAltScreen(enabled: boolean) {
  const {stdout} = useStdout();
  useEffect(() => {
    if (!enabled || !stdout || !stdout.isTTY) return;
    // Enter alternate screen buffer and hide cursor
    stdout.write(ALT_SCREEN_ENTER + CURSOR_HIDE);
    return () => {
      // Show cursor and leave alternate screen
      stdout.write(CURSOR_SHOW + ALT_SCREEN_LEAVE);
    };
  }, [enabled, stdout]);
}

export default function FullScreen(props: {children: React.ReactNode; enableAltScreen?: boolean}) {
  const {enableAltScreen = true} = props;
  const {columns} = useTerminalDimensions();
  useAltScreen(enableAltScreen);

  return (
    <Box width={columns} flexDirection="column">
      {props.children}
    </Box>
  );
}
