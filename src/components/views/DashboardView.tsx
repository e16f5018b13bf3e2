import React from 'react';
import {Box, Text} from 'ink';

// Lines arrive fully laid out and styled; each one is a single terminal row
export default function DashboardView({lines}: {lines: readonly string[]}) {
  return (
    <Box flexDirection="column">
      {lines.map((line, index) => (
        <Text key={index} wrap="truncate">{line || ' '}</Text>
      ))}
    </Box>
  );
}
