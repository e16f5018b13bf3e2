#!/usr/bin/env node
import {main} from '../cli.js';

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err) => {
    console.error('Failed to start skyboard:', err instanceof Error ? err.stack : err);
    process.exit(1);
  },
);
