#!/usr/bin/env node

/**
 * clipstash entry point
 * Run from source with: npx tsx bin/clipstash.ts <command>
 */

import { main } from '../lib/cli';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Error:', error);
    process.exitCode = 1;
  }
);
