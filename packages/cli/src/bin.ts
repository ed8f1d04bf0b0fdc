#!/usr/bin/env node
import { streamWriter } from '@untilclock/core';
import { main } from './main.js';

process.exitCode = await main(process.argv.slice(2), {
  stdout: streamWriter(process.stdout),
  stderr: (text) => {
    process.stderr.write(text);
  },
});
