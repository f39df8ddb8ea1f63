#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from './cli/program.js';

const controller = new AbortController();
let interrupted = false;

process.on('SIGINT', () => {
  if (interrupted) {
    process.exit(130);
  }
  interrupted = true;
  console.error('Interrupt received; stopping after the current iteration (press Ctrl+C again to quit)');
  controller.abort();
});

process.exitCode = await runCli(process.argv.slice(2), {
  log: line => console.log(line),
  error: line => console.error(line),
}, { signal: controller.signal });

// `serve` keeps the process alive through its listener; everything else ends here
