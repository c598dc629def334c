#!/usr/bin/env node
import 'dotenv/config';
import { main } from './program.js';
import { createLogger } from './utils/logger.js';

const controller = new AbortController();
const cancel = () => controller.abort();
process.once('SIGINT', cancel);
process.once('SIGTERM', cancel);

const exitCode = await main(process.argv.slice(2), {
  io: { in: process.stdin, out: process.stdout, err: process.stderr },
  cwd: process.cwd(),
  env: process.env,
  signal: controller.signal,
  logger: createLogger(),
});

// Flush piped stdout before exiting.
process.stdout.write('', () => process.exit(exitCode));
