#!/usr/bin/env node

import 'dotenv/config';
import type { Server } from 'node:http';

import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { runServer } from './server.js';
import { createSlackClient } from './slack/client.js';
import { RelayError } from './utils/errors.js';

let server: Server | null = null;

function shutdown(): void {
  if (!server) process.exit(0);
  server.close(() => process.exit(0));
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const slack = createSlackClient(config, logger);

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  server = await runServer({ config, slack, logger });
}

main().catch((error: unknown) => {
  const issues = error instanceof RelayError ? error.details?.['issues'] : undefined;
  if (Array.isArray(issues)) {
    console.error('Fatal error: invalid configuration');
    for (const issue of issues) {
      console.error(`  ${String(issue)}`);
    }
  } else {
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
});
