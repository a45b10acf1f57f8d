#!/usr/bin/env node
/**
 * Weather tool server CLI
 * Starts the server with configuration from environment variables
 */

import { ConfigError, loadConfig } from './config.js';
import { StructuredLogger } from './observability/logger.js';
import { WeatherToolServer } from './server.js';

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

async function main(): Promise<void> {
  try {
    const config = loadConfig();
    const logger = new StructuredLogger({ name: 'server', minLevel: config.logLevel, output: writeStderr });

    const server = new WeatherToolServer({ config, logger });

    // Installs signal handlers internally
    await server.start();
  } catch (error) {
    const logger = new StructuredLogger({ name: 'server', output: writeStderr });
    if (error instanceof ConfigError) {
      logger.critical(error.message, { issues: error.issues });
    } else {
      logger.critical('Failed to start weather tool server', { error });
    }
    process.exit(1);
  }
}

void main();
