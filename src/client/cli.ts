#!/usr/bin/env node
/**
 * weather-call: calls get_weather and get_forecast under one client trace
 * and prints the trace id, so the server's tool spans can be found in the
 * backend under it.
 *
 *   weather-call "New York" --days 3
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { StructuredLogger } from '../observability/logger.js';
import { TelemetryManager } from '../observability/telemetry.js';
import { McpError } from '../protocol/errors.js';
import { MAX_FORECAST_DAYS } from '../tools/weather.js';
import { type ClientToolCallResult, TracedRpcClient, runWeatherSession } from './traced-client.js';

const DEFAULT_URL = 'http://localhost:8001/weather';

function parseDays(value: string): number {
  const days = Number(value);
  if (!Number.isInteger(days) || days < 1) {
    throw new InvalidArgumentError('days must be a positive integer');
  }
  return days;
}

function printResult(label: string, result: ClientToolCallResult): void {
  console.log(chalk.green(`${label}:`));
  for (const content of result.content) {
    if (content.type === 'text' && content.text !== undefined) {
      console.log(content.text);
    } else {
      console.log(JSON.stringify(content, null, 2));
    }
  }
}

interface CallOptions {
  days: number;
  url: string;
  list?: boolean;
  verbose?: boolean;
}

async function run(location: string, options: CallOptions): Promise<void> {
  const config = loadConfig();
  const logger = new StructuredLogger({
    name: 'weather-call',
    minLevel: options.verbose ? 'debug' : 'warning',
    output: (line) => process.stderr.write(`${line}\n`),
  });

  const telemetry = TelemetryManager.fromConfig({ ...config, serviceName: `${config.serviceName}-cli` }, { logger });
  telemetry.start();

  const client = new TracedRpcClient({
    url: options.url,
    recorder: telemetry.getRecorder(),
    logger: logger.child('rpc'),
  });

  try {
    if (options.list) {
      const { tools } = await client.listTools();
      console.log(chalk.green(`\nFound ${tools.length} tools:\n`));
      for (const tool of tools) {
        console.log(chalk.white(tool.name));
        if (tool.description) {
          console.log(chalk.gray(`  ${tool.description}`));
        }
      }
      return;
    }

    if (options.days > MAX_FORECAST_DAYS) {
      console.error(chalk.yellow(`The server caps forecasts at ${MAX_FORECAST_DAYS} days`));
    }

    const session = await runWeatherSession(client, telemetry.getRecorder(), location, options.days);
    printResult('Current weather', session.weather);
    printResult('Forecast', session.forecast);
    console.log(`CLIENT_TRACE_ID=${session.traceId}`);
  } finally {
    // Spans are only delivered once the exporter has flushed
    await telemetry.shutdown(config.shutdownTimeoutMs);
  }
}

const program = new Command();

program
  .name('weather-call')
  .description('Call the weather tool server under a client trace')
  .version('1.0.0')
  .argument('[location]', 'City to query', 'San Francisco')
  .option('-d, --days <days>', 'Number of forecast days', parseDays, 3)
  .option('-u, --url <url>', 'Server endpoint', process.env['WEATHER_MCP_URL'] ?? DEFAULT_URL)
  .option('-l, --list', 'List the server tools instead of calling them')
  .option('-v, --verbose', 'Log client spans and requests to stderr')
  .action(async (location: string, options: CallOptions) => {
    try {
      await run(location, options);
    } catch (error) {
      if (error instanceof McpError) {
        console.error(chalk.red(`Error ${error.code}: ${error.message}`));
      } else {
        console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
      }
      process.exitCode = 1;
    }
  });

void program.parseAsync();
