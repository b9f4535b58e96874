#!/usr/bin/env node
import { logger } from './logger';
import { loadConfig } from './config';
import { createWorldWeatherClient } from './modules/historyClient';
import { WeatherFetcher } from './modules/weatherFetcher';

// -------------------------------------------------
// One fetch driven by WWO_* environment variables
// -------------------------------------------------
async function main(): Promise<number> {
  const config = loadConfig();

  const fetcher = new WeatherFetcher({
    location: config.location,
    startDate: config.startDate,
    endDate: config.endDate,
    frequency: config.frequency,
    apiKey: config.apiKey,
    verbose: config.verbose,
    outputDir: config.outputDir,
    maxWindowDays: config.maxWindowDays,
    client: createWorldWeatherClient({
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
    }),
  });

  const { table, output } = await fetcher.fetch();

  logger.info(
    { location: config.location, rows: table.rows.length, output: output.status },
    'Weather history fetched'
  );

  return output.status === 'failed' ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error({ err }, 'Weather history fetch failed');
    process.exitCode = 1;
  });
