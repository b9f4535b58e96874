import { z } from 'zod';
import type { Logger } from 'pino';

import { HistoryClient } from '../interfaces/historyClient';
import { DateWindow, WeatherFetcherOptions } from '../interfaces/weatherHistory';
import { WeatherRow, WeatherTable } from '../interfaces/weatherRow';
import { FetchResult, OutputStatus } from '../interfaces/fetchResult';
import { WEATHER_COLUMNS } from '../constants/columns';
import { InvalidParameterError, IOFailureError, describeIssues } from '../errors';
import { isIsoDate, splitIntoWindows } from '../utils/dates';
import { flattenWindow } from '../mappers/dailyRecordToRows';

import { logger } from '../logger';
import { createWorldWeatherClient } from './historyClient';
import { parsePastWeather } from './parsePastWeather';
import { writeCsv } from './csvWriter';

// Longest date span the provider serves in one request
export const DEFAULT_MAX_WINDOW_DAYS = 35;

const isoDate = z.string().refine(isIsoDate, 'Expected a YYYY-MM-DD calendar date');

const RequestSchema = z
  .object({
    location: z.string().trim().min(1, 'Location must not be empty'),
    startDate: isoDate,
    endDate: isoDate,
    frequency: z.union([z.literal(1), z.literal(3), z.literal(6), z.literal(12)], {
      errorMap: () => ({ message: 'Frequency must be one of 1, 3, 6 or 12 hours' }),
    }),
    apiKey: z.string().min(1, 'API key must not be empty'),
    verbose: z.boolean().default(true),
    outputDir: z.string().min(1).optional(),
    maxWindowDays: z.number().int().positive().default(DEFAULT_MAX_WINDOW_DAYS),
  })
  // YYYY-MM-DD strings sort chronologically
  .refine((request) => request.startDate <= request.endDate, {
    message: 'End date must not be before start date',
    path: ['endDate'],
  });

type HistoryRequest = z.infer<typeof RequestSchema>;

export class WeatherFetcher {
  private readonly request: HistoryRequest;
  private readonly client: HistoryClient;
  private readonly logger: Logger;
  private readonly status: Logger;

  constructor(options: WeatherFetcherOptions) {
    const parsed = RequestSchema.safeParse(options);

    if (!parsed.success) {
      throw new InvalidParameterError(
        `Invalid weather history request: ${describeIssues(parsed.error.issues)}`,
        parsed.error.issues
      );
    }

    this.request = parsed.data;
    this.client = options.client ?? createWorldWeatherClient();
    this.logger = (options.logger ?? logger).child({ location: this.request.location });

    // Checkpoint messages; a failed CSV write is logged on this.logger either way
    this.status = this.request.verbose
      ? this.logger
      : this.logger.child({}, { level: 'silent' });
  }

  windows(): DateWindow[] {
    const { startDate, endDate, maxWindowDays } = this.request;
    return splitIntoWindows(startDate, endDate, maxWindowDays);
  }

  /**
   * Requests every window in order and concatenates the flattened rows.
   * Any request or parse failure aborts the whole fetch; only a failed CSV
   * write is reported in `output` alongside the table.
   */
  async fetch(): Promise<FetchResult> {
    const { location, frequency, apiKey, outputDir } = this.request;
    const windows = this.windows();
    const rows: WeatherRow[] = [];

    for (const window of windows) {
      this.status.info({ start: window.start, end: window.end }, 'Retrieving weather window');

      try {
        const body = await this.client.getPastWeather({
          location,
          startDate: window.start,
          endDate: window.end,
          frequency,
          apiKey,
        });

        const windowRows = flattenWindow(parsePastWeather(body), window, location, frequency);
        rows.push(...windowRows);

        this.status.info(
          { start: window.start, end: window.end, rows: windowRows.length },
          'Weather window retrieved'
        );
      } catch (err) {
        this.status.error({ start: window.start, end: window.end, err }, 'Weather window failed');
        throw err;
      }
    }

    const table: WeatherTable = { columns: WEATHER_COLUMNS, rows };
    const output: OutputStatus =
      outputDir === undefined ? { status: 'skipped' } : await this.save(table, outputDir);

    this.status.info({ windows: windows.length, rows: rows.length }, 'Weather history complete');

    return { table, output };
  }

  private async save(table: WeatherTable, outputDir: string): Promise<OutputStatus> {
    try {
      const path = await writeCsv(table, outputDir, this.request.location);
      this.status.info({ path }, 'Weather history saved');
      return { status: 'written', path };
    } catch (err) {
      if (!(err instanceof IOFailureError)) throw err;

      this.logger.error({ err, path: err.path }, 'Failed to write weather history');
      return { status: 'failed', path: err.path, error: err };
    }
  }
}
