import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import pino from 'pino';

import { WeatherFetcher } from '@/modules/weatherFetcher';
import { WeatherFetcherOptions } from '@/interfaces/weatherHistory';
import { WEATHER_COLUMNS } from '@/constants/columns';
import {
  InvalidParameterError,
  IOFailureError,
  ProviderError,
  SchemaMismatchError,
} from '@/errors';
import { countDays, listDates } from '@/utils/dates';
import {
  FakeHistoryClient,
  makeDay,
  makeProviderError,
  makeResponse,
} from '../fixtures/pastWeather';

function options(overrides: Partial<WeatherFetcherOptions> = {}): WeatherFetcherOptions {
  return {
    location: '76446',
    startDate: '2024-01-01',
    endDate: '2024-01-03',
    frequency: 12,
    apiKey: 'test-key',
    verbose: false,
    ...overrides,
  };
}

/** pino logger whose output lands in `messages` */
function captureLogger() {
  const messages: string[] = [];
  const logger = pino({ level: 'info' }, {
    write: (line: string) => {
      messages.push(JSON.parse(line).msg);
    },
  });
  return { logger, messages };
}

describe('WeatherFetcher construction (unit)', () => {
  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - invalid parameters fail before any network call
   */
  it.each<[string, Partial<WeatherFetcherOptions>]>([
    ['unsupported frequency', { frequency: 5 }],
    ['end before start', { startDate: '2024-02-02', endDate: '2024-02-01' }],
    ['slash-separated date', { startDate: '2024/01/01' }],
    ['impossible date', { endDate: '2023-02-29', startDate: '2023-02-01' }],
    ['blank location', { location: '   ' }],
    ['empty API key', { apiKey: '' }],
  ])('rejects %s with InvalidParameterError', (_label, overrides) => {
    const client = new FakeHistoryClient();

    expect(() => new WeatherFetcher(options({ ...overrides, client }))).toThrow(
      InvalidParameterError
    );
    expect(client.queries).toHaveLength(0);
  });

  it('names the offending field in the error', () => {
    expect(() => new WeatherFetcher(options({ frequency: 2 }))).toThrow(
      'Invalid weather history request: frequency: Frequency must be one of 1, 3, 6 or 12 hours'
    );
  });

  it('accepts a range of a single day', () => {
    const fetcher = new WeatherFetcher(
      options({ startDate: '2024-05-05', endDate: '2024-05-05', client: new FakeHistoryClient() })
    );

    expect(fetcher.windows()).toEqual([{ start: '2024-05-05', end: '2024-05-05' }]);
  });
});

describe('WeatherFetcher.fetch (unit)', () => {
  /**
   * Purpose:
   * Verifies Core behavior:
   * - one request per window, sequential and in order
   * - row count equals days x (24 / frequency)
   */
  it('fetches every window and concatenates the rows', async () => {
    const client = new FakeHistoryClient();
    const fetcher = new WeatherFetcher(
      options({ startDate: '2024-01-15', endDate: '2024-03-10', frequency: 6, client })
    );

    const { table, output } = await fetcher.fetch();

    expect(client.queries).toEqual([
      { location: '76446', startDate: '2024-01-15', endDate: '2024-01-31', frequency: 6, apiKey: 'test-key' },
      { location: '76446', startDate: '2024-02-01', endDate: '2024-02-29', frequency: 6, apiKey: 'test-key' },
      { location: '76446', startDate: '2024-03-01', endDate: '2024-03-10', frequency: 6, apiKey: 'test-key' },
    ]);
    expect(table.rows).toHaveLength(56 * 4);
    expect(table.rows).toHaveLength(countDays('2024-01-15', '2024-03-10') * (24 / 6));
    expect(table.columns).toEqual(WEATHER_COLUMNS);
    expect(output).toEqual({ status: 'skipped' });
  });

  /**
   * Purpose:
   * Verifies Invariant:
   * - dateTime is date + offset and strictly increasing
   */
  it('produces strictly increasing date-times rebuilt from date and offset', async () => {
    const fetcher = new WeatherFetcher(
      options({ startDate: '2024-02-28', endDate: '2024-03-02', frequency: 3, client: new FakeHistoryClient() })
    );

    const { table } = await fetcher.fetch();

    const clocks = ['00', '03', '06', '09', '12', '15', '18', '21'].map((h) => `${h}:00:00`);
    const expected = listDates('2024-02-28', '2024-03-02').flatMap((date) =>
      clocks.map((clock) => `${date} ${clock}`)
    );

    const dateTimes = table.rows.map((row) => row.dateTime);
    expect(dateTimes).toEqual(expected);
    for (let i = 1; i < dateTimes.length; i++) {
      expect(dateTimes[i] > dateTimes[i - 1]).toBe(true);
    }
  });

  it('repeats daily and astronomy fields on every row of a day', async () => {
    const fetcher = new WeatherFetcher(options({ frequency: 1, client: new FakeHistoryClient() }));

    const { table } = await fetcher.fetch();

    for (const date of ['2024-01-01', '2024-01-02', '2024-01-03']) {
      const rows = table.rows.filter((row) => row.date === date);
      expect(rows).toHaveLength(24);

      const dayFields = rows.map((row) => [
        row.maxTempC,
        row.minTempC,
        row.totalSnowCm,
        row.sunHours,
        row.uvIndex,
        row.moonIllumination,
        row.moonrise,
        row.moonset,
        row.sunrise,
        row.sunset,
      ]);
      expect(new Set(dayFields.map((fields) => JSON.stringify(fields))).size).toBe(1);
    }
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - adjacent windows join without overlap or duplicates
   */
  it('joins adjacent windows without duplicate date-times', async () => {
    const client = new FakeHistoryClient();
    const fetcher = new WeatherFetcher(
      options({ startDate: '2024-01-01', endDate: '2024-02-05', maxWindowDays: 30, client })
    );

    const { table } = await fetcher.fetch();

    expect(client.queries.map((q) => [q.startDate, q.endDate])).toEqual([
      ['2024-01-01', '2024-01-30'],
      ['2024-01-31', '2024-01-31'],
      ['2024-02-01', '2024-02-05'],
    ]);

    const dateTimes = table.rows.map((row) => row.dateTime);
    expect(dateTimes).toHaveLength(36 * 2);
    expect(new Set(dateTimes).size).toBe(dateTimes.length);
    expect([...dateTimes].sort()).toEqual(dateTimes);
  });

  /**
   * Purpose:
   * Verifies Error handling:
   * - one bad daily record fails the whole fetch
   * - nothing is written
   */
  it('fails the whole fetch when a daily record lacks its date', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'weather-history-'));

    try {
      const client = new FakeHistoryClient((query) => {
        const days: unknown[] = listDates(query.startDate, query.endDate).map((d) =>
          makeDay(d, query.frequency)
        );
        if (query.startDate === '2024-02-01') {
          const { date: _date, ...undated } = makeDay('2024-02-02', query.frequency);
          days[1] = undated;
        }
        return makeResponse(days);
      });
      const fetcher = new WeatherFetcher(
        options({ startDate: '2024-01-20', endDate: '2024-02-10', outputDir: dir, client })
      );

      await expect(fetcher.fetch()).rejects.toThrow(SchemaMismatchError);
      await expect(fs.readdir(dir)).resolves.toEqual([]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('fails when the provider returns the wrong number of hourly records', async () => {
    const client = new FakeHistoryClient((query) =>
      makeResponse(listDates(query.startDate, query.endDate).map((d) => makeDay(d, 6)))
    );
    const fetcher = new WeatherFetcher(options({ frequency: 3, client }));

    await expect(fetcher.fetch()).rejects.toThrow(SchemaMismatchError);
  });

  /**
   * Purpose:
   * Verifies Error handling:
   * - provider rejection surfaces as ProviderError
   * - later windows are never requested
   */
  it('stops at the first provider error', async () => {
    const client = new FakeHistoryClient(() => makeProviderError('API key is invalid'));
    const fetcher = new WeatherFetcher(
      options({ startDate: '2024-01-01', endDate: '2024-03-31', client })
    );

    await expect(fetcher.fetch()).rejects.toThrow(ProviderError);
    expect(client.queries).toHaveLength(1);
  });

  it('propagates client failures unchanged', async () => {
    const failure = new Error('socket hang up');
    const client = new FakeHistoryClient(() => {
      throw failure;
    });
    const fetcher = new WeatherFetcher(options({ client }));

    await expect(fetcher.fetch()).rejects.toBe(failure);
  });
});

describe('WeatherFetcher output file (unit)', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'weather-history-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - <dir>/<location>.csv is written
   * - header matches columns, one line per row
   */
  it('writes the table to <outputDir>/<location>.csv', async () => {
    const fetcher = new WeatherFetcher(
      options({ outputDir: dir, frequency: 6, client: new FakeHistoryClient() })
    );

    const { table, output } = await fetcher.fetch();

    const filePath = path.join(dir, '76446.csv');
    expect(output).toEqual({ status: 'written', path: filePath });

    const lines = (await fs.readFile(filePath, 'utf8')).trimEnd().split('\n');
    expect(lines[0]).toBe(table.columns.join(','));
    expect(lines).toHaveLength(table.rows.length + 1);
    expect(table.rows).toHaveLength(12);
  });

  it('overwrites a previous export', async () => {
    const filePath = path.join(dir, '76446.csv');
    await fs.writeFile(filePath, 'old,contents\n1,2\n3,4\n5,6\n7,8\n9,10\n11,12\n13,14\n');

    await new WeatherFetcher(
      options({ outputDir: dir, client: new FakeHistoryClient() })
    ).fetch();

    const lines = (await fs.readFile(filePath, 'utf8')).trimEnd().split('\n');
    expect(lines).toHaveLength(3 * 2 + 1);
    expect(lines[0]).toBe(WEATHER_COLUMNS.join(','));
  });

  /**
   * Purpose:
   * Verifies Error handling:
   * - a failed write is reported
   * - the in-memory table is still returned
   */
  it('returns the table when the file cannot be written', async () => {
    const blocker = path.join(dir, 'occupied');
    await fs.writeFile(blocker, '');

    const { table, output } = await new WeatherFetcher(
      options({ outputDir: blocker, client: new FakeHistoryClient() })
    ).fetch();

    expect(table.rows).toHaveLength(6);
    expect(output.status).toBe('failed');
    if (output.status === 'failed') {
      expect(output.error).toBeInstanceOf(IOFailureError);
      expect(output.path).toBe(path.join(blocker, '76446.csv'));
    }
  });
});

describe('WeatherFetcher status messages (unit)', () => {
  it('logs each checkpoint when verbose', async () => {
    const { logger, messages } = captureLogger();
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'weather-history-'));

    try {
      await new WeatherFetcher(
        options({
          startDate: '2024-01-31',
          endDate: '2024-02-01',
          verbose: true,
          outputDir: dir,
          logger,
          client: new FakeHistoryClient(),
        })
      ).fetch();
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }

    expect(messages).toEqual([
      'Retrieving weather window',
      'Weather window retrieved',
      'Retrieving weather window',
      'Weather window retrieved',
      'Weather history saved',
      'Weather history complete',
    ]);
  });

  it('logs the failing window when verbose', async () => {
    const { logger, messages } = captureLogger();
    const fetcher = new WeatherFetcher(
      options({
        verbose: true,
        logger,
        client: new FakeHistoryClient(() => makeProviderError('Unknown location')),
      })
    );

    await expect(fetcher.fetch()).rejects.toThrow('Unknown location');
    expect(messages).toEqual(['Retrieving weather window', 'Weather window failed']);
  });

  it('stays quiet when verbose is off', async () => {
    const { logger, messages } = captureLogger();

    await new WeatherFetcher(
      options({ verbose: false, logger, client: new FakeHistoryClient() })
    ).fetch();

    expect(messages).toEqual([]);
  });
});
