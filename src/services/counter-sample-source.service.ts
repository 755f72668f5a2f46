import axios, { AxiosInstance } from 'axios';
import { CounterSample, CounterSampleSource, InfluxQueryResponse, InfluxSeries } from '@/types/telemetry.types';
import { SourceUnavailableError, errorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';

export interface InfluxSourceOptions {
  protocol: 'http' | 'https';
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
  field: string;
  timeoutMs: number;
}

export interface InfluxSampleSource extends CounterSampleSource {
  /** Creates the configured database when missing; true when it was created. */
  ensureDatabase(): Promise<boolean>;
}

const quoteIdentifier = (name: string): string => `"${name.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;

const epochMs = (instant: Date): string => `${instant.getTime()}ms`;

export const createInfluxHttpClient = (options: InfluxSourceOptions): AxiosInstance =>
  axios.create({
    baseURL: `${options.protocol}://${options.host}:${options.port}`,
    timeout: options.timeoutMs,
    params: { u: options.username, p: options.password },
  });

/**
 * Runs one InfluxQL statement through the HTTP `/query` endpoint with epoch
 * millisecond timestamps. `database` scopes the statement; server-level
 * statements such as SHOW DATABASES pass none.
 */
export const runInfluxStatement = async (
  http: AxiosInstance,
  q: string,
  method: 'get' | 'post',
  database?: string
): Promise<InfluxSeries[]> => {
  const params: Record<string, string> = { q, epoch: 'ms' };
  if (database !== undefined) {
    params.db = database;
  }

  let data: InfluxQueryResponse;
  try {
    const response = method === 'get'
      ? await http.get<InfluxQueryResponse>('/query', { params })
      : await http.post<InfluxQueryResponse>('/query', null, { params });
    data = response.data;
  } catch (error) {
    throw new SourceUnavailableError(`InfluxDB query failed: ${errorMessage(error)}`);
  }

  if (data.error) {
    throw new SourceUnavailableError(`InfluxDB error: ${data.error}`);
  }

  const result = data.results?.[0];
  if (!result) {
    throw new SourceUnavailableError('InfluxDB returned no result for the statement');
  }
  if (result.error) {
    throw new SourceUnavailableError(`InfluxDB statement error: ${result.error}`);
  }

  return result.series ?? [];
};

export const toCounterSamples = (series: InfluxSeries[], field: string): CounterSample[] => {
  const samples: CounterSample[] = [];

  for (const s of series) {
    const timeIndex = s.columns.indexOf('time');
    const valueIndex = s.columns.indexOf(field);
    if (timeIndex === -1 || valueIndex === -1) {
      continue;
    }

    for (const row of s.values ?? []) {
      const time = row[timeIndex];
      const value = row[valueIndex];
      // Points written without the pulse field come back as null
      if (typeof time !== 'number' || typeof value !== 'number') {
        continue;
      }
      samples.push({ timestamp: new Date(time), value });
    }
  }

  return samples;
};

/**
 * Reads cumulative pulse counters from InfluxDB 1.x.
 */
export const createInfluxSampleSource = (
  options: InfluxSourceOptions,
  http: AxiosInstance = createInfluxHttpClient(options)
): InfluxSampleSource => {
  const { database, field } = options;

  const query = async (measurement: string, start: Date, end: Date): Promise<CounterSample[]> => {
    const q =
      `SELECT ${quoteIdentifier(field)} FROM ${quoteIdentifier(measurement)} ` +
      `WHERE time >= ${epochMs(start)} AND time < ${epochMs(end)} ORDER BY time ASC`;

    const samples = toCounterSamples(await runInfluxStatement(http, q, 'get', database), field);

    logger.debug(`Retrieved ${samples.length} counter samples from "${measurement}"`, {
      service: 'counter-sample-source',
      start: start.toISOString(),
      end: end.toISOString()
    });

    return samples;
  };

  const lastBefore = async (measurement: string, instant: Date): Promise<CounterSample | null> => {
    const q =
      `SELECT ${quoteIdentifier(field)} FROM ${quoteIdentifier(measurement)} ` +
      `WHERE time < ${epochMs(instant)} ORDER BY time DESC LIMIT 1`;

    const samples = toCounterSamples(await runInfluxStatement(http, q, 'get', database), field);
    return samples.length > 0 ? samples[0] : null;
  };

  const ensureDatabase = async (): Promise<boolean> => {
    const series = await runInfluxStatement(http, 'SHOW DATABASES', 'get');
    const names = series.flatMap(s => (s.values ?? []).map(row => String(row[0])));
    logger.debug('InfluxDB databases', { databases: names });

    if (names.includes(database)) {
      return false;
    }

    logger.info(`InfluxDB database "${database}" not found. Creating a new one.`);
    await runInfluxStatement(http, `CREATE DATABASE ${quoteIdentifier(database)}`, 'post');
    return true;
  };

  return { query, lastBefore, ensureDatabase };
};
