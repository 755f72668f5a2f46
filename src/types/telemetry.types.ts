export interface CounterSample {
  timestamp: Date;
  value: number;           // cumulative pulse count
}

export interface CounterSampleSource {
  /** Samples with start <= timestamp < end, oldest first. */
  query(measurement: string, start: Date, end: Date): Promise<CounterSample[]>;

  /** The last sample strictly before `instant`, if any. */
  lastBefore(measurement: string, instant: Date): Promise<CounterSample | null>;
}

export interface InfluxSeries {
  name: string;
  columns: string[];
  values?: Array<Array<string | number | null>>;
}

export interface InfluxQueryResponse {
  results: Array<{
    statement_id: number;
    series?: InfluxSeries[];
    error?: string;
  }>;
  error?: string;
}
