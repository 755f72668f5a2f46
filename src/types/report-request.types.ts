export interface Interval {
  start: Date;
  end: Date;               // exclusive
}

export type ReportRequestStatus =
  | 'PENDING'
  | 'COMPUTED'
  | 'SENT'
  | 'FAILED';

export interface IReportRequest {
  interval_start: Date;
  interval_end: Date;
  energy_value: number | null;       // kWh
  status: ReportRequestStatus;
  attempts: number;
  last_attempt_at: Date | null;
  last_error: string | null;
  created_at?: Date;
  updated_at?: Date;
}

/**
 * Storage boundary for the request ledger. Every mutating method must be
 * durable once its promise resolves.
 */
export interface ReportRequestRepository {
  findByIntervalStart(interval_start: Date): Promise<IReportRequest | null>;
  findLatestSent(): Promise<IReportRequest | null>;
  findEarliest(): Promise<IReportRequest | null>;
  findRecent(limit: number): Promise<IReportRequest[]>;

  /** Returns the existing record for the interval, or inserts a PENDING one. */
  getOrCreate(interval: Interval): Promise<IReportRequest>;

  /** Sets energy and COMPUTED only while the record holds no energy value and is not SENT. */
  markComputed(interval_start: Date, energy_value: number): Promise<IReportRequest | null>;

  /** Applies SENT or FAILED and counts the attempt; a SENT record is left untouched. */
  markOutcome(
    interval_start: Date,
    success: boolean,
    attempted_at: Date,
    error?: string
  ): Promise<IReportRequest | null>;
}
