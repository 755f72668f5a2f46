import { ReportRequestStatus } from './report-request.types';

export type IntervalOutcome =
  | 'SENT'
  | 'FAILED'
  | 'DEFERRED'              // InsufficientData, ledger untouched
  | 'SOURCE_UNAVAILABLE'    // telemetry store unreachable, ledger untouched
  | 'ALREADY_SENT';

export interface IntervalResult {
  interval_start: string;
  interval_end: string;
  outcome: IntervalOutcome;
  status: ReportRequestStatus | null;
  energy_value: number | null;
  error?: string;
}

export interface SchedulerTickResult {
  skipped: boolean;
  processed_count: number;
  sent_count: number;
  failed_count: number;
  deferred_count: number;
  intervals: IntervalResult[];
  processing_time_ms: number;
}
