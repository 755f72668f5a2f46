import { IReportRequest, Interval, ReportRequestRepository } from '@/types/report-request.types';
import { ConfigurationError } from '@/utils/errors';
import {
  alignToInterval,
  formatInterval,
  getIntervalLength,
  getIntervalStartingAt,
  getLastCompletedInterval,
  isIntervalComplete
} from '@/utils/time-window.utils';
import { logger } from '@/utils/logger';

export interface RequestLedgerOptions {
  intervalMs: number;
  /** First interval to report when the ledger is empty; defaults to the last completed one. */
  reportingStart?: Date;
}

export interface RequestLedger {
  nextDueInterval(now: Date): Promise<Interval | null>;
  verifyIntervalLength(): Promise<void>;
  ensureRecord(interval: Interval): Promise<IReportRequest>;
  recordComputed(interval: Interval, energy_value: number): Promise<IReportRequest>;
  recordOutcome(interval: Interval, success: boolean, error?: string, attemptedAt?: Date): Promise<IReportRequest>;
  listRecords(limit: number): Promise<IReportRequest[]>;
  findRecord(intervalStart: Date): Promise<IReportRequest | null>;
}

/**
 * Fails when `record` was written under a different interval length: the next
 * interval would otherwise overlap intervals already in the ledger.
 */
export const assertIntervalLength = (record: IReportRequest, intervalMs: number): void => {
  const recordInterval = { start: record.interval_start, end: record.interval_end };
  const length = getIntervalLength(recordInterval);
  if (length !== intervalMs) {
    throw new ConfigurationError(
      `REPORTING_INTERVAL is ${intervalMs / 1000}s but ledger record ${formatInterval(recordInterval)} ` +
      `spans ${length / 1000}s`
    );
  }
};

export const createRequestLedger = (
  repository: ReportRequestRepository,
  options: RequestLedgerOptions
): RequestLedger => {
  const { intervalMs } = options;
  const reportingStart = options.reportingStart
    ? alignToInterval(options.reportingStart, intervalMs)
    : undefined;

  const requireRecord = async (interval: Interval): Promise<IReportRequest> => {
    const record = await repository.findByIntervalStart(interval.start);
    if (!record) {
      throw new Error(`No ledger record for ${formatInterval(interval)}`);
    }
    return record;
  };

  /**
   * Earliest interval not yet SENT whose end is at or before `now`, or null when
   * the ledger is current. Intervals are reported strictly in order, so an
   * unsent interval holds back every later one.
   */
  const nextDueInterval = async (now: Date): Promise<Interval | null> => {
    let candidate: Interval;

    const latestSent = await repository.findLatestSent();
    if (latestSent) {
      assertIntervalLength(latestSent, intervalMs);
      candidate = getIntervalStartingAt(latestSent.interval_end, intervalMs);
    } else {
      const earliest = await repository.findEarliest();
      if (earliest) {
        assertIntervalLength(earliest, intervalMs);
        candidate = getIntervalStartingAt(earliest.interval_start, intervalMs);
      } else if (reportingStart) {
        candidate = getIntervalStartingAt(reportingStart, intervalMs);
      } else {
        candidate = getLastCompletedInterval(now, intervalMs);
      }
    }

    return isIntervalComplete(candidate, now) ? candidate : null;
  };

  /**
   * Checks the newest record against the configured interval length. Called at
   * startup so a changed REPORTING_INTERVAL stops the process instead of every tick.
   */
  const verifyIntervalLength = async (): Promise<void> => {
    const [latest] = await repository.findRecent(1);
    if (latest) {
      assertIntervalLength(latest, intervalMs);
    }
  };

  const ensureRecord = async (interval: Interval): Promise<IReportRequest> => {
    const record = await repository.getOrCreate(interval);
    logger.debug(`Ledger record for ${formatInterval(interval)} is ${record.status}`, {
      service: 'request-ledger',
      attempts: record.attempts,
      energy_value: record.energy_value
    });
    return record;
  };

  /**
   * Persists the computed energy. A record that already carries an energy value
   * keeps it: the stored figure is what gets sent.
   */
  const recordComputed = async (interval: Interval, energy_value: number): Promise<IReportRequest> => {
    const updated = await repository.markComputed(interval.start, energy_value);
    if (updated) {
      logger.info(`Interval ${formatInterval(interval)} computed: ${energy_value} kWh`);
      return updated;
    }

    const current = await requireRecord(interval);
    logger.warn(`Interval ${formatInterval(interval)} already ${current.status}; keeping stored energy`, {
      stored_energy_value: current.energy_value,
      discarded_energy_value: energy_value
    });
    return current;
  };

  const recordOutcome = async (
    interval: Interval,
    success: boolean,
    error?: string,
    attemptedAt: Date = new Date()
  ): Promise<IReportRequest> => {
    const updated = await repository.markOutcome(interval.start, success, attemptedAt, error);
    if (updated) {
      logger.debug(`Interval ${formatInterval(interval)} marked ${updated.status}`, {
        service: 'request-ledger',
        attempts: updated.attempts,
        error
      });
      return updated;
    }

    const current = await requireRecord(interval);
    logger.warn(`Interval ${formatInterval(interval)} is already SENT; outcome ignored`, { success });
    return current;
  };

  return {
    nextDueInterval,
    verifyIntervalLength,
    ensureRecord,
    recordComputed,
    recordOutcome,
    listRecords: (limit: number) => repository.findRecent(limit),
    findRecord: (intervalStart: Date) => repository.findByIntervalStart(intervalStart)
  };
};
