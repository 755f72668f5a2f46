import cron, { ScheduledTask } from 'node-cron';
import { RequestLedger } from '@/services/request-ledger.service';
import { EnergyOptions, computeIntervalEnergy } from '@/services/energy-accumulator.service';
import { CounterSampleSource } from '@/types/telemetry.types';
import { GpsLocation, ReportRequester } from '@/types/report.types';
import { IReportRequest, Interval } from '@/types/report-request.types';
import { IntervalResult, SchedulerTickResult } from '@/types/scheduler.types';
import {
  ImplausibleReadingError,
  InsufficientDataError,
  SourceUnavailableError,
  errorMessage
} from '@/utils/errors';
import { formatInterval } from '@/utils/time-window.utils';
import { logger } from '@/utils/logger';

export interface ReportSchedulerOptions {
  measurement: string;
  emailAddress: string;
  gpsLocation: GpsLocation;
  maxBacklogPerTick: number;
  energy: EnergyOptions;
  clock?: () => Date;
}

export interface ReportSchedulerDeps {
  ledger: RequestLedger;
  source: CounterSampleSource;
  requester: ReportRequester;
}

export interface ReportScheduler {
  /**
   * Runs one tick. Never rejects: failures are logged and reported in the result.
   * A tick requested while another is in flight is skipped, not queued.
   */
  runTick(): Promise<SchedulerTickResult>;
  isRunning(): boolean;
}

const toResult = (
  interval: Interval,
  outcome: IntervalResult['outcome'],
  record: IReportRequest | null,
  error?: string
): IntervalResult => ({
  interval_start: interval.start.toISOString(),
  interval_end: interval.end.toISOString(),
  outcome,
  status: record?.status ?? null,
  energy_value: record?.energy_value ?? null,
  ...(error !== undefined ? { error } : {})
});

/**
 * Drives the per-interval state machine:
 *
 *   PENDING -> COMPUTED -> SENT
 *   PENDING | COMPUTED -> FAILED -> (next tick) -> SENT
 *
 * Holds no state between ticks apart from the re-entrancy flag; everything
 * else is read back from the ledger.
 */
export const createReportScheduler = (
  deps: ReportSchedulerDeps,
  options: ReportSchedulerOptions
): ReportScheduler => {
  const { ledger, source, requester } = deps;
  const clock = options.clock ?? (() => new Date());
  let running = false;

  const computeEnergy = async (interval: Interval): Promise<number> => {
    const anchor = await source.lastBefore(options.measurement, interval.start);
    const samples = await source.query(options.measurement, interval.start, interval.end);

    const result = computeIntervalEnergy(interval, samples, anchor, options.energy);
    logger.debug(`Accumulated ${result.pulses} pulses over ${result.sample_count} samples`, {
      service: 'report-scheduler',
      interval: formatInterval(interval),
      resets: result.resets
    });
    if (result.resets > 0) {
      logger.info(`Counter reset ${result.resets} time(s) during ${formatInterval(interval)}`);
    }

    return result.energy_value;
  };

  const sendReport = async (interval: Interval, energy_value: number): Promise<IntervalResult> => {
    const response = await requester.send({
      energy_value,
      interval,
      email_address: options.emailAddress,
      gps_location: options.gpsLocation
    });

    if (response.success) {
      const record = await ledger.recordOutcome(interval, true, undefined, clock());
      logger.info(`Report requested for ${formatInterval(interval)} (${energy_value} kWh)`, {
        status_code: response.status_code,
        attempts: record.attempts
      });
      return toResult(interval, 'SENT', record);
    }

    const record = await ledger.recordOutcome(interval, false, response.error, clock());
    if (response.retryable) {
      logger.warn(`Report request for ${formatInterval(interval)} failed; retrying next tick`, {
        error: response.error,
        attempts: record.attempts
      });
    } else {
      logger.notify(`Report request for ${formatInterval(interval)} rejected by the service; retrying next tick`, {
        error: response.error,
        status_code: response.status_code,
        attempts: record.attempts
      });
    }
    return toResult(interval, 'FAILED', record, response.error);
  };

  const processInterval = async (interval: Interval): Promise<IntervalResult> => {
    let record = await ledger.ensureRecord(interval);

    if (record.status === 'SENT') {
      logger.info(`The report for ${formatInterval(interval)} had been already sent.`);
      return toResult(interval, 'ALREADY_SENT', record);
    }

    // Only a record that never stored an energy value is computed
    if (record.energy_value === null) {
      let energy: number;
      try {
        energy = await computeEnergy(interval);
      } catch (error) {
        if (error instanceof InsufficientDataError) {
          logger.warn(`Deferring ${formatInterval(interval)}: ${error.message}`);
          return toResult(interval, 'DEFERRED', record, error.message);
        }
        if (error instanceof SourceUnavailableError) {
          logger.error(`Telemetry store unavailable for ${formatInterval(interval)}: ${error.message}`);
          return toResult(interval, 'SOURCE_UNAVAILABLE', record, error.message);
        }
        if (error instanceof ImplausibleReadingError) {
          logger.notify(`Implausible reading for ${formatInterval(interval)}: ${error.message}`);
          record = await ledger.recordOutcome(interval, false, error.message, clock());
          return toResult(interval, 'FAILED', record, error.message);
        }
        throw error;
      }
      record = await ledger.recordComputed(interval, energy);

      // Another process may have sent the interval while this one was computing
      if (record.status === 'SENT') {
        logger.info(`The report for ${formatInterval(interval)} was sent during computation.`);
        return toResult(interval, 'ALREADY_SENT', record);
      }
    }

    if (record.energy_value === null) {
      throw new Error(`Ledger record for ${formatInterval(interval)} has no energy value after compute`);
    }

    return sendReport(interval, record.energy_value);
  };

  const runTick = async (): Promise<SchedulerTickResult> => {
    const startTime = Date.now();
    const result: SchedulerTickResult = {
      skipped: false,
      processed_count: 0,
      sent_count: 0,
      failed_count: 0,
      deferred_count: 0,
      intervals: [],
      processing_time_ms: 0
    };

    if (running) {
      logger.warn('Previous report tick still running; skipping this one');
      return { ...result, skipped: true };
    }

    running = true;
    try {
      while (result.processed_count < options.maxBacklogPerTick) {
        const interval = await ledger.nextDueInterval(clock());
        if (!interval) {
          logger.debug('No report interval due');
          break;
        }

        const intervalResult = await processInterval(interval);
        result.processed_count++;
        result.intervals.push(intervalResult);

        if (intervalResult.outcome === 'SENT') {
          result.sent_count++;
          continue;
        }
        if (intervalResult.outcome === 'FAILED') {
          result.failed_count++;
        } else if (intervalResult.outcome !== 'ALREADY_SENT') {
          result.deferred_count++;
        }
        break;
      }

      if (result.sent_count >= options.maxBacklogPerTick) {
        logger.info(`Backlog cap of ${options.maxBacklogPerTick} intervals reached; continuing next tick`);
      }
    } catch (error) {
      result.failed_count++;
      logger.error('Report tick aborted', { error: errorMessage(error) });
    } finally {
      running = false;
    }

    result.processing_time_ms = Date.now() - startTime;
    logger.info('Report tick completed', {
      processed: result.processed_count,
      sent: result.sent_count,
      failed: result.failed_count,
      deferred: result.deferred_count,
      time_ms: result.processing_time_ms
    });

    return result;
  };

  return { runTick, isRunning: () => running };
};

/**
 * Schedules `runTick` on the cron expression and fires one tick immediately.
 */
export function startReportSchedulerJob(scheduler: ReportScheduler, schedule: string): ScheduledTask {
  const task = cron.schedule(schedule, () => {
    logger.debug('[REPORT_SCHEDULER] Cron triggered', {
      service: 'report-scheduler',
      schedule,
      triggered_at: new Date().toISOString()
    });
    void scheduler.runTick();
  });

  void scheduler.runTick();
  logger.info(`Report scheduler cron job scheduled: ${schedule}`);

  return task;
}
