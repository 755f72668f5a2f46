import { createReportScheduler } from '@/jobs/report-scheduler.job';
import { createRequestLedger } from '@/services/request-ledger.service';
import { CounterSample } from '@/types/telemetry.types';
import { ReportRequestPayload, ReportSendResult } from '@/types/report.types';
import { SourceUnavailableError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { InMemoryReportRequestRepository } from '../support/in-memory-report-request.repository';

jest.mock('@/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    notify: jest.fn(),
  },
}));

const DAY_MS = 86_400_000;
const day = (date: string) => new Date(`${date}T00:00:00.000Z`);
const sample = (base: Date, offsetSeconds: number, value: number): CounterSample => ({
  timestamp: new Date(base.getTime() + offsetSeconds * 1000),
  value,
});

const SENT_OK: ReportSendResult = { success: true, status_code: 200 };

describe('Report Scheduler', () => {
  const now = new Date('2026-01-10T01:00:00.000Z');
  let repository: InMemoryReportRequestRepository;
  let source: {
    query: jest.Mock<Promise<CounterSample[]>, [string, Date, Date]>;
    lastBefore: jest.Mock<Promise<CounterSample | null>, [string, Date]>;
  };
  let requester: { send: jest.Mock<Promise<ReportSendResult>, [ReportRequestPayload]> };

  const createScheduler = (reportingStart?: Date, maxBacklogPerTick = 10) =>
    createReportScheduler(
      {
        ledger: createRequestLedger(repository, { intervalMs: DAY_MS, reportingStart }),
        source,
        requester,
      },
      {
        measurement: 'emontx3',
        emailAddress: 'operator@example.com',
        gpsLocation: { latitude: 39.2, longitude: 9.1 },
        maxBacklogPerTick,
        energy: { pulsesPerKwh: 1000, maxPowerWatts: 15000 },
        clock: () => now,
      }
    );

  beforeEach(() => {
    repository = new InMemoryReportRequestRepository();
    source = {
      // 500 pulses inside every interval, no anchor
      query: jest.fn<Promise<CounterSample[]>, [string, Date, Date]>(
        async (_measurement, start) => [sample(start, 3600, 1000), sample(start, 7200, 1500)]
      ),
      lastBefore: jest.fn<Promise<CounterSample | null>, [string, Date]>(async () => null),
    };
    requester = { send: jest.fn<Promise<ReportSendResult>, [ReportRequestPayload]>(async () => SENT_OK) };
  });

  it('should compute, record and send a due interval end to end', async () => {
    const t0 = day('2026-01-09');
    source.lastBefore.mockResolvedValue(sample(t0, -60, 1000));
    source.query.mockResolvedValue([sample(t0, 3600, 1050), sample(t0, 80000, 1100)]);
    const markComputed = jest.spyOn(repository, 'markComputed');
    const scheduler = createScheduler(t0);

    const result = await scheduler.runTick();

    expect(result).toMatchObject({ skipped: false, processed_count: 1, sent_count: 1, failed_count: 0 });
    expect(markComputed).toHaveBeenCalledWith(t0, 0.1);
    expect(requester.send).toHaveBeenCalledTimes(1);
    expect(requester.send).toHaveBeenCalledWith({
      energy_value: 0.1,
      interval: { start: t0, end: day('2026-01-10') },
      email_address: 'operator@example.com',
      gps_location: { latitude: 39.2, longitude: 9.1 },
    });
    expect(repository.get(t0)).toMatchObject({ status: 'SENT', energy_value: 0.1, attempts: 1, last_attempt_at: now });
  });

  it('should not recompute or resend an interval that is already SENT', async () => {
    const scheduler = createScheduler(day('2026-01-09'));
    await scheduler.runTick();
    jest.clearAllMocks();

    const result = await scheduler.runTick();

    expect(result.processed_count).toBe(0);
    expect(requester.send).not.toHaveBeenCalled();
    expect(source.query).not.toHaveBeenCalled();
  });

  it('should resend a COMPUTED record after a restart without recomputing', async () => {
    repository.seed({
      interval_start: day('2026-01-09'),
      interval_end: day('2026-01-10'),
      status: 'COMPUTED',
      energy_value: 0.42,
    });
    const scheduler = createScheduler();

    const result = await scheduler.runTick();

    expect(result.sent_count).toBe(1);
    expect(requester.send).toHaveBeenCalledTimes(1);
    expect(requester.send.mock.calls[0][0].energy_value).toBe(0.42);
    expect(source.lastBefore).not.toHaveBeenCalled();
    expect(source.query).not.toHaveBeenCalled();
    expect(repository.get(day('2026-01-09'))).toMatchObject({ status: 'SENT', energy_value: 0.42, attempts: 1 });
  });

  it('should catch up a backlog of five intervals in one tick, oldest first', async () => {
    const scheduler = createScheduler(day('2026-01-05'));

    const result = await scheduler.runTick();

    expect(result).toMatchObject({ processed_count: 5, sent_count: 5, failed_count: 0, deferred_count: 0 });
    expect(requester.send.mock.calls.map(([payload]) => payload.interval.start)).toEqual([
      day('2026-01-05'),
      day('2026-01-06'),
      day('2026-01-07'),
      day('2026-01-08'),
      day('2026-01-09'),
    ]);
    expect(requester.send.mock.calls.every(([payload]) => payload.energy_value === 0.5)).toBe(true);
    expect([...repository.records.values()].every(record => record.attempts === 1 && record.status === 'SENT')).toBe(true);
  });

  it('should stop at the backlog cap and continue on the next tick', async () => {
    const scheduler = createScheduler(day('2026-01-05'), 3);

    const first = await scheduler.runTick();
    const second = await scheduler.runTick();

    expect(first.sent_count).toBe(3);
    expect(second.sent_count).toBe(2);
    expect(second.intervals.map(i => i.interval_start)).toEqual([
      '2026-01-08T00:00:00.000Z',
      '2026-01-09T00:00:00.000Z',
    ]);
    expect(requester.send).toHaveBeenCalledTimes(5);
  });

  it('should leave the record PENDING across ticks when data is insufficient', async () => {
    source.lastBefore.mockResolvedValue(sample(day('2026-01-09'), -60, 1000));
    source.query.mockResolvedValue([]);
    const scheduler = createScheduler(day('2026-01-09'));

    const first = await scheduler.runTick();
    const second = await scheduler.runTick();

    expect(first).toMatchObject({ processed_count: 1, deferred_count: 1, sent_count: 0, failed_count: 0 });
    expect(second.intervals[0].outcome).toBe('DEFERRED');
    expect(repository.get(day('2026-01-09'))).toMatchObject({ status: 'PENDING', energy_value: null, attempts: 0 });
    expect(requester.send).not.toHaveBeenCalled();
  });

  it('should not touch the ledger record when the telemetry store is unavailable', async () => {
    source.lastBefore.mockRejectedValue(new SourceUnavailableError('InfluxDB query failed: connect ECONNREFUSED'));
    const scheduler = createScheduler(day('2026-01-09'));

    const result = await scheduler.runTick();

    expect(result.intervals[0]).toMatchObject({
      outcome: 'SOURCE_UNAVAILABLE',
      error: 'InfluxDB query failed: connect ECONNREFUSED',
    });
    expect(result.deferred_count).toBe(1);
    expect(repository.get(day('2026-01-09'))).toMatchObject({ status: 'PENDING', attempts: 0 });
  });

  it('should record an implausible reading as FAILED and recompute it later', async () => {
    const t0 = day('2026-01-09');
    source.query.mockResolvedValueOnce([sample(t0, 10, 0), sample(t0, 20, 10_000_000)]);
    const scheduler = createScheduler(t0);

    const first = await scheduler.runTick();

    expect(first.failed_count).toBe(1);
    expect(repository.get(t0)).toMatchObject({ status: 'FAILED', energy_value: null, attempts: 1 });
    expect(logger.notify).toHaveBeenCalledTimes(1);
    expect(requester.send).not.toHaveBeenCalled();

    const second = await scheduler.runTick();

    expect(second.sent_count).toBe(1);
    expect(source.query).toHaveBeenCalledTimes(2);
    expect(repository.get(t0)).toMatchObject({ status: 'SENT', energy_value: 0.5, attempts: 2 });
  });

  it('should retry a failed send on the next tick using the stored energy', async () => {
    requester.send.mockResolvedValueOnce({ success: false, retryable: true, status_code: 503, error: 'Report service responded with HTTP 503' });
    const scheduler = createScheduler(day('2026-01-09'));

    const first = await scheduler.runTick();

    expect(first.failed_count).toBe(1);
    expect(repository.get(day('2026-01-09'))).toMatchObject({
      status: 'FAILED',
      energy_value: 0.5,
      attempts: 1,
      last_error: 'Report service responded with HTTP 503',
    });

    const second = await scheduler.runTick();

    expect(second.sent_count).toBe(1);
    expect(source.query).toHaveBeenCalledTimes(1);
    expect(requester.send).toHaveBeenCalledTimes(2);
    expect(repository.get(day('2026-01-09'))).toMatchObject({ status: 'SENT', attempts: 2, last_error: null });
  });

  it('should flag non-retryable rejections for operators and keep retrying', async () => {
    requester.send.mockResolvedValue({ success: false, retryable: false, status_code: 422, error: 'Report service responded with HTTP 422' });
    const scheduler = createScheduler(day('2026-01-09'));

    await scheduler.runTick();
    await scheduler.runTick();

    expect(logger.notify).toHaveBeenCalledTimes(2);
    expect(repository.get(day('2026-01-09'))).toMatchObject({ status: 'FAILED', attempts: 2 });
  });

  it('should not send an interval that another process sent while this one computed', async () => {
    const t0 = day('2026-01-09');
    source.query.mockImplementationOnce(async (_measurement, start) => {
      await repository.markComputed(t0, 0.3);
      await repository.markOutcome(t0, true, new Date('2026-01-10T00:30:00.000Z'));
      return [sample(start, 3600, 1000), sample(start, 7200, 1500)];
    });
    const scheduler = createScheduler(t0);

    const result = await scheduler.runTick();

    expect(requester.send).not.toHaveBeenCalled();
    expect(result.intervals[0]).toMatchObject({ outcome: 'ALREADY_SENT', status: 'SENT', energy_value: 0.3 });
    expect(repository.get(t0)).toMatchObject({ status: 'SENT', energy_value: 0.3, attempts: 1 });
  });

  it('should log counter resets seen while computing', async () => {
    const t0 = day('2026-01-09');
    source.query.mockResolvedValueOnce([sample(t0, 60, 990), sample(t0, 120, 5)]);
    const scheduler = createScheduler(t0);

    await scheduler.runTick();

    expect(logger.info).toHaveBeenCalledWith(
      'Counter reset 1 time(s) during [2026-01-09T00:00:00.000Z, 2026-01-10T00:00:00.000Z)'
    );
    expect(requester.send.mock.calls[0][0].energy_value).toBe(0.005);
  });

  it('should abort the tick when the ledger was written with another interval length', async () => {
    repository.seed({ interval_start: day('2026-01-01'), interval_end: day('2026-01-08'), status: 'SENT', energy_value: 7, attempts: 1 });
    const scheduler = createScheduler();

    const result = await scheduler.runTick();

    expect(result).toMatchObject({ processed_count: 0, failed_count: 1 });
    expect(requester.send).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith('Report tick aborted', {
      error: 'REPORTING_INTERVAL is 86400s but ledger record [2026-01-01T00:00:00.000Z, 2026-01-08T00:00:00.000Z) spans 604800s'
    });
  });

  it('should not go past a failed interval within the same tick', async () => {
    requester.send.mockResolvedValueOnce({ success: false, retryable: true, error: 'Report service unreachable: timeout of 30000ms exceeded' });
    const scheduler = createScheduler(day('2026-01-08'));

    const result = await scheduler.runTick();

    expect(result).toMatchObject({ processed_count: 1, failed_count: 1, sent_count: 0 });
    expect(repository.get(day('2026-01-09'))).toBeUndefined();
  });

  it('should skip a tick fired while another is still running', async () => {
    let release: (result: ReportSendResult) => void = () => undefined;
    requester.send.mockImplementationOnce(
      () => new Promise<ReportSendResult>(resolve => { release = resolve; })
    );
    const scheduler = createScheduler(day('2026-01-09'));

    const inFlight = scheduler.runTick();
    await new Promise(resolve => setImmediate(resolve));

    expect(scheduler.isRunning()).toBe(true);
    const overlapping = await scheduler.runTick();
    expect(overlapping).toMatchObject({ skipped: true, processed_count: 0 });

    release(SENT_OK);
    const completed = await inFlight;

    expect(completed.sent_count).toBe(1);
    expect(scheduler.isRunning()).toBe(false);
    expect(requester.send).toHaveBeenCalledTimes(1);
  });

  it('should contain ledger failures inside the tick', async () => {
    jest.spyOn(repository, 'findLatestSent').mockRejectedValueOnce(new Error('connection reset'));
    const scheduler = createScheduler(day('2026-01-09'));

    const result = await scheduler.runTick();

    expect(result).toMatchObject({ skipped: false, processed_count: 0, failed_count: 1 });
    expect(logger.error).toHaveBeenCalledWith('Report tick aborted', { error: 'connection reset' });
    expect(scheduler.isRunning()).toBe(false);
  });
});
