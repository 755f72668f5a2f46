import { Interval } from '@/types/report-request.types';

/**
 * Reporting intervals are aligned to the Unix epoch, so their boundaries depend
 * only on the instant and the interval length, never on when a tick ran.
 */
export const alignToInterval = (timestamp: Date, intervalMs: number): Date => {
  const ms = timestamp.getTime();
  return new Date(ms - (((ms % intervalMs) + intervalMs) % intervalMs));
};

export const getIntervalStartingAt = (start: Date, intervalMs: number): Interval => ({
  start: new Date(start.getTime()),
  end: new Date(start.getTime() + intervalMs),
});

export const getIntervalLength = (interval: Interval): number =>
  interval.end.getTime() - interval.start.getTime();

/**
 * The latest interval whose end is at or before `now`.
 */
export const getLastCompletedInterval = (now: Date, intervalMs: number): Interval => {
  const currentStart = alignToInterval(now, intervalMs);
  return getIntervalStartingAt(new Date(currentStart.getTime() - intervalMs), intervalMs);
};

export const isIntervalComplete = (interval: Interval, now: Date): boolean =>
  interval.end.getTime() <= now.getTime();

export const isWithinInterval = (timestamp: Date, interval: Interval): boolean =>
  timestamp.getTime() >= interval.start.getTime() && timestamp.getTime() < interval.end.getTime();

export const getIntervalHours = (interval: Interval): number =>
  (interval.end.getTime() - interval.start.getTime()) / 3_600_000;

export const formatInterval = (interval: Interval): string =>
  `[${interval.start.toISOString()}, ${interval.end.toISOString()})`;
