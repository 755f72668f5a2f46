import ReportRequest from '@/models/ReportRequest';
import { IReportRequest, Interval, ReportRequestRepository } from '@/types/report-request.types';
import { LEDGER_CONFIG } from '@/config/constants';

const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === LEDGER_CONFIG.DUPLICATE_KEY_CODE;

const RECORD_PROJECTION = { _id: 0, __v: 0 } as const;

/**
 * Finds the ledger record for the interval starting at `interval_start`.
 */
export const findReportRequestByStart = async (
  interval_start: Date
): Promise<IReportRequest | null> => {
  return ReportRequest.findOne({ interval_start }, RECORD_PROJECTION).lean<IReportRequest>();
};

export const findLatestSentReportRequest = async (): Promise<IReportRequest | null> => {
  return ReportRequest.findOne({ status: 'SENT' }, RECORD_PROJECTION)
    .sort({ interval_start: -1 })
    .lean<IReportRequest>();
};

export const findEarliestReportRequest = async (): Promise<IReportRequest | null> => {
  return ReportRequest.findOne({}, RECORD_PROJECTION)
    .sort({ interval_start: 1 })
    .lean<IReportRequest>();
};

/**
 * Latest records, newest interval first.
 */
export const findRecentReportRequests = async (limit: number): Promise<IReportRequest[]> => {
  return ReportRequest.find({}, RECORD_PROJECTION)
    .sort({ interval_start: -1 })
    .limit(limit)
    .lean<IReportRequest[]>();
};

/**
 * Returns the record for the interval, inserting a PENDING one if none exists.
 */
export const getOrCreateReportRequest = async (interval: Interval): Promise<IReportRequest> => {
  try {
    const record = await ReportRequest.findOneAndUpdate(
      { interval_start: interval.start },
      {
        $setOnInsert: {
          interval_start: interval.start,
          interval_end: interval.end,
          energy_value: null,
          status: 'PENDING',
          attempts: 0,
          last_attempt_at: null,
          last_error: null
        }
      },
      { upsert: true, new: true, projection: RECORD_PROJECTION }
    ).lean<IReportRequest>();

    if (record) {
      return record;
    }
  } catch (error) {
    // Two upserts racing on the unique index: one wins, the other reads the winner
    if (!isDuplicateKeyError(error)) {
      throw error;
    }
  }

  const existing = await findReportRequestByStart(interval.start);
  if (!existing) {
    throw new Error(`Ledger record for ${interval.start.toISOString()} vanished after insert`);
  }
  return existing;
};

/**
 * Stores the energy value. Matches only a PENDING or FAILED record without one.
 */
export const markReportRequestComputed = async (
  interval_start: Date,
  energy_value: number
): Promise<IReportRequest | null> => {
  return ReportRequest.findOneAndUpdate(
    { interval_start, status: { $in: ['PENDING', 'FAILED'] }, energy_value: null },
    { $set: { energy_value, status: 'COMPUTED', last_error: null } },
    { new: true, projection: RECORD_PROJECTION }
  ).lean<IReportRequest>();
};

export const markReportRequestOutcome = async (
  interval_start: Date,
  success: boolean,
  attempted_at: Date,
  error?: string
): Promise<IReportRequest | null> => {
  return ReportRequest.findOneAndUpdate(
    { interval_start, status: { $ne: 'SENT' } },
    {
      $set: {
        status: success ? 'SENT' : 'FAILED',
        last_attempt_at: attempted_at,
        last_error: success ? null : error ?? 'Unknown error'
      },
      $inc: { attempts: 1 }
    },
    { new: true, projection: RECORD_PROJECTION }
  ).lean<IReportRequest>();
};

/**
 * MongoDB ledger. Each mutation is a single-document atomic update guarded by a
 * status precondition, so there is never a partially applied transition.
 */
export const reportRequestRepository: ReportRequestRepository = {
  findByIntervalStart: findReportRequestByStart,
  findLatestSent: findLatestSentReportRequest,
  findEarliest: findEarliestReportRequest,
  findRecent: findRecentReportRequests,
  getOrCreate: getOrCreateReportRequest,
  markComputed: markReportRequestComputed,
  markOutcome: markReportRequestOutcome
};
