import { Request, Response, NextFunction } from 'express';
import { RequestLedger } from '@/services/request-ledger.service';
import { HttpError } from '@/middleware/errorHandler';
import { LEDGER_CONFIG } from '@/config/constants';
import { IReportRequest, Interval } from '@/types/report-request.types';

export const serializeRecord = (record: IReportRequest) => ({
  interval_start: record.interval_start.toISOString(),
  interval_end: record.interval_end.toISOString(),
  energy_value: record.energy_value,
  status: record.status,
  attempts: record.attempts,
  last_attempt_at: record.last_attempt_at ? record.last_attempt_at.toISOString() : null,
  last_error: record.last_error,
});

const serializeInterval = (interval: Interval) => ({
  start: interval.start.toISOString(),
  end: interval.end.toISOString(),
});

export const parseLimit = (raw: unknown): number => {
  if (raw === undefined) {
    return LEDGER_CONFIG.DEFAULT_LIST_LIMIT;
  }
  const limit = Number(raw);
  if (typeof raw !== 'string' || !Number.isInteger(limit) || limit < 1) {
    throw new HttpError(400, 'INVALID_LIMIT', 'limit must be a positive integer');
  }
  return Math.min(limit, LEDGER_CONFIG.MAX_LIST_LIMIT);
};

export const createReportController = (ledger: RequestLedger, clock: () => Date = () => new Date()) => {
  /**
   * Latest ledger records, newest interval first.
   */
  const listReports = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const limit = parseLimit(req.query.limit);
      const records = await ledger.listRecords(limit);
      res.status(200).json({
        success: true,
        data: records.map(serializeRecord)
      });
    } catch (error) {
      next(error);
    }
  };

  const getNextDue = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const interval = await ledger.nextDueInterval(clock());
      res.status(200).json({
        success: true,
        data: interval ? serializeInterval(interval) : null
      });
    } catch (error) {
      next(error);
    }
  };

  const getReport = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const intervalStart = new Date(req.params.intervalStart);
      if (Number.isNaN(intervalStart.getTime())) {
        throw new HttpError(400, 'INVALID_INTERVAL', 'intervalStart must be an ISO-8601 instant');
      }

      const record = await ledger.findRecord(intervalStart);
      if (!record) {
        throw new HttpError(404, 'NOT_FOUND', 'No report request for this interval');
      }

      res.status(200).json({
        success: true,
        data: serializeRecord(record)
      });
    } catch (error) {
      next(error);
    }
  };

  return { listReports, getNextDue, getReport };
};
