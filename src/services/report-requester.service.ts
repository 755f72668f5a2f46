import https from 'https';
import axios, { AxiosInstance, isAxiosError } from 'axios';
import {
  ReportRequestPayload,
  ReportRequester,
  ReportSendResult,
  ReportServiceBody
} from '@/types/report.types';
import { RequestFailedError, errorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';

export interface ReportRequesterOptions {
  url: string;
  timeoutMs: number;
  verifyTls: boolean;
}

export const buildReportBody = (payload: ReportRequestPayload): ReportServiceBody => ({
  energy_kwh: payload.energy_value,
  interval_start: payload.interval.start.toISOString(),
  interval_end: payload.interval.end.toISOString(),
  email_address: payload.email_address,
  latitude: payload.gps_location.latitude,
  longitude: payload.gps_location.longitude,
});

/**
 * Maps a failed call to the report service onto a RequestFailedError. Client
 * errors (4xx other than 408/429) will not clear by themselves; everything
 * else, timeouts and dropped connections included, may.
 */
export const classifyRequestError = (error: unknown): RequestFailedError => {
  if (error instanceof RequestFailedError) {
    return error;
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      return new RequestFailedError(`Report service unreachable: ${error.message}`, true);
    }
    const retryable = !(status >= 400 && status < 500) || status === 408 || status === 429;
    return new RequestFailedError(`Report service responded with HTTP ${status}`, retryable, status);
  }

  return new RequestFailedError(`Report request failed: ${errorMessage(error)}`, true);
};

export const createReportHttpClient = (options: ReportRequesterOptions): AxiosInstance =>
  axios.create({
    timeout: options.timeoutMs,
    headers: { 'Content-Type': 'application/json' },
    httpsAgent: new https.Agent({ rejectUnauthorized: options.verifyTls }),
  });

/**
 * POSTs one report request. Never rejects: every failure comes back as
 * `{ success: false }` with its retry classification.
 */
export const sendReportRequest = async (
  http: AxiosInstance,
  url: string,
  payload: ReportRequestPayload
): Promise<ReportSendResult> => {
  const body = buildReportBody(payload);

  logger.debug('Sending energy figure to report service...', {
    service: 'report-requester',
    url,
    interval_start: body.interval_start,
    energy_kwh: body.energy_kwh
  });

  try {
    const response = await http.post<unknown>(url, body);

    if (response.status !== 200) {
      throw new RequestFailedError(`Report service answered HTTP ${response.status}`, true, response.status);
    }

    logger.debug(`Report service response: ${JSON.stringify(response.data)}`);
    return { success: true, status_code: response.status };
  } catch (error) {
    const failure = classifyRequestError(error);
    return {
      success: false,
      retryable: failure.retryable,
      status_code: failure.status_code,
      error: failure.message
    };
  }
};

export const createReportRequester = (
  options: ReportRequesterOptions,
  http: AxiosInstance = createReportHttpClient(options)
): ReportRequester => ({
  send: (payload: ReportRequestPayload) => sendReportRequest(http, options.url, payload)
});
