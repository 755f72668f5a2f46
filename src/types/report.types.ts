import { Interval } from './report-request.types';

export interface GpsLocation {
  latitude: number;
  longitude: number;
}

export interface ReportRequestPayload {
  energy_value: number;
  interval: Interval;
  email_address: string;
  gps_location: GpsLocation;
}

export type ReportSendResult =
  | { success: true; status_code: number }
  | { success: false; retryable: boolean; status_code?: number; error: string };

export interface ReportRequester {
  send(payload: ReportRequestPayload): Promise<ReportSendResult>;
}

// Body accepted by the report web service
export interface ReportServiceBody {
  energy_kwh: number;
  interval_start: string;
  interval_end: string;
  email_address: string;
  latitude: number;
  longitude: number;
}
