import dotenv from 'dotenv';

dotenv.config();

export const APPLICATION_NAME = 'Energy_Consumption_Report';

export const DEFAULTS = {
  PORT: 3000,
  LOG_LEVEL: 'info',
  MONGODB_URI: 'mongodb://localhost:27017/energy-reports',

  INFLUXDB_PROTOCOL: 'http',
  INFLUXDB_HOST: 'influxdb',
  INFLUXDB_PORT: 8086,
  INFLUXDB_DATABASE: 'Emon',
  INFLUXDB_USERNAME: 'root',
  INFLUXDB_PASSWORD: 'root',

  MEASUREMENT_TS: 'emontx3',
  PULSE_FIELD: 'pulse',
  PULSES_PER_KWH: 1000,
  MAX_POWER_WATTS: 15000,

  REPORTING_INTERVAL: 60 * 60 * 24,     // seconds
  REQUEST_TIMEOUT: 30000,               // ms
  MAX_BACKLOG_PER_TICK: 10,
  SCHEDULER_CRON: '*/5 * * * *',

  WEB_SERVER_URL: 'https://reports.example.com/get_report',
  EMAIL_ADDRESS: 'username@example.com',
  GPS_LOCATION: '0.0,0.0',
} as const;

export const LEDGER_CONFIG = {
  COLLECTION: 'report_requests',
  DUPLICATE_KEY_CODE: 11000,
  DEFAULT_LIST_LIMIT: 20,
  MAX_LIST_LIMIT: 500,
} as const;
