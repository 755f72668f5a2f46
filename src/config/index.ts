import dotenv from 'dotenv';
import cron from 'node-cron';
import { ConfigurationError } from '@/utils/errors';
import { DEFAULTS } from './constants';
import { GpsLocation } from '@/types/report.types';

dotenv.config();

type Env = Record<string, string | undefined>;

export interface AppConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  LOG_LEVEL: string;
  MONGODB_URI: string;
  INFLUXDB: {
    PROTOCOL: 'http' | 'https';
    HOST: string;
    PORT: number;
    DATABASE: string;
    USERNAME: string;
    PASSWORD: string;
  };
  MEASUREMENT_TS: string;
  PULSE_FIELD: string;
  PULSES_PER_KWH: number;
  MAX_POWER_WATTS: number;
  REPORTING_INTERVAL_MS: number;
  REPORTING_START?: Date;
  REQUEST_TIMEOUT: number;
  MAX_BACKLOG_PER_TICK: number;
  SCHEDULER_CRON: string;
  WEB_SERVER_URL: string;
  EMAIL_ADDRESS: string;
  GPS_LOCATION: GpsLocation;
  VERIFY_TLS: boolean;
  ALLOWED_ORIGINS?: string[];
}

export const LOG_LEVELS = ['error', 'warn', 'notify', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

function validateEnvironmentVariable(name: string, value: string | undefined, fallback?: string): string {
  if (value === undefined) {
    if (fallback === undefined) {
      throw new ConfigurationError(`Required environment variable ${name} is not set`);
    }
    return fallback;
  }

  if (value.trim() === '') {
    throw new ConfigurationError(`Environment variable ${name} cannot be empty`);
  }

  return value.trim();
}

function validateNumericEnvironmentVariable(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }

  const numericValue = Number(value);

  if (value.trim() === '' || Number.isNaN(numericValue)) {
    throw new ConfigurationError(`Environment variable ${name} must be a valid number, got: ${value}`);
  }

  if (numericValue <= 0) {
    throw new ConfigurationError(`Environment variable ${name} must be a positive number, got: ${numericValue}`);
  }

  return numericValue;
}

function validateIntegerEnvironmentVariable(name: string, value: string | undefined, fallback: number): number {
  const numericValue = validateNumericEnvironmentVariable(name, value, fallback);
  if (!Number.isInteger(numericValue)) {
    throw new ConfigurationError(`Environment variable ${name} must be an integer, got: ${numericValue}`);
  }
  return numericValue;
}

/**
 * Parses a boolean the way operators tend to write them in .env files.
 */
export function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['true', 't', '1', 'yes', 'y'].includes(normalized)) {
    return true;
  }
  if (['false', 'f', '0', 'no', 'n'].includes(normalized)) {
    return false;
  }
  throw new ConfigurationError(`"${value}" is not a valid boolean value for ${name}`);
}

/**
 * Parses "latitude,longitude".
 */
export function parseGpsLocation(value: string): GpsLocation {
  const parts = value.split(',').map(part => part.trim());
  if (parts.length !== 2 || parts.some(part => part === '')) {
    throw new ConfigurationError(`GPS_LOCATION must be "latitude,longitude", got: ${value}`);
  }

  const [latitude, longitude] = parts.map(Number);
  if (Number.isNaN(latitude) || latitude < -90 || latitude > 90) {
    throw new ConfigurationError(`GPS_LOCATION latitude must be between -90 and 90, got: ${parts[0]}`);
  }
  if (Number.isNaN(longitude) || longitude < -180 || longitude > 180) {
    throw new ConfigurationError(`GPS_LOCATION longitude must be between -180 and 180, got: ${parts[1]}`);
  }

  return { latitude, longitude };
}

function parseNodeEnv(value: string): AppConfig['NODE_ENV'] {
  if (value === 'development' || value === 'production' || value === 'test') {
    return value;
  }
  throw new ConfigurationError(`NODE_ENV must be one of: development, production, test. Got: ${value}`);
}

function parseProtocol(value: string): AppConfig['INFLUXDB']['PROTOCOL'] {
  if (value === 'http' || value === 'https') {
    return value;
  }
  throw new ConfigurationError(`INFLUXDB_PROTOCOL must be http or https. Got: ${value}`);
}

function parseAllowedOrigins(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const origins = value.split(',').map(origin => origin.trim()).filter(origin => origin !== '');
  return origins.length > 0 ? origins : undefined;
}

function parseReportingStart(value: string | undefined): Date | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const start = new Date(value);
  if (Number.isNaN(start.getTime())) {
    throw new ConfigurationError(`REPORTING_START must be an ISO-8601 instant, got: ${value}`);
  }
  return start;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    NODE_ENV: parseNodeEnv(validateEnvironmentVariable('NODE_ENV', env.NODE_ENV, 'development')),
    PORT: validateIntegerEnvironmentVariable('PORT', env.PORT, DEFAULTS.PORT),
    LOG_LEVEL: validateEnvironmentVariable('LOG_LEVEL', env.LOG_LEVEL, DEFAULTS.LOG_LEVEL),
    MONGODB_URI: validateEnvironmentVariable('MONGODB_URI', env.MONGODB_URI, DEFAULTS.MONGODB_URI),
    INFLUXDB: {
      PROTOCOL: parseProtocol(validateEnvironmentVariable('INFLUXDB_PROTOCOL', env.INFLUXDB_PROTOCOL, DEFAULTS.INFLUXDB_PROTOCOL)),
      HOST: validateEnvironmentVariable('INFLUXDB_HOST', env.INFLUXDB_HOST, DEFAULTS.INFLUXDB_HOST),
      PORT: validateIntegerEnvironmentVariable('INFLUXDB_PORT', env.INFLUXDB_PORT, DEFAULTS.INFLUXDB_PORT),
      DATABASE: validateEnvironmentVariable('INFLUXDB_DATABASE', env.INFLUXDB_DATABASE, DEFAULTS.INFLUXDB_DATABASE),
      USERNAME: validateEnvironmentVariable('INFLUXDB_USERNAME', env.INFLUXDB_USERNAME, DEFAULTS.INFLUXDB_USERNAME),
      PASSWORD: validateEnvironmentVariable('INFLUXDB_PASSWORD', env.INFLUXDB_PASSWORD, DEFAULTS.INFLUXDB_PASSWORD),
    },
    MEASUREMENT_TS: validateEnvironmentVariable('MEASUREMENT_TS', env.MEASUREMENT_TS, DEFAULTS.MEASUREMENT_TS),
    PULSE_FIELD: validateEnvironmentVariable('PULSE_FIELD', env.PULSE_FIELD, DEFAULTS.PULSE_FIELD),
    PULSES_PER_KWH: validateNumericEnvironmentVariable('PULSES_PER_KWH', env.PULSES_PER_KWH, DEFAULTS.PULSES_PER_KWH),
    MAX_POWER_WATTS: validateNumericEnvironmentVariable('MAX_POWER_WATTS', env.MAX_POWER_WATTS, DEFAULTS.MAX_POWER_WATTS),
    REPORTING_INTERVAL_MS: validateIntegerEnvironmentVariable('REPORTING_INTERVAL', env.REPORTING_INTERVAL, DEFAULTS.REPORTING_INTERVAL) * 1000,
    REPORTING_START: parseReportingStart(env.REPORTING_START),
    REQUEST_TIMEOUT: validateIntegerEnvironmentVariable('REQUEST_TIMEOUT', env.REQUEST_TIMEOUT, DEFAULTS.REQUEST_TIMEOUT),
    MAX_BACKLOG_PER_TICK: validateIntegerEnvironmentVariable('MAX_BACKLOG_PER_TICK', env.MAX_BACKLOG_PER_TICK, DEFAULTS.MAX_BACKLOG_PER_TICK),
    SCHEDULER_CRON: validateEnvironmentVariable('SCHEDULER_CRON', env.SCHEDULER_CRON, DEFAULTS.SCHEDULER_CRON),
    WEB_SERVER_URL: validateEnvironmentVariable('WEB_SERVER_URL', env.WEB_SERVER_URL, DEFAULTS.WEB_SERVER_URL),
    EMAIL_ADDRESS: validateEnvironmentVariable('EMAIL_ADDRESS', env.EMAIL_ADDRESS, DEFAULTS.EMAIL_ADDRESS),
    GPS_LOCATION: parseGpsLocation(validateEnvironmentVariable('GPS_LOCATION', env.GPS_LOCATION, DEFAULTS.GPS_LOCATION)),
    VERIFY_TLS: parseBoolean('VERIFY_TLS', env.VERIFY_TLS, true),
    ALLOWED_ORIGINS: parseAllowedOrigins(env.ALLOWED_ORIGINS),
  };

  if (!LOG_LEVELS.some(level => level === config.LOG_LEVEL)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}. Got: ${config.LOG_LEVEL}`);
  }

  if (config.PORT < 1 || config.PORT > 65535) {
    throw new ConfigurationError(`PORT must be between 1 and 65535. Got: ${config.PORT}`);
  }

  if (!config.WEB_SERVER_URL.startsWith('http')) {
    throw new ConfigurationError(`WEB_SERVER_URL must be a valid URL starting with http/https. Got: ${config.WEB_SERVER_URL}`);
  }

  if (!/^[^@\s]+@[^@\s]+$/.test(config.EMAIL_ADDRESS)) {
    throw new ConfigurationError(`EMAIL_ADDRESS is not a valid email address. Got: ${config.EMAIL_ADDRESS}`);
  }

  if (!cron.validate(config.SCHEDULER_CRON)) {
    throw new ConfigurationError(`SCHEDULER_CRON is not a valid cron expression. Got: ${config.SCHEDULER_CRON}`);
  }

  return config;
}

export { ConfigurationError };
