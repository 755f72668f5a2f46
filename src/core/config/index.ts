import dotenv from 'dotenv';

dotenv.config();

// Read before the application config so the logger exists while that is validated
const Config = {
  ALERT_WEBHOOK_URL: process.env.ALERT_WEBHOOK_URL,
  ENABLE_WEBHOOK_ALERTS: process.env.ENABLE_WEBHOOK_ALERTS === 'true',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  LOG_DIR: process.env.LOG_DIR || 'logs',
};

export default Config;
