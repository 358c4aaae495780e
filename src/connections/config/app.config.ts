import dotenv from 'dotenv';

dotenv.config();

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

const nodeEnv = process.env.NODE_ENV || 'development';

export const appConfig = {
  port: parseInt(process.env.APP_PORT || process.env.PORT || '3000'),
  nodeEnv,
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:5173',
  corsOrigins: parseCorsOrigins(),
};

export const emailConfig = {
  host: process.env.SMTP_HOST || 'smtp.gmail.com',
  port: parseInt(process.env.SMTP_PORT || '587'),
  user: process.env.SMTP_USER || '',
  pass: process.env.SMTP_PASS || '',
  from: process.env.MAIL_FROM || process.env.SMTP_USER || '',
};

export const loggingConfig = {
  level: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  dir: process.env.LOG_DIR || 'logs',
  // Files are off under test so suites never touch the disk
  toFile: parseBoolean(process.env.LOG_TO_FILE, nodeEnv !== 'test'),
  silent: nodeEnv === 'test' && !parseBoolean(process.env.LOG_IN_TESTS, false),
  rotation: process.env.LOG_ROTATION || '10MB',
  retention: process.env.LOG_RETENTION || '30d',
};
