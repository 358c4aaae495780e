import type { PoolConfig } from 'pg';
import './app.config';

const buildDbConfig = (): PoolConfig => {
  const max = parseInt(process.env.DB_POOL_MAX || '10');
  const idleTimeoutMillis = parseInt(process.env.DB_IDLE_TIMEOUT_MS || '30000');

  if (process.env.DATABASE_URL) {
    return {
      connectionString: process.env.DATABASE_URL,
      max,
      idleTimeoutMillis,
    };
  }

  return {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432'),
    database: process.env.DB_NAME || 'commerce',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || '',
    max,
    idleTimeoutMillis,
  };
};

export const dbConfig = buildDbConfig();
