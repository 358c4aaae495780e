// Database
export { pool, connectDatabase, closeDatabase } from './db/connection';
export { migrate, rollback } from './db/migrate';
export { PgUnitOfWork } from './db/unit-of-work';
export type { TransactionContext, UnitOfWork } from './db/unit-of-work';

// Config
export { appConfig, emailConfig, loggingConfig } from './config/app.config';
export { dbConfig } from './config/database.config';
