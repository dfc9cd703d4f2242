export * from './database.module.js';
export * from './database.service.js';
export * from './sql-executor.js';
