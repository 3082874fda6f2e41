// packages/core/src/memory/index.ts -- barrel re-export

export { openDatabase, runMigrations, getSchemaVersion } from './database.js';
export { RunStore } from './run-store.js';
