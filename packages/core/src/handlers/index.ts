// packages/core/src/handlers/index.ts -- barrel re-export

export { DIAGNOSTICS_HANDLER_ID, diagnosticsHandler } from './diagnostics.js';
