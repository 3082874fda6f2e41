// packages/core/src/context/index.ts -- barrel re-export

export { createRequestCtx, deriveRequestCtx, describeRequestCtx } from './request-ctx.js';
