// packages/core/src/context/request-ctx.ts — Immutable per-invocation request context

import type { RequestCtx, RequestCtxInit } from '../types/context.js';
import { generateRequestId, generateTraceId } from '../utils/id.js';
import { deepFreeze } from '../utils/objects.js';

/**
 * Build a frozen RequestCtx. Missing trace and request ids are generated.
 * The reproducibility fields are not checked here; templates that read them are.
 */
export function createRequestCtx(init: RequestCtxInit = {}): RequestCtx {
  const createdAt =
    init.createdAt instanceof Date
      ? init.createdAt.toISOString()
      : (init.createdAt ?? new Date().toISOString());

  const ctx: RequestCtx = {
    pricingSnapshotId: init.pricingSnapshotId,
    ledgerReference: init.ledgerReference,
    traceId: init.traceId ?? generateTraceId(),
    requestId: init.requestId ?? generateRequestId(),
    createdAt,
    userId: init.userId,
    portfolioId: init.portfolioId,
    asOfDate: init.asOfDate,
    baseCurrency: init.baseCurrency ?? 'USD',
    attributes: structuredClone(init.attributes ?? {}),
  };
  return deepFreeze(ctx);
}

/** New frozen ctx with `patch` applied; `ctx` itself is left untouched. */
export function deriveRequestCtx(ctx: RequestCtx, patch: RequestCtxInit): RequestCtx {
  return createRequestCtx({
    ...describeRequestCtx(ctx),
    ...patch,
    attributes: { ...ctx.attributes, ...patch.attributes },
  });
}

/** Plain JSON view with absent optional fields dropped. */
export function describeRequestCtx(ctx: RequestCtx): RequestCtxInit & {
  traceId: string;
  requestId: string;
  createdAt: string;
} {
  const view: RequestCtxInit & { traceId: string; requestId: string; createdAt: string } = {
    traceId: ctx.traceId,
    requestId: ctx.requestId,
    createdAt: ctx.createdAt,
    baseCurrency: ctx.baseCurrency,
  };
  if (ctx.pricingSnapshotId !== undefined) view.pricingSnapshotId = ctx.pricingSnapshotId;
  if (ctx.ledgerReference !== undefined) view.ledgerReference = ctx.ledgerReference;
  if (ctx.userId !== undefined) view.userId = ctx.userId;
  if (ctx.portfolioId !== undefined) view.portfolioId = ctx.portfolioId;
  if (ctx.asOfDate !== undefined) view.asOfDate = ctx.asOfDate;
  if (Object.keys(ctx.attributes).length > 0) view.attributes = { ...ctx.attributes };
  return view;
}
