// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Generate a trace ID with "trc_" prefix. */
export function generateTraceId(): string {
  return `trc_${nanoid(21)}`;
}

/** Generate a request ID with "req_" prefix. */
export function generateRequestId(): string {
  return `req_${nanoid(21)}`;
}

/** Generate a generic unique ID. */
export function generateId(prefix?: string): string {
  const id = nanoid(16);
  return prefix ? `${prefix}_${id}` : id;
}
