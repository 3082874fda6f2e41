// packages/core/src/types/capability.ts

import type { CancellationToken } from '../engine/cancellation.js';
import type { FailureCode } from '../utils/errors.js';
import type { RequestCtx, RunState } from './context.js';

/** Resolved step arguments as handed to a capability. */
export type CapabilityArgs = Record<string, unknown>;

/** Per-call information passed alongside the resolved arguments. */
export interface CallContext {
  readonly capability: string;
  readonly handlerId: string;
  /** 1-based attempt number */
  readonly attempt: number;
  readonly cancellation: CancellationToken;
  readonly signal: AbortSignal;
}

export type CapabilityRun<A> = (
  ctx: RequestCtx,
  state: RunState,
  args: A,
  call: CallContext,
) => unknown;

export interface CapabilityParam {
  name: string;
  required: boolean;
}

/**
 * Type-erased capability method stored in the registry.
 * Build these with `capability()`, which keeps the typed argument signature at the definition site.
 */
export interface CapabilityMethod {
  readonly description?: string;
  /** Declared parameters, when the method carries an object schema */
  readonly params?: readonly CapabilityParam[];
  execute(ctx: RequestCtx, state: RunState, args: CapabilityArgs, call: CallContext): Promise<unknown>;
}

export type CapabilityTable = Readonly<Record<string, CapabilityMethod>>;

/** A named object exposing one or more capabilities. */
export interface CapabilityHandler {
  readonly id: string;
  capabilities(): CapabilityTable;
}

export interface RegisterOptions {
  /** Let a later registration take over an existing capability name */
  allowDualRegistration?: boolean;
}

export interface CapabilityBinding {
  capability: string;
  handlerId: string;
  method: CapabilityMethod;
  /** Registration order across the whole registry */
  sequence: number;
  /** False for bindings displaced by a dual registration (kept for listing only) */
  active: boolean;
}

export interface InvocationMeta {
  capability: string;
  handlerId: string | null;
  elapsedMs: number;
  attempts: number;
  cached: boolean;
}

export interface InvocationFailure {
  code: FailureCode;
  message: string;
  cause?: unknown;
}

export type InvocationOutcome =
  | { ok: true; payload: unknown; meta: InvocationMeta }
  | { ok: false; failure: InvocationFailure; meta: InvocationMeta };
