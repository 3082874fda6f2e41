// packages/core/src/types/events.ts

/**
 * Engine events emitted by the orchestrator and consumed by the CLI.
 * Type names are dot-separated; `timestamp` is filled in by the event bus when left empty.
 */

import type { FailureCode } from '../utils/errors.js';
import type { RunError, RunPhase } from './run.js';
import type { ValidationIssue } from './validation.js';

// -- Run lifecycle --
export interface RunStartedEvent {
  type: 'run.started';
  patternId: string;
  traceId: string;
  requestId: string;
  stepCount: number;
  timestamp: string;
}

export interface RunPhaseEvent {
  type: 'run.phase';
  patternId: string;
  traceId: string;
  from: RunPhase;
  to: RunPhase;
  timestamp: string;
}

export interface RunCompletedEvent {
  type: 'run.completed';
  patternId: string;
  traceId: string;
  outputKeys: string[];
  durationMs: number;
  timestamp: string;
}

export interface RunAbortedEvent {
  type: 'run.aborted';
  patternId: string;
  traceId: string;
  error: RunError;
  timestamp: string;
}

export interface ValidationIssueEvent {
  type: 'validation.issue';
  patternId: string;
  issue: ValidationIssue;
  timestamp: string;
}

// -- Step events --
export interface StepStartedEvent {
  type: 'step.started';
  traceId: string;
  index: number;
  capability: string;
  as: string;
  timestamp: string;
}

export interface StepRetryEvent {
  type: 'step.retry';
  traceId: string;
  index: number;
  capability: string;
  attempt: number;
  delayMs: number;
  error: string;
  timestamp: string;
}

export interface StepCompletedEvent {
  type: 'step.completed';
  traceId: string;
  index: number;
  capability: string;
  as: string;
  handlerId: string | null;
  durationMs: number;
  attempts: number;
  cached: boolean;
  timestamp: string;
}

export interface StepSkippedEvent {
  type: 'step.skipped';
  traceId: string;
  index: number;
  capability: string;
  reason: 'condition_not_met';
  timestamp: string;
}

export interface StepFailedEvent {
  type: 'step.failed';
  traceId: string;
  index: number;
  capability: string;
  code: FailureCode;
  error: string;
  retriesExhausted: boolean;
  timestamp: string;
}

// -- Union type --
export type EngineEvent =
  | RunStartedEvent
  | RunPhaseEvent
  | RunCompletedEvent
  | RunAbortedEvent
  | ValidationIssueEvent
  | StepStartedEvent
  | StepRetryEvent
  | StepCompletedEvent
  | StepSkippedEvent
  | StepFailedEvent;
