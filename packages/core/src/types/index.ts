// packages/core/src/types/index.ts -- barrel re-export

export type {
  RetryConfig,
  CircuitBreakerConfig,
  CacheConfig,
  ValidationConfig,
  TemplateConfig,
  TraceConfig,
  ExecutionConfig,
  HistoryConfig,
  EngineConfig,
} from './config.js';

export type { RequestCtx, RequestCtxInit, PatternInputs, RunState } from './context.js';

export type {
  CapabilityArgs,
  CallContext,
  CapabilityRun,
  CapabilityParam,
  CapabilityMethod,
  CapabilityTable,
  CapabilityHandler,
  RegisterOptions,
  CapabilityBinding,
  InvocationMeta,
  InvocationFailure,
  InvocationOutcome,
} from './capability.js';

export type {
  InputType,
  InputDeclaration,
  StepSpec,
  PanelDeclaration,
  OutputSpec,
  WorkflowSpec,
  PatternSummary,
  PatternMetadata,
} from './workflow.js';

export type {
  ValidationIssueCode,
  ValidationSeverity,
  ValidationMode,
  ValidationIssue,
  CapabilityCheck,
  ValidationResult,
} from './validation.js';

export type {
  ResultMetadata,
  ResultProvenance,
  SucceededTraceStep,
  FailedTraceStep,
  SkippedTraceStep,
  TraceStep,
  StalenessEntry,
  ProvenanceOverall,
  ProvenanceSummary,
  CacheStats,
  TraceSnapshot,
} from './trace.js';

export type { RunPhase, RunError, RunResult, RunOptions } from './run.js';

export type {
  RunStartedEvent,
  RunPhaseEvent,
  RunCompletedEvent,
  RunAbortedEvent,
  ValidationIssueEvent,
  StepStartedEvent,
  StepRetryEvent,
  StepCompletedEvent,
  StepSkippedEvent,
  StepFailedEvent,
  EngineEvent,
} from './events.js';

export type {
  RecordedRunStatus,
  RunRecord,
  RunSummaryRecord,
  RunListFilter,
  CapabilityStats,
} from './history.js';
