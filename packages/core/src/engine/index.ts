// packages/core/src/engine -- Pattern loading, validation, templating and execution

export { EventBus } from './event-bus.js';
export { CancellationToken, CancellationError } from './cancellation.js';
export type { CancellationReason } from './cancellation.js';
export { PatternOrchestrator } from './pattern-orchestrator.js';
export type { PatternOrchestratorOptions } from './pattern-orchestrator.js';
export {
  PatternCatalog,
  listPatternFiles,
  parsePatternDocument,
  patternDocumentSchema,
  readPatternFile,
} from './pattern-loader.js';
export type { LoadReport, PatternDocument } from './pattern-loader.js';
export { applyInputDefaults, matchesInputType, validatePattern } from './pattern-validator.js';
export type { ValidateOptions } from './pattern-validator.js';
export {
  extractTemplateReferences,
  isTemplate,
  referenceRoot,
  resolveArgs,
  resolvePath,
  resolveValue,
  splitPath,
} from './template.js';
export type { TemplateScope } from './template.js';
export {
  ConditionSyntaxError,
  conditionReferences,
  evaluateCondition,
  isTruthy,
  parseCondition,
} from './condition.js';
export type { CompareOp, ConditionNode } from './condition.js';
export { detectOutputSpec, extractOutputs, outputKeys } from './outputs.js';
export type { ExtractedOutputs } from './outputs.js';
export { REDACTED, TraceBuilder, stripMetadata, summarizeProvenance } from './trace.js';
export type { TraceBuilderOptions } from './trace.js';
export { PhaseTransitionError, RunLifecycle } from './run-lifecycle.js';
