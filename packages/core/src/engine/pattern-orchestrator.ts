// packages/core/src/engine/pattern-orchestrator.ts — Runs patterns step by step against the capability runtime

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { RequestCache } from '../runtime/request-cache.js';
import type { CapabilityRuntime } from '../runtime/capability-runtime.js';
import type { EngineConfig } from '../types/config.js';
import type { PatternInputs, RequestCtx, RunState } from '../types/context.js';
import type { RunError, RunOptions, RunResult } from '../types/run.js';
import type { ValidationIssue, ValidationMode, ValidationResult } from '../types/validation.js';
import type { PatternMetadata, PatternSummary, StepSpec, WorkflowSpec } from '../types/workflow.js';
import { REQUIRED_CONTEXT_PATHS } from '../utils/constants.js';
import type { FailureCode } from '../utils/errors.js';
import { RequiredContextMissingError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { CancellationToken } from './cancellation.js';
import { conditionReferences, evaluateCondition } from './condition.js';
import { EventBus } from './event-bus.js';
import { extractOutputs, outputKeys } from './outputs.js';
import type { PatternCatalog } from './pattern-loader.js';
import { applyInputDefaults, validatePattern } from './pattern-validator.js';
import { RunLifecycle } from './run-lifecycle.js';
import { extractTemplateReferences, referenceRoot, resolveArgs } from './template.js';
import type { TemplateScope } from './template.js';
import { TraceBuilder } from './trace.js';

export interface PatternOrchestratorOptions {
  runtime: CapabilityRuntime;
  catalog: PatternCatalog;
  config?: EngineConfig;
  logger?: Logger;
}

/** Everything one run owns. Nothing here is shared with another run. */
interface RunContext {
  spec: WorkflowSpec;
  ctx: RequestCtx;
  state: RunState;
  scope: TemplateScope;
  trace: TraceBuilder;
  token: CancellationToken;
  cache: RequestCache;
  strict: boolean;
  /** Step being executed, for errors raised outside the step's own handling */
  current: { index: number; step: StepSpec } | null;
}

/**
 * Interprets pattern specs: validates, executes steps strictly in declared order,
 * threads the request context through every call and extracts declared outputs.
 * `run` does not reject: failures, unexpected errors included, come back as an aborted result
 * carrying the trace gathered so far.
 */
export class PatternOrchestrator extends EventBus {
  private runtime: CapabilityRuntime;
  private catalog: PatternCatalog;
  private config: EngineConfig;
  private logger: Logger;

  constructor(options: PatternOrchestratorOptions) {
    super();
    this.runtime = options.runtime;
    this.catalog = options.catalog;
    this.config = options.config ?? DEFAULT_CONFIG;
    this.logger = options.logger ?? silentLogger;
  }

  listPatterns(): PatternSummary[] {
    return this.catalog.list();
  }

  getPatternMetadata(patternId: string): PatternMetadata | undefined {
    return this.catalog.getMetadata(patternId);
  }

  /** Static checks without executing anything. Undefined when the pattern is unknown. */
  validate(
    patternId: string,
    inputs?: PatternInputs,
    options: Pick<RunOptions, 'strictDependencies'> = {},
  ): ValidationResult | undefined {
    const spec = this.catalog.get(patternId);
    if (!spec) return undefined;
    return validatePattern(spec, this.runtime.registry, {
      inputs: inputs ? applyInputDefaults(spec, inputs) : undefined,
      strictDependencies: options.strictDependencies ?? this.config.validation.strictDependencies,
    });
  }

  async run(
    patternId: string,
    inputs: PatternInputs,
    ctx: RequestCtx,
    options: RunOptions = {},
  ): Promise<RunResult> {
    const traceOptions = {
      redactKeys: this.config.trace.redactKeys,
      maxStringLength: this.config.trace.maxStringLength,
    };
    const spec = this.catalog.get(patternId);
    if (!spec) {
      const trace = new TraceBuilder(patternId, ctx, traceOptions);
      const error = runError({ step: null, capability: null }, 'PatternNotFound', `Pattern not found: ${patternId}`);
      this.logger.error(error.detail);
      this.emitEvent({ type: 'run.aborted', patternId, traceId: ctx.traceId, error, timestamp: '' });
      return { status: 'aborted', error, trace: trace.snapshot('aborted') };
    }

    // Registration is over once the first pattern runs.
    this.runtime.registry.seal();

    const lifecycle = new RunLifecycle((from, to) => {
      this.logger.debug(`${patternId} [${ctx.traceId}] ${from} -> ${to}`);
      this.emitEvent({ type: 'run.phase', patternId, traceId: ctx.traceId, from, to, timestamp: '' });
    });

    const token = CancellationToken.withDeadline(
      options.deadlineMs ?? this.config.execution.deadlineMs,
      options.cancellation,
    );
    const state: RunState = { inputs: applyInputDefaults(spec, inputs) };
    const run: RunContext = {
      spec,
      ctx,
      state,
      scope: {
        ctx,
        state,
        requiredPaths: [...REQUIRED_CONTEXT_PATHS, ...this.config.templates.additionalRequiredPaths],
      },
      trace: new TraceBuilder(patternId, ctx, traceOptions),
      token,
      cache: new RequestCache(ctx.requestId),
      strict: options.strictDependencies ?? this.config.validation.strictDependencies,
      current: null,
    };

    this.emitEvent({
      type: 'run.started',
      patternId,
      traceId: ctx.traceId,
      requestId: ctx.requestId,
      stepCount: spec.steps.length,
      timestamp: '',
    });
    this.logger.info(`Running pattern ${patternId} [${ctx.traceId}]`);

    try {
      lifecycle.transition('validating');
      const blocking = this.checkPattern(run, options.validationMode ?? this.config.validation.mode);
      if (blocking) {
        const at = { step: blocking.step ?? null, capability: blocking.capability ?? null };
        return this.abort(run, lifecycle, runError(at, 'ValidationFailed', blocking.message));
      }

      lifecycle.transition('executing');
      for (const [index, step] of spec.steps.entries()) {
        run.current = { index, step };
        const error = await this.executeStep(run, index, step);
        if (error) {
          return this.abort(run, lifecycle, error);
        }
      }
      run.current = null;

      lifecycle.transition('extracting');
      const { outputs } = extractOutputs(spec.outputs, state, this.logger);
      lifecycle.transition('done');

      const trace = run.trace.snapshot('completed', run.cache.stats());
      this.emitEvent({
        type: 'run.completed',
        patternId,
        traceId: ctx.traceId,
        outputKeys: spec.outputs.kind === 'panels' ? ['panels'] : outputKeys(spec.outputs),
        durationMs: trace.durationMs,
        timestamp: '',
      });
      this.logger.info(`Pattern ${patternId} completed in ${trace.durationMs}ms`);
      return { status: 'completed', outputs, trace };
    } catch (error) {
      const { current } = run;
      const at = current
        ? { step: current.index, capability: current.step.capability }
        : { step: null, capability: null };
      const failure = runError(at, 'InternalError', errorMessage(error));
      if (current && !run.trace.steps.some((entry) => entry.index === current.index)) {
        run.trace.recordFailure(current.index, current.step, traceFailure(failure));
      }
      return this.abort(run, lifecycle, failure);
    } finally {
      token.dispose();
    }
  }

  /** Run validation, report every issue, and return the first blocking one if any. */
  private checkPattern(run: RunContext, mode: ValidationMode): ValidationIssue | undefined {
    const { spec } = run;
    const result = validatePattern(spec, this.runtime.registry, {
      inputs: run.state.inputs,
      strictDependencies: run.strict,
    });

    for (const issue of [...result.errors, ...result.warnings]) {
      const where = issue.step !== undefined ? ` (step ${issue.step})` : '';
      const line = `${spec.id}${where}: ${issue.code}: ${issue.message}`;
      if (issue.severity === 'error') {
        this.logger.warn(line);
      } else {
        this.logger.debug(line);
      }
      this.emitEvent({ type: 'validation.issue', patternId: spec.id, issue, timestamp: '' });
    }

    const blockingCodes = this.config.validation.blockingCodes;
    return result.errors.find((issue) => mode === 'enforce' || blockingCodes.includes(issue.code));
  }

  /** Execute one step. Returns the abort error, or null when the run may continue. */
  private async executeStep(run: RunContext, index: number, step: StepSpec): Promise<RunError | null> {
    const { ctx, state, scope, trace, token } = run;
    const fail = (error: RunError): RunError => {
      trace.recordFailure(index, step, traceFailure(error));
      this.emitStepFailed(ctx.traceId, index, step, error);
      return error;
    };
    const at = { step: index, capability: step.capability };

    if (token.isCancelled) {
      const { code, detail } = cancellationError(token);
      return fail(runError(at, code, detail));
    }

    let args: Record<string, unknown>;
    try {
      if (!evaluateCondition(step.condition, scope, this.logger)) {
        trace.recordSkip(index, step);
        this.emitEvent({
          type: 'step.skipped',
          traceId: ctx.traceId,
          index,
          capability: step.capability,
          reason: 'condition_not_met',
          timestamp: '',
        });
        return null;
      }

      // Only steps that run are checked.
      const missing = run.strict ? this.undeclaredDependency(run.spec, index, step) : undefined;
      if (missing) {
        return fail(
          runError(at, 'UnresolvedDependency', `Step ${index} reads "${missing}" before any earlier step declares it`),
        );
      }
      args = resolveArgs(step.args, scope);
    } catch (error) {
      const code = error instanceof RequiredContextMissingError ? 'RequiredContextMissing' : 'InternalError';
      return fail(runError(at, code, errorMessage(error)));
    }

    this.emitEvent({
      type: 'step.started',
      traceId: ctx.traceId,
      index,
      capability: step.capability,
      as: step.as,
      timestamp: '',
    });

    const outcome = await this.runtime.invoke(step.capability, ctx, state, args, {
      cancellation: token,
      cache: this.config.cache.enabled ? run.cache : undefined,
      onRetry: (attempt, error, delayMs) => {
        this.emitEvent({
          type: 'step.retry',
          traceId: ctx.traceId,
          index,
          capability: step.capability,
          attempt,
          delayMs,
          error: errorMessage(error),
          timestamp: '',
        });
      },
    });

    if (!outcome.ok) {
      const error = runError(at, outcome.failure.code, outcome.failure.message);
      trace.recordFailure(index, step, outcome.failure, outcome.meta, args);
      this.emitStepFailed(ctx.traceId, index, step, error);
      return error;
    }

    state[step.as] = trace.recordSuccess(index, step, args, outcome.payload, outcome.meta);
    this.emitEvent({
      type: 'step.completed',
      traceId: ctx.traceId,
      index,
      capability: step.capability,
      as: step.as,
      handlerId: outcome.meta.handlerId,
      durationMs: outcome.meta.elapsedMs,
      attempts: outcome.meta.attempts,
      cached: outcome.meta.cached,
      timestamp: '',
    });
    return null;
  }

  /** First reference root that no earlier step declares as its result key. */
  private undeclaredDependency(spec: WorkflowSpec, index: number, step: StepSpec): string | undefined {
    const declared = new Set(['ctx', 'inputs', ...spec.steps.slice(0, index).map((s) => s.as)]);
    const refs = [...extractTemplateReferences(step.args), ...conditionReferences(step.condition)];
    return refs.map(referenceRoot).find((root) => !declared.has(root));
  }

  private emitStepFailed(traceId: string, index: number, step: StepSpec, error: RunError): void {
    this.logger.error(`Step ${index} (${step.capability}) failed: ${error.code}: ${error.detail}`);
    this.emitEvent({
      type: 'step.failed',
      traceId,
      index,
      capability: step.capability,
      code: error.code,
      error: error.detail,
      retriesExhausted: error.code === 'RetryExhausted',
      timestamp: '',
    });
  }

  private abort(run: RunContext, lifecycle: RunLifecycle, error: RunError): RunResult {
    // Output extraction can fail after EXECUTING; the result is aborted all the same.
    if (lifecycle.canTransition('aborted')) lifecycle.transition('aborted');
    const trace = run.trace.snapshot('aborted', run.cache.stats());
    this.logger.error(`Pattern ${run.spec.id} aborted: ${error.code}: ${error.detail}`);
    this.emitEvent({
      type: 'run.aborted',
      patternId: run.spec.id,
      traceId: run.ctx.traceId,
      error,
      timestamp: '',
    });
    return { status: 'aborted', error, trace };
  }
}

/** `message` carries the failure code; the human-readable text goes in `detail`. */
function runError(at: Pick<RunError, 'step' | 'capability'>, code: FailureCode, detail: string): RunError {
  return { ...at, code, message: code, detail };
}

function traceFailure(error: RunError): { code: FailureCode; message: string } {
  return { code: error.code, message: error.detail };
}

function cancellationError(token: CancellationToken): { code: FailureCode; detail: string } {
  return token.reason === 'deadline'
    ? { code: 'DeadlineExceeded', detail: 'Invocation deadline exceeded' }
    : { code: 'Cancelled', detail: 'Invocation was cancelled' };
}
