import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { createRequestCtx } from '../../../src/context/request-ctx.js';
import { PatternCatalog } from '../../../src/engine/pattern-loader.js';
import { PatternOrchestrator } from '../../../src/engine/pattern-orchestrator.js';
import { diagnosticsHandler } from '../../../src/handlers/diagnostics.js';
import { CapabilityRegistry } from '../../../src/runtime/capability-registry.js';
import { CapabilityRuntime } from '../../../src/runtime/capability-runtime.js';

const PATTERNS_DIR = fileURLToPath(new URL('../../../../../patterns/', import.meta.url));

const ctx = createRequestCtx({
  pricingSnapshotId: 'PP_2025_02',
  ledgerReference: 'LEDGER_9',
  traceId: 'trc_bundled',
  requestId: 'req_bundled',
});

function setup() {
  const registry = new CapabilityRegistry();
  registry.registerHandler(diagnosticsHandler);
  const catalog = new PatternCatalog(PATTERNS_DIR);
  const report = catalog.loadAll();
  const orchestrator = new PatternOrchestrator({ runtime: new CapabilityRuntime(registry), catalog });
  return { orchestrator, report };
}

describe('bundled patterns', () => {
  it('all load', () => {
    const { report } = setup();
    expect(report.skipped).toEqual([]);
    expect([...report.loaded].sort()).toEqual(['context_report', 'echo_once', 'overview_dashboard']);
  });

  it('echo_once returns the default input', async () => {
    const { orchestrator } = setup();
    const result = await orchestrator.run('echo_once', {}, ctx);
    expect(result).toMatchObject({ status: 'completed', outputs: { r1: { value: 5 } } });
  });

  it('context_report interpolates the request context and skips details by default', async () => {
    const { orchestrator } = setup();
    const result = await orchestrator.run('context_report', {}, ctx);

    expect(result.status).toBe('completed');
    if (result.status !== 'completed') return;
    expect(result.outputs).toEqual({
      snapshot: { pricing: 'PP_2025_02', ledger: 'LEDGER_9', label: 'Snapshot PP_2025_02 for USD' },
      details: null,
    });
    expect(result.trace.steps.map((s) => s.status)).toEqual(['succeeded', 'succeeded', 'skipped']);
  });

  it('context_report aborts without a pricing snapshot', async () => {
    const { orchestrator } = setup();
    const result = await orchestrator.run('context_report', {}, createRequestCtx({ ledgerReference: 'LEDGER_9' }));
    expect(result).toMatchObject({
      status: 'aborted',
      error: { step: 1, code: 'RequiredContextMissing' },
    });
  });

  it('overview_dashboard returns its panels as declared', async () => {
    const { orchestrator } = setup();
    const result = await orchestrator.run('overview_dashboard', {}, ctx);
    expect(result).toMatchObject({
      status: 'completed',
      outputs: {
        panels: [
          { id: 'heading', type: 'text', source: 'heading.value' },
          { id: 'context', type: 'table', source: 'ctx' },
        ],
      },
    });
  });
});
