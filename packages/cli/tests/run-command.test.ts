import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { runCommand } from '../src/commands/run.js';
import { runsListCommand } from '../src/commands/runs.js';
import { validateCommand } from '../src/commands/validate.js';

const TEST_DIR = join(tmpdir(), `patternflow-cli-run-test-${Date.now()}`);

function writePattern(name: string, doc: unknown): void {
  writeFileSync(join(TEST_DIR, 'patterns', name), JSON.stringify(doc));
}

function lastJson(spy: { mock: { calls: unknown[][] } }): unknown {
  const calls = spy.mock.calls;
  return JSON.parse(String(calls[calls.length - 1][0]));
}

beforeEach(() => {
  mkdirSync(join(TEST_DIR, 'patterns'), { recursive: true });
  writeFileSync(join(TEST_DIR, '.patternflow.yml'), 'logLevel: error\n');
  writePattern('echo_once.json', {
    id: 'echo_once',
    name: 'Echo once',
    steps: [{ capability: 'echo.value', args: { x: '{{inputs.x}}' }, as: 'r1' }],
    outputs: ['r1'],
  });
  writePattern('missing_op.json', {
    id: 'missing_op',
    name: 'Missing op',
    steps: [{ capability: 'missing.op', args: {}, as: 'r1' }],
    outputs: ['r1'],
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('run command', () => {
  it('prints the completed result and records the run', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const globals = { project: TEST_DIR };

    await runCommand('echo_once', { inputs: { x: 5 }, json: true }, globals);

    expect(process.exitCode).toBeUndefined();
    expect(lastJson(log)).toMatchObject({ status: 'completed', outputs: { r1: { value: 5 } } });

    runsListCommand({ json: true }, globals);
    expect(lastJson(log)).toEqual([
      expect.objectContaining({ patternId: 'echo_once', status: 'completed', stepCount: 1 }),
    ]);
  });

  it('exits with 2 when the run aborts', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    await runCommand('missing_op', { json: true, history: false }, { project: TEST_DIR });

    expect(process.exitCode).toBe(2);
    expect(lastJson(log)).toMatchObject({
      status: 'aborted',
      error: { step: 0, code: 'CapabilityNotFound' },
    });
  });

  it('skips recording with history disabled', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const globals = { project: TEST_DIR };

    await runCommand('echo_once', { inputs: { x: 1 }, json: true, history: false }, globals);
    runsListCommand({ json: true }, globals);

    expect(lastJson(log)).toEqual([]);
  });
});

describe('validate command', () => {
  it('exits with 2 for a pattern naming an unknown capability', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await validateCommand('missing_op', { json: true }, { project: TEST_DIR });

    expect(process.exitCode).toBe(2);
    expect(lastJson(log)).toMatchObject({
      valid: false,
      errors: [expect.objectContaining({ code: 'UnknownCapability', step: 0 })],
    });
  });

  it('reports unknown patterns', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await validateCommand('nope', {}, { project: TEST_DIR });

    expect(process.exitCode).toBe(1);
    expect(error).toHaveBeenCalledWith(expect.stringContaining('Pattern not found: nope'));
  });
});
