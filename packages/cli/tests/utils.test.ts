import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  isCapabilityHandler,
  loadHandlerModules,
  parseInputs,
  parsePositiveInt,
  parseRunStatus,
} from '../src/utils.js';

const TEST_DIR = join(tmpdir(), `patternflow-cli-utils-test-${Date.now()}`);

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('parseInputs', () => {
  it('parses a JSON object', () => {
    expect(parseInputs('{"x": 5, "tags": ["a"]}')).toEqual({ x: 5, tags: ['a'] });
  });

  it('rejects invalid JSON', () => {
    expect(() => parseInputs('{x: 5}')).toThrow(InvalidArgumentError);
  });

  it('rejects non-object JSON', () => {
    expect(() => parseInputs('[1, 2]')).toThrow('Inputs must be a JSON object');
    expect(() => parseInputs('null')).toThrow('Inputs must be a JSON object');
  });
});

describe('parsePositiveInt', () => {
  it('accepts positive integers', () => {
    expect(parsePositiveInt('30')).toBe(30);
  });

  it.each(['0', '-1', '1.5', 'abc', ''])('rejects %j', (value) => {
    expect(() => parsePositiveInt(value)).toThrow('Must be a positive integer');
  });
});

describe('parseRunStatus', () => {
  it('accepts recorded statuses', () => {
    expect(parseRunStatus('aborted')).toBe('aborted');
  });

  it('rejects anything else', () => {
    expect(() => parseRunStatus('running')).toThrow('Must be one of: completed, aborted');
  });
});

describe('isCapabilityHandler', () => {
  it('requires a string id and a capabilities function', () => {
    expect(isCapabilityHandler({ id: 'h', capabilities: () => ({}) })).toBe(true);
    expect(isCapabilityHandler({ id: 'h', capabilities: {} })).toBe(false);
    expect(isCapabilityHandler({ capabilities: () => ({}) })).toBe(false);
    expect(isCapabilityHandler(null)).toBe(false);
  });
});

describe('loadHandlerModules', () => {
  it('loads a default-exported handler', async () => {
    writeFileSync(
      join(TEST_DIR, 'upper.mjs'),
      [
        'export default {',
        "  id: 'text',",
        '  capabilities: () => ({',
        "    'text.upper': { execute: async (_ctx, _state, args) => String(args.text).toUpperCase() },",
        '  }),',
        '};',
      ].join('\n'),
    );

    const handlers = await loadHandlerModules(['upper.mjs'], TEST_DIR);

    expect(handlers).toHaveLength(1);
    expect(handlers[0].id).toBe('text');
    expect(Object.keys(handlers[0].capabilities())).toEqual(['text.upper']);
  });

  it('loads an array exported as handlers', async () => {
    writeFileSync(
      join(TEST_DIR, 'many.mjs'),
      "export const handlers = [{ id: 'a', capabilities: () => ({}) }, { id: 'b', capabilities: () => ({}) }];\n",
    );

    const handlers = await loadHandlerModules(['many.mjs'], TEST_DIR);

    expect(handlers.map((h) => h.id)).toEqual(['a', 'b']);
  });

  it('rejects a module without a handler export', async () => {
    writeFileSync(join(TEST_DIR, 'empty.mjs'), 'export const nothing = 1;\n');

    await expect(loadHandlerModules(['empty.mjs'], TEST_DIR)).rejects.toThrow(
      'Handler module empty.mjs must export a handler',
    );
  });

  it('reports modules that cannot be imported', async () => {
    await expect(loadHandlerModules(['missing.mjs'], TEST_DIR)).rejects.toThrow(
      'Cannot load handler module missing.mjs',
    );
  });
});
