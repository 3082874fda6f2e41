import { describe, expect, it } from 'vitest';
import { deepFreeze, isPlainObject, stableStringify, toPlainData } from '../../../src/utils/objects.js';

describe('isPlainObject', () => {
  it('accepts object literals and null-prototype objects only', () => {
    expect(isPlainObject({ a: 1 })).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(new Date())).toBe(false);
    expect(isPlainObject(null)).toBe(false);
  });
});

describe('deepFreeze', () => {
  it('freezes nested objects and arrays', () => {
    const value = deepFreeze({ a: { b: [1, { c: 2 }] } });
    expect(Object.isFrozen(value.a)).toBe(true);
    expect(Object.isFrozen(value.a.b)).toBe(true);
    expect(Object.isFrozen(value.a.b[1])).toBe(true);
  });
});

describe('stableStringify', () => {
  it('sorts keys at every level', () => {
    expect(stableStringify({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
  });

  it('normalizes values JSON cannot represent', () => {
    expect(stableStringify({ u: undefined, n: 10n, d: new Date(0) })).toBe(
      '{"d":"1970-01-01T00:00:00.000Z","n":"10","u":null}',
    );
  });

  it('prints repeated ancestors as [Circular]', () => {
    const node: Record<string, unknown> = { name: 'a' };
    node.children = [node];
    expect(stableStringify(node)).toBe('{"children":["[Circular]"],"name":"a"}');
  });

  it('does not mistake shared siblings for cycles', () => {
    const shared = { v: 1 };
    expect(stableStringify({ a: shared, b: shared })).toBe('{"a":{"v":1},"b":{"v":1}}');
  });
});

describe('toPlainData', () => {
  class Money {
    constructor(readonly amount: number) {}
  }

  it('copies plain data without sharing references', () => {
    const inner = { x: [1, 2] };
    const copy = toPlainData({ inner });
    expect(copy).toEqual({ inner: { x: [1, 2] } });
    expect(isPlainObject(copy) && copy.inner).not.toBe(inner);
  });

  it('names class instances and normalizes scalars', () => {
    expect(toPlainData({ price: new Money(5), n: 7n, at: new Date(0), list: [new Map()] })).toEqual({
      price: '[Money]',
      n: '7',
      at: '1970-01-01T00:00:00.000Z',
      list: ['[Map]'],
    });
  });

  it('replaces cycles', () => {
    const node: Record<string, unknown> = { id: 1 };
    node.self = node;
    expect(toPlainData(node)).toEqual({ id: 1, self: '[Circular]' });
  });
});
