import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { capability } from '../../../src/runtime/capability.js';
import { CapabilityRegistry } from '../../../src/runtime/capability-registry.js';
import {
  CapabilityConflictError,
  CapabilityNameError,
  RegistrationClosedError,
} from '../../../src/utils/errors.js';

const constant = (value: unknown) => capability({ run: () => value });

describe('CapabilityRegistry', () => {
  describe('register', () => {
    it('routes each capability to its handler', () => {
      const registry = new CapabilityRegistry();
      registry.register('ledger', { 'ledger.positions': constant([]), 'ledger.cash': constant(0) });
      registry.register('pricing', { 'pricing.quote': constant(1) });

      expect(registry.listCapabilities()).toEqual(['ledger.cash', 'ledger.positions', 'pricing.quote']);
      expect(registry.getHandlerFor('ledger.cash')).toBe('ledger');
      expect(registry.getHandlerFor('pricing.quote')).toBe('pricing');
      expect(registry.getHandlerFor('missing.op')).toBeUndefined();
    });

    it('rejects a name collision without allowDualRegistration', () => {
      const registry = new CapabilityRegistry();
      registry.register('first', { 'metrics.compute': constant(1) });

      expect(() => registry.register('second', { 'metrics.compute': constant(2) })).toThrow(
        CapabilityConflictError,
      );
      expect(registry.getHandlerFor('metrics.compute')).toBe('first');
    });

    it('binds nothing from a call that collides', () => {
      const registry = new CapabilityRegistry();
      registry.register('first', { 'metrics.compute': constant(1) });

      expect(() =>
        registry.register('second', { 'metrics.other': constant(2), 'metrics.compute': constant(3) }),
      ).toThrow(CapabilityConflictError);
      expect(registry.has('metrics.other')).toBe(false);
    });

    it('routes to the newest handler with allowDualRegistration', () => {
      const registry = new CapabilityRegistry();
      registry.register('first', { 'metrics.compute': constant(1) });
      registry.register('second', { 'metrics.compute': constant(2) }, { allowDualRegistration: true });

      expect(registry.getHandlerFor('metrics.compute')).toBe('second');
      expect(
        registry.listBindings().map((b) => [b.capability, b.handlerId, b.active]),
      ).toEqual([
        ['metrics.compute', 'first', false],
        ['metrics.compute', 'second', true],
      ]);
    });

    it('rejects names that are not category.operation', () => {
      const registry = new CapabilityRegistry();
      expect(() => registry.register('bad', { compute: constant(1) })).toThrow(CapabilityNameError);
    });

    it('refuses registration after seal()', () => {
      const registry = new CapabilityRegistry();
      registry.seal();
      expect(registry.isSealed).toBe(true);
      expect(() => registry.register('late', { 'late.op': constant(1) })).toThrow(
        RegistrationClosedError,
      );
    });
  });

  describe('registerHandler', () => {
    it('uses the handler id and capability table', () => {
      const registry = new CapabilityRegistry();
      const names = registry.registerHandler({
        id: 'macro',
        capabilities: () => ({ 'macro.regime': constant('expansion') }),
      });
      expect(names).toEqual(['macro.regime']);
      expect(registry.listHandlers()).toEqual({ macro: ['macro.regime'] });
    });
  });

  describe('capability params', () => {
    it('derives required params from an object schema', () => {
      const registry = new CapabilityRegistry();
      registry.register('risk', {
        'risk.var': capability({
          args: z.object({
            portfolioId: z.string(),
            confidence: z.number().default(0.95),
            horizon: z.number().optional(),
          }),
          run: () => 0,
        }),
      });
      expect(registry.lookup('risk.var')?.method.params).toEqual([
        { name: 'portfolioId', required: true },
        { name: 'confidence', required: false },
        { name: 'horizon', required: false },
      ]);
    });
  });
});
