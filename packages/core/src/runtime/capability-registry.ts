// packages/core/src/runtime/capability-registry.ts — Capability name → handler method routing

import type {
  CapabilityBinding,
  CapabilityHandler,
  CapabilityTable,
  RegisterOptions,
} from '../types/capability.js';
import {
  CapabilityConflictError,
  CapabilityNameError,
  RegistrationClosedError,
} from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

const CAPABILITY_NAME = /^[A-Za-z][\w-]*(\.[A-Za-z][\w-]*)+$/;

/**
 * Write-once map from capability names to handler methods.
 * All registration happens before the first run; after `seal()` the registry is read-only
 * and can be shared by concurrent invocations.
 */
export class CapabilityRegistry {
  private bindings = new Map<string, CapabilityBinding>();
  private shadowed: CapabilityBinding[] = [];
  private sequence = 0;
  private sealed = false;

  constructor(private logger: Logger = silentLogger) {}

  /**
   * Bind every capability in `capabilities` to `handlerId`.
   * A name collision throws unless `allowDualRegistration` is set, in which case the
   * newest binding routes. Nothing is bound when the call throws.
   */
  register(
    handlerId: string,
    capabilities: CapabilityTable,
    options: RegisterOptions = {},
  ): string[] {
    if (this.sealed) {
      throw new RegistrationClosedError(handlerId);
    }

    const names = Object.keys(capabilities);
    for (const name of names) {
      if (!CAPABILITY_NAME.test(name)) {
        throw new CapabilityNameError(name, handlerId);
      }
      const existing = this.bindings.get(name);
      if (existing && !options.allowDualRegistration) {
        throw new CapabilityConflictError(name, existing.handlerId, handlerId);
      }
    }

    for (const name of names) {
      const existing = this.bindings.get(name);
      if (existing) {
        this.shadowed.push({ ...existing, active: false });
        this.logger.warn(
          `Capability ${name} re-registered: ${handlerId} now routes (was ${existing.handlerId})`,
        );
      }
      this.bindings.set(name, {
        capability: name,
        handlerId,
        method: capabilities[name],
        sequence: ++this.sequence,
        active: true,
      });
    }

    this.logger.debug(`Registered ${names.length} capabilities for ${handlerId}`);
    return names;
  }

  registerHandler(handler: CapabilityHandler, options: RegisterOptions = {}): string[] {
    return this.register(handler.id, handler.capabilities(), options);
  }

  /** End the registration phase. Idempotent. */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  /** Active binding for `name`, or undefined. */
  lookup(name: string): CapabilityBinding | undefined {
    return this.bindings.get(name);
  }

  listCapabilities(): string[] {
    return [...this.bindings.keys()].sort();
  }

  getHandlerFor(name: string): string | undefined {
    return this.bindings.get(name)?.handlerId;
  }

  /** Active and displaced bindings, in registration order. */
  listBindings(): CapabilityBinding[] {
    return [...this.bindings.values(), ...this.shadowed]
      .map((binding) => ({ ...binding }))
      .sort((a, b) => a.sequence - b.sequence);
  }

  /** Handler id → capability names it currently routes. */
  listHandlers(): Record<string, string[]> {
    const handlers: Record<string, string[]> = {};
    for (const name of this.listCapabilities()) {
      const handlerId = this.bindings.get(name)?.handlerId;
      if (handlerId === undefined) continue;
      handlers[handlerId] ??= [];
      handlers[handlerId].push(name);
    }
    return handlers;
  }
}
