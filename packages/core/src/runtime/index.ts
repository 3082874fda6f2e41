// packages/core/src/runtime/index.ts -- barrel re-export

export { capability, describeParams, requiredParams } from './capability.js';
export type { CapabilityDefinition } from './capability.js';
export { CapabilityRegistry } from './capability-registry.js';
export { CapabilityRuntime } from './capability-runtime.js';
export type { CapabilityRuntimeOptions, InvokeOptions } from './capability-runtime.js';
export { CircuitBreaker } from './circuit-breaker.js';
export type { CircuitState } from './circuit-breaker.js';
export { RequestCache, cacheKey } from './request-cache.js';
export type { CacheLookup } from './request-cache.js';
