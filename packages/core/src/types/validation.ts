// packages/core/src/types/validation.ts

export type ValidationIssueCode =
  | 'UnknownCapability'
  | 'MissingRequiredArg'
  | 'MissingRequiredInput'
  | 'InputTypeMismatch'
  | 'DuplicateStepKey'
  | 'ForwardReference'
  | 'UnknownReference';

export type ValidationSeverity = 'error' | 'warning';

/** warn: log and continue (default). enforce: any error blocks execution. */
export type ValidationMode = 'warn' | 'enforce';

export interface ValidationIssue {
  code: ValidationIssueCode;
  severity: ValidationSeverity;
  message: string;
  step?: number;
  capability?: string;
}

export interface CapabilityCheck {
  exists: boolean;
  handlerId: string | null;
  requiredArgs: string[];
  missingArgs: string[];
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  capabilities: Record<string, CapabilityCheck>;
  pattern: { id: string; name: string; steps: number };
}
