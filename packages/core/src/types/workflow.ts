// packages/core/src/types/workflow.ts

/**
 * A pattern is an ordered list of capability calls loaded from JSON or YAML.
 * Steps run in declared order; data flows between them through `{{...}}` templates.
 */

export type InputType = 'string' | 'number' | 'boolean' | 'object' | 'array' | 'date' | 'uuid';

export interface InputDeclaration {
  readonly type?: InputType;
  readonly required?: boolean;
  readonly default?: unknown;
  readonly description?: string;
}

export interface StepSpec {
  readonly capability: string;
  readonly args: Readonly<Record<string, unknown>>;
  /** Run state key for this step's result */
  readonly as: string;
  /** Boolean literal or condition expression; false skips the step */
  readonly condition?: string | boolean;
  readonly description?: string;
}

export interface PanelDeclaration {
  readonly id: string;
  readonly [key: string]: unknown;
}

/**
 * The three accepted `outputs` declarations, detected once at load time.
 * - keys:   ["a", "b"]
 * - keyed:  { a: {...}, b: {...} }   (metadata is for presentation layers)
 * - panels: { panels: [{ id, ... }] } (returned verbatim)
 */
export type OutputSpec =
  | { readonly kind: 'keys'; readonly keys: readonly string[] }
  | {
      readonly kind: 'keyed';
      readonly keys: readonly string[];
      readonly metadata: Readonly<Record<string, unknown>>;
    }
  | { readonly kind: 'panels'; readonly panels: readonly PanelDeclaration[] };

export interface WorkflowSpec {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly category?: string;
  readonly version?: string;
  readonly display?: Readonly<Record<string, unknown>>;
  readonly inputSchema: Readonly<Record<string, InputDeclaration>>;
  readonly steps: readonly StepSpec[];
  readonly outputs: OutputSpec;
  /** File the spec was loaded from, when loaded from disk */
  readonly source?: string;
}

export interface PatternSummary {
  id: string;
  name: string;
  description: string;
  category: string;
  display: Readonly<Record<string, unknown>>;
  inputs: Readonly<Record<string, InputDeclaration>>;
}

export interface PatternMetadata extends PatternSummary {
  outputKind: OutputSpec['kind'];
  outputKeys: string[];
  stepsCount: number;
  capabilities: string[];
}
