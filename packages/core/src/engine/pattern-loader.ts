// packages/core/src/engine/pattern-loader.ts — Loads pattern documents into an immutable catalog

import { existsSync, readFileSync, readdirSync } from 'node:fs';
import { extname, join, relative } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type {
  PatternMetadata,
  PatternSummary,
  StepSpec,
  WorkflowSpec,
} from '../types/workflow.js';
import { DEFAULT_RESULT_KEY, RESERVED_STATE_KEYS } from '../utils/constants.js';
import { PatternError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { deepFreeze } from '../utils/objects.js';
import { detectOutputSpec, outputKeys } from './outputs.js';

const PATTERN_EXTENSIONS = new Set(['.json', '.yml', '.yaml']);

const inputDeclarationSchema = z
  .object({
    type: z.enum(['string', 'number', 'boolean', 'object', 'array', 'date', 'uuid']).optional(),
    required: z.boolean().optional(),
    default: z.unknown().optional(),
    description: z.string().optional(),
  })
  .passthrough();

const stepSchema = z.object({
  capability: z.string().min(1),
  args: z.record(z.string(), z.unknown()).default({}),
  as: z.string().min(1).default(DEFAULT_RESULT_KEY),
  condition: z.union([z.string(), z.boolean()]).optional(),
  description: z.string().optional(),
});

export const patternDocumentSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().optional(),
    category: z.string().optional(),
    version: z.union([z.string(), z.number()]).transform(String).optional(),
    display: z.record(z.string(), z.unknown()).optional(),
    inputs: z.record(z.string(), inputDeclarationSchema).default({}),
    steps: z.array(stepSchema),
    outputs: z.union([z.array(z.string()), z.record(z.string(), z.unknown())]),
  })
  .superRefine((doc, ctx) => {
    const reserved: readonly string[] = RESERVED_STATE_KEYS;
    doc.steps.forEach((step, index) => {
      if (reserved.includes(step.as)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `"${step.as}" is a reserved key and cannot be a step result`,
          path: ['steps', index, 'as'],
        });
      }
    });
  });

export type PatternDocument = z.input<typeof patternDocumentSchema>;

/** Validate a parsed document and turn it into a frozen WorkflowSpec. */
export function parsePatternDocument(raw: unknown, source?: string): WorkflowSpec {
  const result = patternDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    const id = typeof raw === 'object' && raw !== null ? Reflect.get(raw, 'id') : undefined;
    throw new PatternError(
      `Invalid pattern document: ${issues}`,
      typeof id === 'string' ? id : undefined,
      source,
    );
  }

  const doc = result.data;
  const steps: StepSpec[] = doc.steps.map((step) => ({
    capability: step.capability,
    args: step.args,
    as: step.as,
    ...(step.condition !== undefined ? { condition: step.condition } : {}),
    ...(step.description !== undefined ? { description: step.description } : {}),
  }));

  return deepFreeze({
    id: doc.id,
    name: doc.name,
    description: doc.description,
    category: doc.category,
    version: doc.version,
    display: doc.display,
    inputSchema: doc.inputs,
    steps,
    outputs: detectOutputSpec(doc.outputs, doc.id),
    source,
  });
}

/** Read and parse one pattern file (JSON, or YAML for .yml/.yaml). */
export function readPatternFile(filePath: string): WorkflowSpec {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new PatternError(`Cannot read pattern file: ${errorMessage(error)}`, undefined, filePath);
  }

  let raw: unknown;
  try {
    raw = extname(filePath) === '.json' ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    throw new PatternError(`Cannot parse pattern file: ${errorMessage(error)}`, undefined, filePath);
  }
  return parsePatternDocument(raw, filePath);
}

export interface LoadReport {
  loaded: string[];
  skipped: Array<{ source: string; reason: string }>;
}

/**
 * In-memory pattern catalog. Specs are frozen once loaded; `reload()` builds a fresh
 * map and swaps it in whole, so a run in progress keeps the spec it started with.
 */
export class PatternCatalog {
  private patterns = new Map<string, WorkflowSpec>();

  constructor(
    private dir?: string,
    private logger: Logger = silentLogger,
  ) {}

  /** Load every pattern file under the directory, recursively. Bad documents are skipped. */
  loadAll(): LoadReport {
    const report: LoadReport = { loaded: [], skipped: [] };
    const next = new Map<string, WorkflowSpec>();

    if (!this.dir || !existsSync(this.dir)) {
      this.logger.warn(`Patterns directory not found: ${this.dir ?? '(none)'}`);
      this.patterns = next;
      return report;
    }

    for (const file of listPatternFiles(this.dir)) {
      const source = relative(this.dir, file);
      let spec: WorkflowSpec;
      try {
        spec = readPatternFile(file);
      } catch (error) {
        const reason = errorMessage(error);
        this.logger.error(`Skipping pattern ${source}: ${reason}`);
        report.skipped.push({ source, reason });
        continue;
      }

      const existing = next.get(spec.id);
      if (existing) {
        const reason = `duplicate id "${spec.id}" (already loaded from ${existing.source ?? 'memory'})`;
        this.logger.error(`Skipping pattern ${source}: ${reason}`);
        report.skipped.push({ source, reason });
        continue;
      }
      next.set(spec.id, spec);
      report.loaded.push(spec.id);
    }

    this.patterns = next;
    this.logger.info(`Loaded ${report.loaded.length} patterns from ${this.dir}`);
    return report;
  }

  reload(): LoadReport {
    return this.loadAll();
  }

  /** Add a pattern from an in-memory document, e.g. one built by an embedding app. */
  register(document: unknown, source?: string): WorkflowSpec {
    const spec = parsePatternDocument(document, source);
    if (this.patterns.has(spec.id)) {
      throw new PatternError(`Pattern "${spec.id}" is already registered`, spec.id, source);
    }
    const next = new Map(this.patterns);
    next.set(spec.id, spec);
    this.patterns = next;
    return spec;
  }

  get(id: string): WorkflowSpec | undefined {
    return this.patterns.get(id);
  }

  has(id: string): boolean {
    return this.patterns.has(id);
  }

  get size(): number {
    return this.patterns.size;
  }

  list(): PatternSummary[] {
    return [...this.patterns.values()]
      .sort((a, b) => a.id.localeCompare(b.id))
      .map(summarize);
  }

  getMetadata(id: string): PatternMetadata | undefined {
    const spec = this.patterns.get(id);
    if (!spec) return undefined;
    return {
      ...summarize(spec),
      outputKind: spec.outputs.kind,
      outputKeys: outputKeys(spec.outputs),
      stepsCount: spec.steps.length,
      capabilities: [...new Set(spec.steps.map((step) => step.capability))],
    };
  }
}

function summarize(spec: WorkflowSpec): PatternSummary {
  return {
    id: spec.id,
    name: spec.name,
    description: spec.description ?? '',
    category: spec.category ?? 'general',
    display: spec.display ?? {},
    inputs: spec.inputSchema,
  };
}

/** Pattern files under `dir`, depth-first with entries in name order. */
export function listPatternFiles(dir: string): string[] {
  const files: string[] = [];
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
    a.name.localeCompare(b.name),
  );
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listPatternFiles(full));
    } else if (entry.isFile() && PATTERN_EXTENSIONS.has(extname(entry.name))) {
      files.push(full);
    }
  }
  return files;
}
