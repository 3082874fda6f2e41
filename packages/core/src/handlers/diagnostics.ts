// packages/core/src/handlers/diagnostics.ts — Built-in capabilities for smoke-testing patterns

import { z } from 'zod';
import { describeRequestCtx } from '../context/request-ctx.js';
import { capability } from '../runtime/capability.js';
import type { CapabilityHandler } from '../types/capability.js';

const present = z.unknown().refine((value) => value !== undefined, { message: 'Required' });

export const DIAGNOSTICS_HANDLER_ID = 'diagnostics';

/** echo.value, echo.args and ctx.describe; always registered by the CLI. */
export const diagnosticsHandler: CapabilityHandler = {
  id: DIAGNOSTICS_HANDLER_ID,
  capabilities: () => ({
    'echo.value': capability({
      description: 'Return { value: x }',
      args: z.object({ x: present }),
      run: (_ctx, _state, { x }) => ({ value: x }),
    }),
    'echo.args': capability({
      description: 'Return the resolved arguments unchanged',
      run: (_ctx, _state, args) => ({ ...args }),
    }),
    'ctx.describe': capability({
      description: 'Return the request context as plain data',
      run: (ctx) => describeRequestCtx(ctx),
    }),
  }),
};
