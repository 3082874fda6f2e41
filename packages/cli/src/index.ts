// packages/cli/src/index.ts — patternflow entry point

import { buildProgram } from './program.js';

await buildProgram().parseAsync();
