#!/usr/bin/env tsx

import { createSqliteContext } from './context.js';
import { createProgram } from './program.js';

// The database opens lazily, after --db has been parsed
const ctx = createSqliteContext(() => program.opts<{ db?: string }>().db);
const program = createProgram(ctx);

try {
  await program.parseAsync();
} finally {
  ctx.close();
}
