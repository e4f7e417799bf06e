#!/usr/bin/env node
import pc from 'picocolors';
import { AppError, exitCodeFor } from '@dirdigest/shared';
import { createProgram } from './program';

const program = createProgram();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    const opts = program.opts();

    console.error(pc.red(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`));
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (opts.verbose && e instanceof Error && e.stack) {
      console.error(pc.dim(`\nStack Trace:\n${e.stack}`));
    } else {
      console.error(pc.dim(`\nFor more details, run with the --verbose flag.`));
    }

    process.exit(exitCodeFor(e));
  }
}

void main();
