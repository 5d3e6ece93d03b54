#!/usr/bin/env node
import { CommanderError } from 'commander';
import { ExitCode, exitCodeForError } from '@termwise/shared';
import { OutputRenderer, colorsFor } from './output/renderer';
import { createProgram } from './program';

async function main() {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already printed help, the version or the usage error
      process.exit(e.exitCode === 0 ? ExitCode.Success : ExitCode.Config);
    }

    const debug = program.opts().debug === true || process.env.TERMWISE_DEBUG === '1';
    new OutputRenderer(false, colorsFor(process.env)).error(e, debug);
    process.exit(exitCodeForError(e));
  }
}

void main();
