#!/usr/bin/env node
import { createProgram } from './program';
import { runBootstrap } from './run-bootstrap';
import { errorMessage } from '../main/bootstrap-errors';

const program = createProgram(async (config) => {
  process.exitCode = await runBootstrap(config);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`[Bootstrap] ${errorMessage(error)}`);
  process.exitCode = 1;
});
