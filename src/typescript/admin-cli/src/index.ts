#!/usr/bin/env node
import { buildProgram } from './program';

buildProgram().parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
