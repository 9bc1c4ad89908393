#!/usr/bin/env node

import { DEBIAN_PROFILE } from './commands/query/query-profiles';
import { runProgram } from './program';

runProgram(DEBIAN_PROFILE).catch((error: unknown) => {
  console.error(`${DEBIAN_PROFILE.programName}: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
