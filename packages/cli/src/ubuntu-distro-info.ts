#!/usr/bin/env node

import { UBUNTU_PROFILE } from './commands/query/query-profiles';
import { runProgram } from './program';

runProgram(UBUNTU_PROFILE).catch((error: unknown) => {
  console.error(`${UBUNTU_PROFILE.programName}: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
