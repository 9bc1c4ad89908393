import { Command } from 'commander';
import { registerQueryCommand } from './commands/query/query';
import type { QueryProfile } from './commands/query/query-command.types';

export const VERSION = '1.0.0';

/**
 * Builds the Commander program for one distribution. Commander's own usage
 * errors get the same `<program>: <message>` shape as query errors.
 */
export function createProgram(profile: QueryProfile): Command {
  const program = new Command();

  program
    .version(VERSION)
    .configureOutput({
      outputError: (message, write) => write(`${profile.programName}: ${message.replace(/^error: /, '')}`),
    });

  registerQueryCommand(program, profile);
  return program;
}

export async function runProgram(profile: QueryProfile, argv: readonly string[] = process.argv): Promise<void> {
  await createProgram(profile).parseAsync([...argv]);
}
