import type { Command } from 'commander';
import { QueryCommand } from './query-command';
import type { QueryProfile } from './query-command.types';

/**
 * Registers the query options and action of one distro-info program
 */
export function registerQueryCommand(program: Command, profile: QueryProfile): QueryCommand {
  const queryCommand = new QueryCommand(profile);
  queryCommand.register(program);
  return queryCommand;
}
