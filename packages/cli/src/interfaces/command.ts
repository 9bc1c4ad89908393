/**
 * Standard Command Interface for the distro-info CLIs
 *
 * All commands implement this interface so they can be registered on a
 * Commander program and tested without one.
 */

import type { Command } from 'commander';

/**
 * Base options that all commands support
 */
export interface BaseCommandOptions {
  verbose?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   */
  register(program: Command): void;
}

/**
 * Executable command interface
 */
export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  execute(options: TOptions): Promise<void>;
}

export interface ICompleteCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  extends ICommand, IExecutableCommand<TOptions> { }
