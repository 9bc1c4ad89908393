/**
 * Base Command Class for the distro-info CLIs
 *
 * Provides common functionality and enforces standards across all commands.
 * Results go to stdout one per line; errors go to stderr prefixed with the
 * program name, followed by exit code 1.
 */

import type { Command } from 'commander';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICompleteCommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICompleteCommand<TOptions> {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Program name used as the prefix of error messages
   */
  protected abstract readonly programName: string;

  abstract register(program: Command): void;

  abstract execute(options: TOptions): Promise<void>;

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    console.error(`${this.programName}: ${message}`);
    if (options.verbose && error?.stack) {
      console.error(error.stack);
    }
    process.exit(exitCode);
  }

  /**
   * Write result lines to stdout
   */
  protected handleSuccess(lines: readonly string[]): void {
    for (const line of lines) {
      console.log(line);
    }
  }
}
