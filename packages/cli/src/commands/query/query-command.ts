import type { Command } from 'commander';
import { Dates } from '@distro-info/core';
import type { Config } from '@distro-info/core';
import { BaseCommand } from '../../base/base-command';
import { DEFAULT_DAYS_MILESTONE, formatRelease, parseMilestone } from './query-formatter';
import type { OutputMode } from './query-formatter';
import type { OutputKey, QueryCommandOptions, QueryProfile, SelectorDefinition } from './query-command.types';

const OUTPUT_KEYS: readonly OutputKey[] = ['codename', 'release', 'fullname', 'days'];

/**
 * QueryCommand - answers one lifecycle question per run
 *
 * Exactly one selector picks the series, at most one output flag picks how
 * each is printed (codename by default).
 */
export class QueryCommand extends BaseCommand<QueryCommandOptions> {
  protected readonly programName: string;

  constructor(private readonly profile: QueryProfile) {
    super();
    this.programName = profile.programName;
  }

  register(program: Command): void {
    program
      .name(this.profile.programName)
      .description(this.profile.description);

    for (const selector of this.profile.selectors) {
      program.option(selector.flags, selector.description);
    }

    program
      .option('-c, --codename', 'print the codename (default)')
      .option('-r, --release', 'print the release version')
      .option('-f, --fullname', 'print the full name')
      .option('-y, --days [milestone]', `print days until a milestone (default: ${DEFAULT_DAYS_MILESTONE})`)
      .option('--date <date>', 'date for calculating the version (default: today), as YYYY-MM-DD')
      .option('--data-dir <dir>', 'directory holding the distro-info CSV files')
      .option('--verbose', 'log debug details to stderr')
      .action(async (options: QueryCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: QueryCommandOptions): Promise<void> {
    try {
      const [selector, argument] = this.pickSelector(options);
      const mode = this.pickOutputMode(options);
      const asOf = options.date === undefined
        ? this.dependencyService.getToday()
        : parseAsOfDate(options.date);

      this.dependencyService.configure(overridesFrom(options));
      const info = await this.dependencyService.getDistroInfo(this.profile.variant);
      const result = selector.run(info, asOf, argument);

      this.handleSuccess(result.kind === 'text'
        ? result.lines
        : result.releases.map(release => formatRelease(release, mode, this.profile.variant, asOf)));
    } catch (error) {
      this.handleError(
        error instanceof Error ? error.message : String(error),
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  private pickSelector(options: QueryCommandOptions): [SelectorDefinition, string | undefined] {
    const chosen = this.profile.selectors.filter(selector => isGiven(options[selector.key]));
    const [first, second] = chosen;
    if (!first) {
      const names = this.profile.selectors.map(selector => `--${selector.key}`).join(', ');
      throw new Error(`one of ${names} is required`);
    }
    if (second) {
      throw new Error(`options --${first.key} and --${second.key} cannot be combined`);
    }
    const value = options[first.key];
    return [first, typeof value === 'string' ? value : undefined];
  }

  private pickOutputMode(options: QueryCommandOptions): OutputMode {
    const [first, second] = OUTPUT_KEYS.filter(key => isGiven(options[key]));
    if (first && second) {
      throw new Error(`options --${first} and --${second} cannot be combined`);
    }
    switch (first) {
      case undefined:
      case 'codename':
        return { kind: 'codename' };
      case 'release':
        return { kind: 'release' };
      case 'fullname':
        return { kind: 'fullname' };
      case 'days': {
        const name = typeof options.days === 'string' ? options.days : DEFAULT_DAYS_MILESTONE;
        return { kind: 'days', milestone: parseMilestone(name, this.profile.variant) };
      }
    }
  }
}

function isGiven(value: string | boolean | undefined): boolean {
  return value !== undefined && value !== false;
}

/**
 * @throws Error for anything but a valid YYYY-MM-DD day
 */
export function parseAsOfDate(text: string): Dates.CalendarDate {
  const date = Dates.CalendarDate.parse(text);
  if (!date) {
    throw new Error(`Failed to parse date "${text}"; must be YYYY-MM-DD format`);
  }
  return date;
}

function overridesFrom(options: QueryCommandOptions): Config.ConfigOverrides {
  const overrides: Config.ConfigOverrides = {};
  if (options.dataDir !== undefined) overrides.dataDir = options.dataDir;
  if (options.verbose) overrides.logLevel = 'debug';
  return overrides;
}
