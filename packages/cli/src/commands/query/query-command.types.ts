import type { Dates, DistroInfo, Releases } from '@distro-info/core';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Options Commander parses for both distro-info programs. Each program only
 * registers the selectors of its own profile.
 */
export interface QueryCommandOptions extends BaseCommandOptions {
  // Selectors
  all?: boolean;
  devel?: boolean;
  stable?: boolean;
  latest?: boolean;
  supported?: boolean;
  unsupported?: boolean;
  series?: string;
  lts?: boolean;
  esm?: boolean;
  elts?: boolean;
  oldstable?: boolean;
  testing?: boolean;
  alias?: string;
  // Output
  codename?: boolean;
  release?: boolean;
  fullname?: boolean;
  days?: string | boolean;
  // Inputs
  date?: string;
  dataDir?: string;
}

export type SelectorKey =
  | 'all'
  | 'devel'
  | 'stable'
  | 'latest'
  | 'supported'
  | 'unsupported'
  | 'series'
  | 'lts'
  | 'esm'
  | 'elts'
  | 'oldstable'
  | 'testing'
  | 'alias';

export type OutputKey = 'codename' | 'release' | 'fullname' | 'days';

/**
 * What a selector answers with: series to format, or finished lines.
 */
export type QueryResult =
  | { kind: 'releases'; releases: Releases.DistroRelease[] }
  | { kind: 'text'; lines: string[] };

export interface SelectorDefinition {
  key: SelectorKey;
  /** Commander flags, e.g. "-s, --stable" or "--series <name>" */
  flags: string;
  description: string;
  run(info: DistroInfo, asOf: Dates.CalendarDate, argument: string | undefined): QueryResult;
}

/**
 * Everything that differs between ubuntu-distro-info and debian-distro-info.
 */
export interface QueryProfile {
  programName: string;
  description: string;
  variant: Releases.DistroVariant;
  selectors: readonly SelectorDefinition[];
}
