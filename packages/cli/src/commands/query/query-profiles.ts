/**
 * Selector tables for the two distro-info programs.
 *
 * Both share the generic lifecycle selectors; each adds the ones its
 * distribution names differently (Ubuntu LTS/ESM, Debian LTS/ELTS and the
 * stable/oldstable/testing aliases).
 */

import { Releases } from '@distro-info/core';
import type { Dates, DistroInfo } from '@distro-info/core';
import type { QueryProfile, QueryResult, SelectorDefinition } from './query-command.types';

function releases(list: Releases.DistroRelease[]): QueryResult {
  return { kind: 'releases', releases: list };
}

function requireArgument(argument: string | undefined, flag: string): string {
  if (argument === undefined || argument.trim() === '') {
    throw new Error(`${flag} requires a series name`);
  }
  return argument.trim();
}

const COMMON_SELECTORS: readonly SelectorDefinition[] = [
  {
    key: 'all',
    flags: '-a, --all',
    description: 'list all known versions',
    run: info => releases(info.all()),
  },
  {
    key: 'devel',
    flags: '-d, --devel',
    description: 'latest development version',
    run: (info, asOf) => releases([info.devel(asOf)]),
  },
  {
    key: 'stable',
    flags: '-s, --stable',
    description: 'latest stable version',
    run: (info, asOf) => releases([info.stable(asOf)]),
  },
  {
    key: 'latest',
    flags: '-l, --latest',
    description: 'latest released version, or the development version before the first release',
    run: (info, asOf) => releases([info.latest(asOf)]),
  },
  {
    key: 'supported',
    flags: '--supported',
    description: 'list of all supported stable versions',
    run: (info, asOf) => releases(info.supported(asOf)),
  },
  {
    key: 'unsupported',
    flags: '--unsupported',
    description: 'list of all unsupported stable versions',
    run: (info, asOf) => releases(info.unsupported(asOf)),
  },
  {
    key: 'series',
    flags: '--series <name>',
    description: 'the given series, if it is known',
    run: (info, _asOf, argument) => releases([info.series(requireArgument(argument, '--series'))]),
  },
];

export const UBUNTU_PROFILE: QueryProfile = {
  programName: 'ubuntu-distro-info',
  description: 'Print information about Ubuntu releases',
  variant: Releases.UBUNTU_VARIANT,
  selectors: [
    ...COMMON_SELECTORS,
    {
      key: 'lts',
      flags: '--lts',
      description: 'latest long term support (LTS) version',
      run: (info, asOf) => releases([info.latestLts(asOf)]),
    },
    {
      key: 'esm',
      flags: '--esm',
      description: 'list of all versions under Expanded Security Maintenance',
      run: (info, asOf) => releases(info.extended(asOf)),
    },
  ],
};

/**
 * Debian alias of a series: stable, oldstable or testing, else its own name.
 */
function aliasOf(info: DistroInfo, asOf: Dates.CalendarDate, argument: string | undefined): QueryResult {
  const series = requireArgument(argument, '--alias');
  return { kind: 'text', lines: [info.alias(series, asOf) ?? series] };
}

export const DEBIAN_PROFILE: QueryProfile = {
  programName: 'debian-distro-info',
  description: 'Print information about Debian releases',
  variant: Releases.DEBIAN_VARIANT,
  selectors: [
    ...COMMON_SELECTORS,
    {
      key: 'lts',
      flags: '--lts',
      description: 'list of all versions under Long Term Support',
      run: (info, asOf) => releases(info.lts(asOf)),
    },
    {
      key: 'elts',
      flags: '-e, --elts',
      description: 'list of all versions under Extended Long Term Support',
      run: (info, asOf) => releases(info.extended(asOf)),
    },
    {
      key: 'oldstable',
      flags: '-o, --oldstable',
      description: 'latest oldstable version',
      run: (info, asOf) => releases([info.oldstable(asOf)]),
    },
    {
      key: 'testing',
      flags: '-t, --testing',
      description: 'current testing version',
      run: (info, asOf) => releases([info.devel(asOf)]),
    },
    {
      key: 'alias',
      flags: '--alias <codename>',
      description: 'print the alias (stable, oldstable or testing) of a codename',
      run: aliasOf,
    },
  ],
};
