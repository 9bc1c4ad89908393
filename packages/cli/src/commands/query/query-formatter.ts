import { Engine } from '@distro-info/core';
import type { Dates, Releases } from '@distro-info/core';

export type OutputMode =
  | { kind: 'codename' }
  | { kind: 'release' }
  | { kind: 'fullname' }
  | { kind: 'days'; milestone: Engine.Milestone };

export const DEFAULT_DAYS_MILESTONE = 'release';

const UNKNOWN_DAYS = '(unknown)';

/**
 * Milestone names accepted by `--days`, keyed the way the dataset header
 * spells them for this variant.
 */
export function milestoneNames(variant: Releases.DistroVariant): Map<string, Engine.Milestone> {
  return new Map<string, Engine.Milestone>([
    ['created', 'created'],
    ['release', 'release'],
    ['eol', 'eol'],
    [variant.ltsColumn, 'eol-lts'],
    [variant.extendedColumn, 'eol-extended'],
  ]);
}

/**
 * @throws Error for a name the variant does not know
 */
export function parseMilestone(name: string, variant: Releases.DistroVariant): Engine.Milestone {
  const names = milestoneNames(variant);
  const milestone = names.get(name);
  if (milestone === undefined) {
    throw new Error(`unknown milestone "${name}"; expected one of ${[...names.keys()].join(', ')}`);
  }
  return milestone;
}

export function formatFullName(release: Releases.DistroRelease, variant: Releases.DistroVariant): string {
  const name = release.version ? `${variant.displayName} ${release.version}` : variant.displayName;
  return `${name} "${release.codename}"`;
}

/**
 * One output line for one series.
 */
export function formatRelease(
  release: Releases.DistroRelease,
  mode: OutputMode,
  variant: Releases.DistroVariant,
  asOf: Dates.CalendarDate
): string {
  switch (mode.kind) {
    case 'codename':
      return release.series;
    case 'release':
      return release.version;
    case 'fullname':
      return formatFullName(release, variant);
    case 'days': {
      const days = Engine.milestoneDays(release, mode.milestone, asOf);
      return days === null ? UNKNOWN_DAYS : String(days);
    }
  }
}
