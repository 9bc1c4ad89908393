/**
 * Status Engine
 *
 * Evaluates lifecycle predicates over loaded series for an explicit as-of
 * date. Every function here is pure: nothing reads the clock and nothing
 * mutates the releases passed in.
 *
 * Boundary days are inclusive. A series counts as released on its release
 * day and as supported on its eol day.
 *
 * @module status_engine
 */

import { CalendarDate, compareNullableDates } from '../calendar_date';
import { DISTRO_VARIANTS } from '../distro_release';
import type { DistroRelease, DistroVariant } from '../distro_release';
import { createLogger } from '../logger';
import { compareVersions, isRollingVersion } from '../version_order';
import { EvaluationError } from './status_engine.errors';
import type { EvaluateOptions, LifecyclePhase, Milestone, Predicate } from './status_engine.types';

const logger = createLogger('[StatusEngine] ');

/**
 * Variants whose LTS rules apply. Without an explicit variant, a series
 * qualifies under whichever known variant accepts it.
 */
function variantsFor(options: EvaluateOptions): readonly DistroVariant[] {
  return options.variant ? [options.variant] : Object.values(DISTRO_VARIANTS);
}

// ============================================
// Per-series conditions
// ============================================

function isCreatedBy(release: DistroRelease, asOf: CalendarDate): boolean {
  return !release.created.isAfter(asOf);
}

function isReleasedBy(release: DistroRelease, asOf: CalendarDate): boolean {
  return release.release !== null && !release.release.isAfter(asOf);
}

function isUnreleasedAt(release: DistroRelease, asOf: CalendarDate): boolean {
  return release.release === null || release.release.isAfter(asOf);
}

/**
 * Released and not past eol. A missing eol means the end of support has
 * not been announced, so the series is still inside its window.
 */
function isInStandardSupport(release: DistroRelease, asOf: CalendarDate): boolean {
  if (!isReleasedBy(release, asOf)) {
    return false;
  }
  return release.eol === null || !release.eol.isBefore(asOf);
}

function isPastStandardSupport(release: DistroRelease, asOf: CalendarDate): boolean {
  return isReleasedBy(release, asOf) && release.eol !== null && release.eol.isBefore(asOf);
}

function isInLtsWindow(release: DistroRelease, asOf: CalendarDate, variant: DistroVariant): boolean {
  if (!isReleasedBy(release, asOf) || !variant.isLts(release)) {
    return false;
  }
  if (variant.ltsAfterEol && !isPastStandardSupport(release, asOf)) {
    return false;
  }
  const end = release.eolLts ?? release.eol;
  return end === null || !end.isBefore(asOf);
}

function isInLtsSupport(release: DistroRelease, asOf: CalendarDate, variants: readonly DistroVariant[]): boolean {
  return variants.some(variant => isInLtsWindow(release, asOf, variant));
}

function isInExtendedSupport(release: DistroRelease, asOf: CalendarDate, variants: readonly DistroVariant[]): boolean {
  if (!isReleasedBy(release, asOf) || release.eolExtended === null || release.eolExtended.isBefore(asOf)) {
    return false;
  }
  return isPastStandardSupport(release, asOf) || variants.some(variant => variant.isLts(release));
}

// ============================================
// Single-result selection
// ============================================

function versioned(releases: readonly DistroRelease[]): DistroRelease[] {
  return releases.filter(release => !isRollingVersion(release.version));
}

function greaterVersion(a: DistroRelease, b: DistroRelease, predicate: string): DistroRelease {
  const order = compareVersions(a.version, b.version);
  if (order === 0) {
    throw new EvaluationError(
      `Series "${a.series}" and "${b.series}" share version "${a.version}"`,
      'INCONSISTENT_DATA',
      predicate
    );
  }
  return order > 0 ? a : b;
}

function pickGreatest(candidates: DistroRelease[], predicate: string, asOf: CalendarDate): DistroRelease {
  const [first, ...rest] = candidates;
  if (!first) {
    throw new EvaluationError(`No ${predicate} series at ${asOf.toString()}`, 'NOT_FOUND', predicate);
  }
  return rest.reduce((best, candidate) => greaterVersion(best, candidate, predicate), first);
}

/**
 * Greatest released series; before any release, the greatest series
 * created by `asOf`.
 */
export function latest(releases: readonly DistroRelease[], asOf: CalendarDate): DistroRelease {
  const candidates = versioned(releases);
  const released = candidates.filter(release => isReleasedBy(release, asOf));
  if (released.length > 0) {
    return pickGreatest(released, 'latest', asOf);
  }
  return pickGreatest(candidates.filter(release => isCreatedBy(release, asOf)), 'latest', asOf);
}

/**
 * Nearest upcoming series: a known release date beats an unknown one,
 * the earlier date wins, and equal dates go to the greater version.
 */
export function devel(releases: readonly DistroRelease[], asOf: CalendarDate): DistroRelease {
  const [first, ...rest] = versioned(releases).filter(release => isUnreleasedAt(release, asOf));
  if (!first) {
    throw new EvaluationError(`No devel series at ${asOf.toString()}`, 'NOT_FOUND', 'devel');
  }
  return rest.reduce((nearest, candidate) => {
    const byDate = compareNullableDates(candidate.release, nearest.release);
    if (byDate !== 0) {
      return byDate < 0 ? candidate : nearest;
    }
    return greaterVersion(nearest, candidate, 'devel');
  }, first);
}

export function stable(releases: readonly DistroRelease[], asOf: CalendarDate): DistroRelease {
  return pickGreatest(
    versioned(releases).filter(release => isInStandardSupport(release, asOf)),
    'stable',
    asOf
  );
}

/**
 * Greatest released series older than the current stable one.
 */
export function oldstable(releases: readonly DistroRelease[], asOf: CalendarDate): DistroRelease {
  const current = stable(releases, asOf);
  return pickGreatest(
    versioned(releases).filter(release =>
      isReleasedBy(release, asOf) && compareVersions(release.version, current.version) < 0
    ),
    'oldstable',
    asOf
  );
}

/**
 * Greatest series whose LTS window is open at `asOf`.
 */
export function latestLts(
  releases: readonly DistroRelease[],
  asOf: CalendarDate,
  options: EvaluateOptions = {}
): DistroRelease {
  const variants = variantsFor(options);
  return pickGreatest(
    versioned(releases).filter(release => isInLtsSupport(release, asOf, variants)),
    'lts',
    asOf
  );
}

// ============================================
// Evaluation
// ============================================

function select(
  releases: readonly DistroRelease[],
  predicate: Predicate,
  asOf: CalendarDate,
  variants: readonly DistroVariant[]
): DistroRelease[] {
  switch (predicate) {
    case 'all':
      return [...releases];
    case 'latest':
      return [latest(releases, asOf)];
    case 'devel':
      return [devel(releases, asOf)];
    case 'stable':
      return [stable(releases, asOf)];
    case 'supported':
      return releases.filter(release => isInStandardSupport(release, asOf));
    case 'unsupported':
      return releases.filter(release => isPastStandardSupport(release, asOf));
    case 'lts':
      return releases.filter(release => isInLtsSupport(release, asOf, variants));
    case 'extended':
      return releases.filter(release => isInExtendedSupport(release, asOf, variants));
  }
}

/**
 * Evaluates a predicate at `asOf`.
 *
 * Multi-result predicates keep dataset order. `latest`, `devel` and
 * `stable` answer with exactly one series.
 *
 * @throws EvaluationError NOT_FOUND when a single-result predicate has no
 *   answer; INCONSISTENT_DATA when two candidates share a version
 *
 * @example
 * ```typescript
 * evaluate(releases, 'supported', CalendarDate.of(2018, 6, 14))
 *   .map(release => release.series) // ['trusty', 'xenial', 'artful', 'bionic']
 * ```
 */
export function evaluate(
  releases: readonly DistroRelease[],
  predicate: Predicate,
  asOf: CalendarDate,
  options: EvaluateOptions = {}
): DistroRelease[] {
  const result = select(releases, predicate, asOf, variantsFor(options));
  logger.debug(`Evaluated ${predicate} at ${asOf.toString()}: ${result.length} series`);
  return result;
}

// ============================================
// Lookups
// ============================================

/**
 * @throws EvaluationError NOT_FOUND for an unknown series name
 */
export function findSeries(releases: readonly DistroRelease[], series: string): DistroRelease {
  const match = releases.find(release => release.series === series);
  if (!match) {
    throw new EvaluationError(`Unknown distribution series "${series}"`, 'NOT_FOUND', 'series');
  }
  return match;
}

export function phaseOf(release: DistroRelease, asOf: CalendarDate): LifecyclePhase {
  if (!isCreatedBy(release, asOf)) {
    return 'unborn';
  }
  if (!isReleasedBy(release, asOf)) {
    return 'development';
  }
  if (release.eol === null || !release.eol.isBefore(asOf)) {
    return 'supported';
  }
  const stillCovered = [release.eolLts, release.eolExtended]
    .some(end => end !== null && !end.isBefore(asOf));
  return stillCovered ? 'extended' : 'end-of-life';
}

export function milestoneDate(release: DistroRelease, milestone: Milestone): CalendarDate | null {
  switch (milestone) {
    case 'created':
      return release.created;
    case 'release':
      return release.release;
    case 'eol':
      return release.eol;
    case 'eol-lts':
      return release.eolLts;
    case 'eol-extended':
      return release.eolExtended;
  }
}

/**
 * Signed days from `asOf` to a milestone; negative once it has passed.
 * Null when the dataset has no date for it.
 */
export function milestoneDays(release: DistroRelease, milestone: Milestone, asOf: CalendarDate): number | null {
  const date = milestoneDate(release, milestone);
  return date === null ? null : asOf.daysUntil(date);
}
