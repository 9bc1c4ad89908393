import type { DistroVariant } from '../distro_release';

/**
 * Lifecycle predicates the engine evaluates against an as-of date.
 */
export type Predicate =
  | 'all'
  | 'latest'
  | 'devel'
  | 'stable'
  | 'supported'
  | 'unsupported'
  | 'lts'
  | 'extended';

/**
 * Where one series stands on a given day. Moving the date forward only
 * ever moves a series further down this list.
 */
export type LifecyclePhase =
  | 'unborn'
  | 'development'
  | 'supported'
  | 'extended'
  | 'end-of-life';

export const LIFECYCLE_PHASES: readonly LifecyclePhase[] = [
  'unborn',
  'development',
  'supported',
  'extended',
  'end-of-life',
];

/**
 * Dates a caller can count days to.
 */
export type Milestone = 'created' | 'release' | 'eol' | 'eol-lts' | 'eol-extended';

/**
 * Names Debian gives series relative to the current date.
 */
export type SeriesAlias = 'stable' | 'oldstable' | 'testing';

/**
 * Options for evaluate().
 */
export type EvaluateOptions = {
  /**
   * Decides which series are LTS. When omitted, a series is LTS if any
   * known variant considers it one.
   */
  variant?: DistroVariant;
}
