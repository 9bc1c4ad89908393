/**
 * Status Engine - lifecycle predicates over loaded series.
 *
 * @module status_engine
 * @example
 * ```typescript
 * import { Engine, Dates } from '@distro-info/core';
 *
 * const asOf = Dates.CalendarDate.of(2021, 7, 1);
 * Engine.evaluate(releases, 'stable', asOf); // [beta]
 * ```
 */

export {
  devel,
  evaluate,
  findSeries,
  latest,
  latestLts,
  milestoneDate,
  milestoneDays,
  oldstable,
  phaseOf,
  stable,
} from './status_engine';
export { DistroInfo } from './distro_info';
export { EvaluationError, isNotFound } from './status_engine.errors';
export type { EvaluationErrorCode } from './status_engine.errors';
export { LIFECYCLE_PHASES } from './status_engine.types';
export type {
  EvaluateOptions,
  LifecyclePhase,
  Milestone,
  Predicate,
  SeriesAlias,
} from './status_engine.types';
