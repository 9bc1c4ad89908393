import type { CalendarDate } from '../calendar_date';
import { loadDataset } from '../dataset_loader';
import type { DatasetSource } from '../dataset_source';
import type { DistroRelease, DistroVariant } from '../distro_release';
import { createLogger } from '../logger';
import { isNotFound } from './status_engine.errors';
import {
  devel,
  evaluate,
  findSeries,
  latest,
  latestLts,
  oldstable,
  phaseOf,
  stable,
} from './status_engine';
import type { LifecyclePhase, Predicate, SeriesAlias } from './status_engine.types';

const logger = createLogger('[DistroInfo] ');

/**
 * One loaded dataset and the variant that reads it.
 *
 * The releases are frozen at load and shared read-only by every query, so
 * one instance can answer any number of questions for any dates.
 *
 * @example
 * ```typescript
 * const ubuntu = await DistroInfo.fromSource(source, Releases.UBUNTU_VARIANT);
 * ubuntu.stable(Dates.CalendarDate.of(2018, 6, 14)).series // "bionic"
 * ```
 */
export class DistroInfo {
  constructor(
    private readonly releases: readonly DistroRelease[],
    public readonly variant: DistroVariant
  ) { }

  static fromLines(lines: readonly string[], variant: DistroVariant): DistroInfo {
    return new DistroInfo(loadDataset(lines, { variant }), variant);
  }

  static async fromSource(source: DatasetSource, variant: DistroVariant): Promise<DistroInfo> {
    const lines = await source.readLines(variant.name);
    logger.debug(`Loading ${variant.name} dataset from ${source.describe(variant.name)}`);
    return DistroInfo.fromLines(lines, variant);
  }

  all(): DistroRelease[] {
    return [...this.releases];
  }

  evaluate(predicate: Predicate, asOf: CalendarDate): DistroRelease[] {
    return evaluate(this.releases, predicate, asOf, { variant: this.variant });
  }

  latest(asOf: CalendarDate): DistroRelease {
    return latest(this.releases, asOf);
  }

  devel(asOf: CalendarDate): DistroRelease {
    return devel(this.releases, asOf);
  }

  stable(asOf: CalendarDate): DistroRelease {
    return stable(this.releases, asOf);
  }

  oldstable(asOf: CalendarDate): DistroRelease {
    return oldstable(this.releases, asOf);
  }

  supported(asOf: CalendarDate): DistroRelease[] {
    return this.evaluate('supported', asOf);
  }

  unsupported(asOf: CalendarDate): DistroRelease[] {
    return this.evaluate('unsupported', asOf);
  }

  lts(asOf: CalendarDate): DistroRelease[] {
    return this.evaluate('lts', asOf);
  }

  latestLts(asOf: CalendarDate): DistroRelease {
    return latestLts(this.releases, asOf, { variant: this.variant });
  }

  extended(asOf: CalendarDate): DistroRelease[] {
    return this.evaluate('extended', asOf);
  }

  series(name: string): DistroRelease {
    return findSeries(this.releases, name);
  }

  phaseOf(name: string, asOf: CalendarDate): LifecyclePhase {
    return phaseOf(this.series(name), asOf);
  }

  /**
   * Relative name of a series at `asOf` (stable, oldstable or testing),
   * or null when it holds none of them.
   *
   * @throws EvaluationError NOT_FOUND for an unknown series name
   */
  alias(name: string, asOf: CalendarDate): SeriesAlias | null {
    const target = this.series(name);
    const holders: Array<[SeriesAlias, (date: CalendarDate) => DistroRelease]> = [
      ['stable', date => this.stable(date)],
      ['oldstable', date => this.oldstable(date)],
      ['testing', date => this.devel(date)],
    ];

    for (const [alias, holder] of holders) {
      let current: DistroRelease;
      try {
        current = holder(asOf);
      } catch (error) {
        if (isNotFound(error)) continue;
        throw error;
      }
      if (current.series === target.series) {
        return alias;
      }
    }
    return null;
  }
}
