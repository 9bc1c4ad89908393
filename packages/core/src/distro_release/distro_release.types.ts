import type { CalendarDate } from '../calendar_date';

/**
 * Distributions with a known dataset layout.
 */
export type DistroName = 'ubuntu' | 'debian';

/**
 * One series of a distribution, as read from its dataset.
 *
 * Every optional milestone is `null` when the dataset leaves it empty.
 * An absent `eol` means "not announced", never "supported forever";
 * predicates decide what that means for them.
 */
export interface DistroRelease {
  /** Version identifier; empty for rolling series (e.g. Debian sid) */
  readonly version: string;
  /** Human-readable name, e.g. "Bionic Beaver" */
  readonly codename: string;
  /** Machine identifier, e.g. "bionic" */
  readonly series: string;
  readonly created: CalendarDate;
  readonly release: CalendarDate | null;
  readonly eol: CalendarDate | null;
  /** End of long-term support (Ubuntu `eol-server`, Debian `eol-lts`) */
  readonly eolLts: CalendarDate | null;
  /** End of extended support (Ubuntu `eol-esm`, Debian `eol-elts`) */
  readonly eolExtended: CalendarDate | null;
}

/**
 * Describes how one distribution lays out and interprets its dataset.
 */
export interface DistroVariant {
  readonly name: DistroName;
  /** Name used in full-name output, e.g. "Ubuntu" */
  readonly displayName: string;
  /** Dataset column holding `eolLts` */
  readonly ltsColumn: string;
  /** Dataset column holding `eolExtended` */
  readonly extendedColumn: string;
  /** Whether a series is a long-term-support series */
  isLts(release: DistroRelease): boolean;
  /** Whether the LTS window only opens once standard support has ended */
  readonly ltsAfterEol: boolean;
}
