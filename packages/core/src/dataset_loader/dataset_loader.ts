/**
 * Dataset Loader
 *
 * Parses a distro-info style CSV dataset into an ordered, frozen sequence of
 * DistroRelease records. The first non-blank line is a header; records keep
 * the order of their lines.
 *
 * @module dataset_loader
 */

import { parse } from 'csv-parse/sync';
import { CalendarDate } from '../calendar_date';
import { DISTRO_VARIANTS } from '../distro_release';
import type { DistroRelease, DistroVariant } from '../distro_release';
import { createLogger } from '../logger';
import { isRollingVersion, versionKey } from '../version_order';
import { DatasetLoadError } from './dataset_loader.errors';
import { REQUIRED_COLUMNS } from './dataset_loader.types';
import type { LoadDatasetOptions, OptionalDateField } from './dataset_loader.types';

const logger = createLogger('[DatasetLoader] ');

// version, codename, series, created; release and eol may be cut off
const MIN_FIELDS = 4;

type NumberedLine = {
  text: string;
  line: number;
}

type ColumnLayout = {
  width: number;
  optional: Array<{ index: number; column: string; field: OptionalDateField }>;
}

function optionalColumnsFor(variant?: DistroVariant): Map<string, OptionalDateField> {
  const variants = variant ? [variant] : Object.values(DISTRO_VARIANTS);
  const columns = new Map<string, OptionalDateField>();
  for (const candidate of variants) {
    columns.set(candidate.ltsColumn, 'eolLts');
    columns.set(candidate.extendedColumn, 'eolExtended');
  }
  return columns;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function splitFields({ text, line }: NumberedLine): string[] {
  let rows: unknown;
  try {
    rows = parse(text, { bom: true, relax_column_count: true });
  } catch (error) {
    throw new DatasetLoadError(
      `Line ${line}: ${error instanceof Error ? error.message : String(error)}`,
      'MALFORMED',
      line
    );
  }

  const row: unknown = Array.isArray(rows) && rows.length === 1 ? rows[0] : undefined;
  if (!isStringArray(row)) {
    throw new DatasetLoadError(`Line ${line}: expected exactly one record`, 'MALFORMED', line);
  }
  return row;
}

function readHeader(header: NumberedLine, optionalColumns: Map<string, OptionalDateField>): ColumnLayout {
  const fields = splitFields(header).map(field => field.trim());

  REQUIRED_COLUMNS.forEach((column, index) => {
    if (fields[index] !== column) {
      throw new DatasetLoadError(
        `Line ${header.line}: expected column "${column}" at position ${index + 1}, found "${fields[index] ?? ''}"`,
        'MALFORMED',
        header.line
      );
    }
  });

  const optional: ColumnLayout['optional'] = [];
  for (let index = REQUIRED_COLUMNS.length; index < fields.length; index++) {
    const column = fields[index] ?? '';
    const field = optionalColumns.get(column);
    if (!field) {
      throw new DatasetLoadError(`Line ${header.line}: unknown column "${column}"`, 'MALFORMED', header.line);
    }
    if (optional.some(existing => existing.field === field)) {
      throw new DatasetLoadError(
        `Line ${header.line}: column "${column}" repeats an earlier column`,
        'MALFORMED',
        header.line
      );
    }
    optional.push({ index, column, field });
  }

  return { width: fields.length, optional };
}

function readDate(value: string, column: string, line: number): CalendarDate | null {
  const trimmed = value.trim();
  if (trimmed === '') {
    return null;
  }
  const date = CalendarDate.parse(trimmed);
  if (!date) {
    throw new DatasetLoadError(
      `Line ${line}: invalid ${column} date "${trimmed}", expected YYYY-MM-DD`,
      'MALFORMED',
      line
    );
  }
  return date;
}

function readRecord(numbered: NumberedLine, layout: ColumnLayout): DistroRelease {
  const { line } = numbered;
  const fields = splitFields(numbered);

  if (fields.length < MIN_FIELDS || fields.length > layout.width) {
    throw new DatasetLoadError(
      `Line ${line}: expected ${MIN_FIELDS} to ${layout.width} fields, found ${fields.length}`,
      'MALFORMED',
      line
    );
  }

  const field = (index: number): string => (fields[index] ?? '').trim();
  const codename = field(1);
  const series = field(2);
  if (codename === '' || series === '') {
    throw new DatasetLoadError(`Line ${line}: codename and series must not be empty`, 'MALFORMED', line);
  }

  const created = readDate(field(3), 'created', line);
  if (!created) {
    throw new DatasetLoadError(`Line ${line}: missing created date`, 'MALFORMED', line);
  }

  const optionalDates: Record<OptionalDateField, CalendarDate | null> = { eolLts: null, eolExtended: null };
  for (const { index, column, field: target } of layout.optional) {
    optionalDates[target] = readDate(field(index), column, line);
  }

  return Object.freeze({
    version: field(0),
    codename,
    series,
    created,
    release: readDate(field(4), 'release', line),
    eol: readDate(field(5), 'eol', line),
    eolLts: optionalDates.eolLts,
    eolExtended: optionalDates.eolExtended,
  });
}

/**
 * Tracks first occurrences of a unique key and rejects repeats. Keys may be
 * normalised; errors report the value as written.
 */
class UniqueKeyIndex {
  private readonly seen = new Map<string, number>();

  constructor(private readonly label: string) { }

  claim(key: string, line: number, written: string = key): void {
    const first = this.seen.get(key);
    if (first !== undefined) {
      throw new DatasetLoadError(
        `Line ${line}: duplicate ${this.label} "${written}" (first defined on line ${first})`,
        'DUPLICATE_KEY',
        line,
        written
      );
    }
    this.seen.set(key, line);
  }
}

/**
 * Splits dataset text into lines, accepting LF and CRLF endings.
 */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Loads a dataset from its text lines.
 *
 * @throws DatasetLoadError MALFORMED for bad headers, field counts or dates;
 *   DUPLICATE_KEY for a repeated series, codename or version
 *
 * @example
 * ```typescript
 * const releases = loadDataset([
 *   'version,codename,series,created,release,eol',
 *   '4.10,Warty Warthog,warty,2004-03-05,2004-10-20,2006-04-30',
 * ]);
 * releases[0].series // "warty"
 * ```
 */
export function loadDataset(lines: readonly string[], options: LoadDatasetOptions = {}): readonly DistroRelease[] {
  const numbered = lines
    .map((text, index) => ({ text: text.replace(/\r$/, ''), line: index + 1 }))
    .filter(({ text }) => text.trim() !== '');

  const [header, ...body] = numbered;
  if (!header) {
    throw new DatasetLoadError('Dataset is empty: missing header line', 'MALFORMED');
  }

  const layout = readHeader(header, optionalColumnsFor(options.variant));
  const seriesIndex = new UniqueKeyIndex('series');
  const codenameIndex = new UniqueKeyIndex('codename');
  const versionIndex = new UniqueKeyIndex('version');

  const releases: DistroRelease[] = [];
  for (const numberedLine of body) {
    const release = readRecord(numberedLine, layout);
    seriesIndex.claim(release.series, numberedLine.line);
    codenameIndex.claim(release.codename, numberedLine.line);
    if (!isRollingVersion(release.version)) {
      versionIndex.claim(versionKey(release.version), numberedLine.line, release.version);
    }
    releases.push(release);
  }

  logger.debug(`Loaded ${releases.length} series from ${lines.length} lines`);
  return Object.freeze(releases);
}

function quoteField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Writes releases back in the dataset column format of `variant`.
 * Trailing empty optional columns are left off, as in upstream datasets.
 */
export function serializeDataset(releases: readonly DistroRelease[], variant: DistroVariant): string[] {
  const header = [...REQUIRED_COLUMNS, variant.ltsColumn, variant.extendedColumn];
  const date = (value: CalendarDate | null): string => value?.toString() ?? '';

  const rows = releases.map(release => {
    const fields = [
      release.version,
      release.codename,
      release.series,
      date(release.created),
      date(release.release),
      date(release.eol),
      date(release.eolLts),
      date(release.eolExtended),
    ];
    while (fields.length > REQUIRED_COLUMNS.length && fields[fields.length - 1] === '') {
      fields.pop();
    }
    return fields.map(quoteField).join(',');
  });

  return [header.join(','), ...rows];
}
