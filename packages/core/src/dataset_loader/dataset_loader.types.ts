import type { DistroVariant } from '../distro_release';

/**
 * Options for loadDataset().
 */
export type LoadDatasetOptions = {
  /**
   * Restricts optional columns to this variant's. When omitted, the optional
   * columns of every known variant are accepted.
   */
  variant?: DistroVariant;
}

/**
 * Columns every dataset starts with, in this order.
 */
export const REQUIRED_COLUMNS = ['version', 'codename', 'series', 'created', 'release', 'eol'] as const;

/**
 * Record fields an optional column can fill.
 */
export type OptionalDateField = 'eolLts' | 'eolExtended';
