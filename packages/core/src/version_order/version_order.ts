/**
 * Version Ordering
 *
 * Total order over distribution version strings. The leading dotted numeric
 * part is compared component by component as integers, so `9.10 < 10.04`
 * and `4.10 > 4.9`. Whatever follows it (e.g. ` LTS`) is compared as text.
 *
 * @module version_order
 */

const NUMERIC_PREFIX = /^(\d+(?:\.\d+)*)(.*)$/s;

export type ParsedVersion = {
  /** Numeric components of the leading dotted part; empty if there is none */
  components: number[];
  /** Text after the numeric part, trimmed */
  suffix: string;
}

export function parseVersion(version: string): ParsedVersion {
  const trimmed = version.trim();
  const match = NUMERIC_PREFIX.exec(trimmed);
  if (!match) {
    return { components: [], suffix: trimmed };
  }
  const [, numeric = '', rest = ''] = match;
  return {
    components: numeric.split('.').map(part => Number.parseInt(part, 10)),
    suffix: rest.trim(),
  };
}

/**
 * Normal form of a version: two versions share a key exactly when
 * compareVersions() finds them equal, e.g. "18.04 LTS" and "18.4  LTS".
 */
export function versionKey(version: string): string {
  const { components, suffix } = parseVersion(version);
  return `${components.join('.')} ${suffix}`;
}

/**
 * Unversioned (rolling) series such as Debian's sid carry an empty version.
 */
export function isRollingVersion(version: string): boolean {
  return version.trim() === '';
}

/**
 * Compares two version strings.
 *
 * @returns negative if `a` sorts before `b`, positive if after, 0 if equal
 *
 * @example
 * compareVersions('9.10', '10.04')       // < 0
 * compareVersions('18.04 LTS', '18.04') // > 0
 * compareVersions('', '4.10')           // < 0
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);

  const leftEmpty = left.components.length === 0 && left.suffix === '';
  const rightEmpty = right.components.length === 0 && right.suffix === '';
  if (leftEmpty || rightEmpty) {
    return Number(rightEmpty) - Number(leftEmpty);
  }

  // A version with a numeric part sorts after one without
  if (left.components.length === 0 || right.components.length === 0) {
    if (left.components.length !== right.components.length) {
      return left.components.length === 0 ? -1 : 1;
    }
  }

  const length = Math.max(left.components.length, right.components.length);
  for (let i = 0; i < length; i++) {
    const l = left.components[i];
    const r = right.components[i];
    if (l === undefined) return -1;
    if (r === undefined) return 1;
    if (l !== r) return l < r ? -1 : 1;
  }

  if (left.suffix === right.suffix) return 0;
  return left.suffix < right.suffix ? -1 : 1;
}
