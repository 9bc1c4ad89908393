export { compareVersions, isRollingVersion, parseVersion, versionKey } from './version_order';
export type { ParsedVersion } from './version_order';
