import type { DistroName, DistroRelease, DistroVariant } from './distro_release.types';

const LTS_MARKER = /\bLTS\b/;

export const UBUNTU_VARIANT: DistroVariant = {
  name: 'ubuntu',
  displayName: 'Ubuntu',
  ltsColumn: 'eol-server',
  extendedColumn: 'eol-esm',
  // Ubuntu marks LTS series in the version itself, e.g. "22.04 LTS"
  isLts: (release: DistroRelease) => LTS_MARKER.test(release.version),
  ltsAfterEol: false,
};

export const DEBIAN_VARIANT: DistroVariant = {
  name: 'debian',
  displayName: 'Debian',
  ltsColumn: 'eol-lts',
  extendedColumn: 'eol-elts',
  // Debian LTS takes over from the security team after regular eol
  isLts: (release: DistroRelease) => release.eolLts !== null,
  ltsAfterEol: true,
};

export const DISTRO_VARIANTS: Readonly<Record<DistroName, DistroVariant>> = {
  ubuntu: UBUNTU_VARIANT,
  debian: DEBIAN_VARIANT,
};
