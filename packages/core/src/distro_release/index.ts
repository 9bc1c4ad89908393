export {
  DEBIAN_VARIANT,
  DISTRO_VARIANTS,
  UBUNTU_VARIANT,
} from './distro_variant';
export type {
  DistroName,
  DistroRelease,
  DistroVariant,
} from './distro_release.types';
