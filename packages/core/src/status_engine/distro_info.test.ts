import { CalendarDate } from '../calendar_date';
import { DatasetLoadError } from '../dataset_loader';
import { DatasetSourceError } from '../dataset_source';
import { MemoryDatasetSource } from '../memory';
import { DEBIAN_VARIANT, UBUNTU_VARIANT } from '../distro_release';
import { DistroInfo } from './distro_info';
import { EvaluationError } from './status_engine.errors';

const DEBIAN_CSV = [
  'version,codename,series,created,release,eol,eol-lts,eol-elts',
  '9,Stretch,stretch,2015-04-25,2017-06-17,2020-07-18,2022-06-30,2027-06-30',
  '10,Buster,buster,2017-06-17,2019-07-06,2022-09-10,2024-06-30,2029-06-30',
  '11,Bullseye,bullseye,2019-07-06,2021-08-14,2024-08-14,2026-08-31',
  '12,Bookworm,bookworm,2021-08-14,2023-06-10,2026-06-10',
  ',Sid,sid,1993-08-16',
].join('\n');

const ASOF = CalendarDate.of(2022, 1, 1);

describe('DistroInfo', () => {
  let source: MemoryDatasetSource;

  beforeEach(() => {
    source = new MemoryDatasetSource({ datasets: { debian: DEBIAN_CSV } });
  });

  describe('fromSource', () => {
    it('should load the dataset named after the variant', async () => {
      const debian = await DistroInfo.fromSource(source, DEBIAN_VARIANT);

      expect(debian.variant).toBe(DEBIAN_VARIANT);
      expect(debian.all().map(release => release.series))
        .toEqual(['stretch', 'buster', 'bullseye', 'bookworm', 'sid']);
    });

    it('should pass source errors through', async () => {
      await expect(DistroInfo.fromSource(source, UBUNTU_VARIANT)).rejects.toBeInstanceOf(DatasetSourceError);
    });

    it('should reject a dataset laid out for another variant', async () => {
      source.setDataset('ubuntu', DEBIAN_CSV);

      await expect(DistroInfo.fromSource(source, UBUNTU_VARIANT)).rejects.toBeInstanceOf(DatasetLoadError);
    });
  });

  describe('queries', () => {
    let debian: DistroInfo;

    beforeEach(async () => {
      debian = await DistroInfo.fromSource(source, DEBIAN_VARIANT);
    });

    it('should answer the single-result queries', () => {
      expect(debian.stable(ASOF).series).toBe('bullseye');
      expect(debian.oldstable(ASOF).series).toBe('buster');
      expect(debian.devel(ASOF).series).toBe('bookworm');
      expect(debian.latest(ASOF).series).toBe('bullseye');
    });

    it('should answer the list queries', () => {
      expect(debian.supported(ASOF).map(release => release.series)).toEqual(['buster', 'bullseye']);
      expect(debian.unsupported(ASOF).map(release => release.series)).toEqual(['stretch']);
      expect(debian.lts(ASOF).map(release => release.series)).toEqual(['stretch']);
      expect(debian.extended(ASOF).map(release => release.series)).toEqual(['stretch', 'buster']);
    });

    it('should look up a series and its phase', () => {
      expect(debian.series('buster').version).toBe('10');
      expect(debian.phaseOf('stretch', ASOF)).toBe('extended');
      expect(debian.phaseOf('bookworm', ASOF)).toBe('development');
    });

    it('should not let callers change the loaded releases', () => {
      debian.all().pop();

      expect(debian.all()).toHaveLength(5);
    });
  });

  describe('alias', () => {
    let debian: DistroInfo;

    beforeEach(async () => {
      debian = await DistroInfo.fromSource(source, DEBIAN_VARIANT);
    });

    it('should name stable, oldstable and testing', () => {
      expect(debian.alias('bullseye', ASOF)).toBe('stable');
      expect(debian.alias('buster', ASOF)).toBe('oldstable');
      expect(debian.alias('bookworm', ASOF)).toBe('testing');
    });

    it('should return null for a series holding no alias', () => {
      expect(debian.alias('stretch', ASOF)).toBeNull();
      expect(debian.alias('sid', ASOF)).toBeNull();
    });

    it('should tolerate aliases that have no holder on that date', () => {
      // Only stretch is released here, so there is no oldstable yet
      expect(debian.alias('stretch', CalendarDate.of(2018, 1, 1))).toBe('stable');
    });

    it('should fail for an unknown series', () => {
      expect(() => debian.alias('hamm', ASOF)).toThrow(EvaluationError);
    });
  });
});
