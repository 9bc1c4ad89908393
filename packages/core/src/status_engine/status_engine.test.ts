import { CalendarDate } from '../calendar_date';
import { loadDataset } from '../dataset_loader';
import { DEBIAN_VARIANT, UBUNTU_VARIANT } from '../distro_release';
import type { DistroRelease } from '../distro_release';
import {
  devel,
  evaluate,
  findSeries,
  latest,
  latestLts,
  milestoneDays,
  oldstable,
  phaseOf,
  stable,
} from './status_engine';
import { EvaluationError } from './status_engine.errors';
import { LIFECYCLE_PHASES } from './status_engine.types';

function day(text: string): CalendarDate {
  const parsed = CalendarDate.parse(text);
  if (!parsed) throw new Error(`bad test date ${text}`);
  return parsed;
}

function seriesOf(releases: DistroRelease[]): string[] {
  return releases.map(release => release.series);
}

function captureEvaluationError(run: () => unknown): EvaluationError {
  try {
    run();
  } catch (error) {
    if (error instanceof EvaluationError) return error;
    throw error;
  }
  throw new Error('expected an EvaluationError');
}

function record(overrides: Partial<DistroRelease> & Pick<DistroRelease, 'version' | 'series'>): DistroRelease {
  return {
    codename: overrides.series,
    created: day('2020-01-01'),
    release: null,
    eol: null,
    eolLts: null,
    eolExtended: null,
    ...overrides,
  };
}

const SCENARIO = loadDataset([
  'version,codename,series,created,release,eol',
  '1.0,Alpha,alpha,2020-01-01,2020-06-01,2021-06-01',
  '2.0,Beta,beta,2021-01-01,2021-06-01,',
  '3.0,Gamma,gamma,2022-01-01,,',
]);

const UBUNTU = loadDataset([
  'version,codename,series,created,release,eol,eol-server,eol-esm',
  '14.04 LTS,Trusty Tahr,trusty,2013-10-17,2014-04-17,2019-04-25,2019-04-25,2024-04-25',
  '16.04 LTS,Xenial Xerus,xenial,2015-10-22,2016-04-21,2021-04-30,2021-04-30,2026-04-23',
  '17.10,Artful Aardvark,artful,2017-04-20,2017-10-19,2018-07-19',
  '18.04 LTS,Bionic Beaver,bionic,2017-10-19,2018-04-26,2023-05-31,2023-05-31,2028-04-25',
  '18.10,Cosmic Cuttlefish,cosmic,2018-04-26,2018-10-18,2019-07-18',
], { variant: UBUNTU_VARIANT });

const DEBIAN = loadDataset([
  'version,codename,series,created,release,eol,eol-lts,eol-elts',
  '9,Stretch,stretch,2015-04-25,2017-06-17,2020-07-18,2022-06-30,2027-06-30',
  '10,Buster,buster,2017-06-17,2019-07-06,2022-09-10,2024-06-30,2029-06-30',
  '11,Bullseye,bullseye,2019-07-06,2021-08-14,2024-08-14,2026-08-31',
  '12,Bookworm,bookworm,2021-08-14,2023-06-10,2026-06-10',
  '13,Trixie,trixie,2023-06-10',
  ',Sid,sid,1993-08-16',
], { variant: DEBIAN_VARIANT });

describe('StatusEngine', () => {
  describe('evaluate', () => {
    const asOf = day('2021-07-01');

    it('should pick beta as stable once alpha has reached eol', () => {
      expect(seriesOf(evaluate(SCENARIO, 'stable', asOf))).toEqual(['beta']);
    });

    it('should list alpha as unsupported', () => {
      expect(seriesOf(evaluate(SCENARIO, 'unsupported', asOf))).toEqual(['alpha']);
    });

    it('should pick gamma as devel even before it is created', () => {
      expect(seriesOf(evaluate(SCENARIO, 'devel', asOf))).toEqual(['gamma']);
    });

    it('should return every record in dataset order for all', () => {
      expect(seriesOf(evaluate(SCENARIO, 'all', day('1990-01-01')))).toEqual(['alpha', 'beta', 'gamma']);
    });

    it('should not hand out the frozen dataset array', () => {
      const result = evaluate(SCENARIO, 'all', asOf);
      result.pop();

      expect(SCENARIO).toHaveLength(3);
    });

    it('should keep dataset order for multi-result predicates', () => {
      expect(seriesOf(evaluate(UBUNTU, 'supported', day('2018-06-14'))))
        .toEqual(['trusty', 'xenial', 'artful', 'bionic']);
    });

    it('should answer single-result predicates with exactly one series', () => {
      expect(evaluate(UBUNTU, 'latest', day('2020-01-01'))).toHaveLength(1);
      expect(evaluate(UBUNTU, 'stable', day('2020-01-01'))).toHaveLength(1);
    });

    it('should report NOT_FOUND with the predicate name', () => {
      const error = captureEvaluationError(() => evaluate(UBUNTU, 'devel', day('2020-01-01')));

      expect(error.code).toBe('NOT_FOUND');
      expect(error.predicate).toBe('devel');
      expect(error.message).toBe('No devel series at 2020-01-01');
    });
  });

  describe('boundaries', () => {
    it('should count a series as released on its release day', () => {
      expect(stable(SCENARIO, day('2020-06-01')).series).toBe('alpha');
      expect(() => stable(SCENARIO, day('2020-05-31'))).toThrow(EvaluationError);
    });

    it('should count a series as supported on its eol day', () => {
      expect(seriesOf(evaluate(SCENARIO, 'supported', day('2021-06-01')))).toEqual(['alpha', 'beta']);
      expect(evaluate(SCENARIO, 'unsupported', day('2021-06-01'))).toEqual([]);
    });

    it('should count a series as unsupported the day after eol', () => {
      expect(seriesOf(evaluate(SCENARIO, 'unsupported', day('2021-06-02')))).toEqual(['alpha']);
    });

    it('should stop listing a series as devel on its release day', () => {
      expect(devel(SCENARIO, day('2021-05-31')).series).toBe('beta');
      expect(devel(SCENARIO, day('2021-06-01')).series).toBe('gamma');
    });
  });

  describe('latest', () => {
    it('should fail before anything is created', () => {
      const error = captureEvaluationError(() => latest(SCENARIO, day('2019-01-01')));

      expect(error.code).toBe('NOT_FOUND');
      expect(error.message).toBe('No latest series at 2019-01-01');
    });

    it('should fail the day before the first series is created', () => {
      const asOf = day('2019-12-31');

      expect(captureEvaluationError(() => latest(SCENARIO, asOf)).code).toBe('NOT_FOUND');
      expect(captureEvaluationError(() => stable(SCENARIO, asOf)).code).toBe('NOT_FOUND');
    });

    it('should count a series as created on its created day', () => {
      const asOf = day('2020-01-01');

      expect(latest(SCENARIO, asOf).series).toBe('alpha');
      expect(captureEvaluationError(() => stable(SCENARIO, asOf)).message).toBe('No stable series at 2020-01-01');
    });

    it('should fall back to the greatest created series before any release', () => {
      expect(latest(SCENARIO, day('2020-03-01')).series).toBe('alpha');
    });

    it('should pick the greatest released version', () => {
      expect(latest(SCENARIO, day('2021-07-01')).series).toBe('beta');
      expect(latest(UBUNTU, day('2020-01-01')).series).toBe('cosmic');
    });

    it('should leave stable unanswered while falling back', () => {
      expect(() => stable(SCENARIO, day('2020-03-01'))).toThrow('No stable series at 2020-03-01');
    });
  });

  describe('devel', () => {
    it('should prefer the earliest upcoming release date', () => {
      expect(devel(SCENARIO, day('2020-03-01')).series).toBe('alpha');
    });

    it('should prefer a known release date over an unknown one', () => {
      const releases = [
        record({ version: '9.0', series: 'undated' }),
        record({ version: '4.0', series: 'dated', release: day('2030-01-01') }),
      ];

      expect(devel(releases, day('2025-01-01')).series).toBe('dated');
    });

    it('should break release-date ties by the greater version', () => {
      const releases = [
        record({ version: '4.0', series: 'four', release: day('2030-01-01') }),
        record({ version: '5.0', series: 'five', release: day('2030-01-01') }),
      ];

      expect(devel(releases, day('2025-01-01')).series).toBe('five');
    });

    it('should skip rolling series', () => {
      expect(devel(DEBIAN, day('2022-01-01')).series).toBe('bookworm');
      expect(devel(DEBIAN, day('2024-01-01')).series).toBe('trixie');
    });
  });

  describe('stable', () => {
    it('should always be released and inside its eol window', () => {
      const dates = ['2014-06-01', '2016-06-01', '2018-01-01', '2018-06-14', '2019-01-01', '2020-01-01', '2022-01-01'];

      for (const text of dates) {
        const asOf = day(text);
        const picked = stable(UBUNTU, asOf);

        expect(picked.release?.isAfter(asOf)).toBe(false);
        expect(picked.eol === null || !picked.eol.isBefore(asOf)).toBe(true);
      }
    });

    it('should compare versions numerically', () => {
      expect(stable(UBUNTU, day('2020-01-01')).series).toBe('bionic');
    });

    it('should reject two candidates sharing a version', () => {
      const releases = [
        record({ version: '5.0', series: 'one', release: day('2020-02-01') }),
        record({ version: '5.0', series: 'two', release: day('2020-02-01') }),
      ];

      const error = captureEvaluationError(() => stable(releases, day('2020-03-01')));

      expect(error.code).toBe('INCONSISTENT_DATA');
      expect(error.message).toBe('Series "one" and "two" share version "5.0"');
    });
  });

  describe('oldstable', () => {
    it('should pick the greatest released series below stable', () => {
      expect(oldstable(UBUNTU, day('2020-01-01')).series).toBe('artful');
      expect(oldstable(DEBIAN, day('2022-01-01')).series).toBe('buster');
    });

    it('should fail when only one series has been released', () => {
      expect(() => oldstable(SCENARIO, day('2020-07-01'))).toThrow('No oldstable series at 2020-07-01');
    });
  });

  describe('lts and extended', () => {
    it('should list Ubuntu LTS series until their server eol', () => {
      expect(seriesOf(evaluate(UBUNTU, 'lts', day('2018-06-14'), { variant: UBUNTU_VARIANT })))
        .toEqual(['trusty', 'xenial', 'bionic']);
      expect(seriesOf(evaluate(UBUNTU, 'lts', day('2020-01-01'), { variant: UBUNTU_VARIANT })))
        .toEqual(['xenial', 'bionic']);
    });

    it('should keep LTS series past eol under extended support', () => {
      expect(seriesOf(evaluate(UBUNTU, 'extended', day('2020-01-01'), { variant: UBUNTU_VARIANT })))
        .toEqual(['trusty', 'xenial', 'bionic']);
    });

    it('should list Debian series between their eol and LTS end', () => {
      expect(seriesOf(evaluate(DEBIAN, 'lts', day('2022-01-01'), { variant: DEBIAN_VARIANT })))
        .toEqual(['stretch']);
      expect(seriesOf(evaluate(DEBIAN, 'lts', day('2023-01-01'), { variant: DEBIAN_VARIANT })))
        .toEqual(['buster']);
    });

    it('should open the Debian LTS window the day after eol', () => {
      expect(evaluate(DEBIAN, 'lts', day('2022-09-10'), { variant: DEBIAN_VARIANT })).toEqual([]);
      expect(seriesOf(evaluate(DEBIAN, 'lts', day('2022-09-11'), { variant: DEBIAN_VARIANT })))
        .toEqual(['buster']);
    });

    it('should require an extended date for extended support', () => {
      expect(seriesOf(evaluate(DEBIAN, 'extended', day('2022-01-01'), { variant: DEBIAN_VARIANT })))
        .toEqual(['stretch', 'buster']);
    });

    it('should pick the greatest open LTS series', () => {
      expect(latestLts(UBUNTU, day('2018-01-01'), { variant: UBUNTU_VARIANT }).series).toBe('xenial');
      expect(latestLts(UBUNTU, day('2020-01-01'), { variant: UBUNTU_VARIANT }).series).toBe('bionic');
    });

    it('should fail when no LTS series is open', () => {
      expect(() => latestLts(SCENARIO, day('2021-07-01'), { variant: UBUNTU_VARIANT }))
        .toThrow('No lts series at 2021-07-01');
    });

    it('should accept any variant marker when no variant is given', () => {
      expect(seriesOf(evaluate(UBUNTU, 'lts', day('2018-06-14')))).toEqual(['trusty', 'xenial', 'bionic']);
    });
  });

  describe('findSeries', () => {
    it('should find a series by its identifier', () => {
      expect(findSeries(DEBIAN, 'buster').codename).toBe('Buster');
    });

    it('should fail for an unknown series', () => {
      const error = captureEvaluationError(() => findSeries(DEBIAN, 'hamm'));

      expect(error.code).toBe('NOT_FOUND');
      expect(error.message).toBe('Unknown distribution series "hamm"');
    });
  });

  describe('phaseOf', () => {
    const trusty = findSeries(UBUNTU, 'trusty');

    it('should walk a series through every phase', () => {
      expect(phaseOf(trusty, day('2013-01-01'))).toBe('unborn');
      expect(phaseOf(trusty, day('2014-01-01'))).toBe('development');
      expect(phaseOf(trusty, day('2015-01-01'))).toBe('supported');
      expect(phaseOf(trusty, day('2020-01-01'))).toBe('extended');
      expect(phaseOf(trusty, day('2025-01-01'))).toBe('end-of-life');
    });

    it('should never move back to an earlier phase', () => {
      for (const release of UBUNTU) {
        let previous = 0;
        for (let year = 2012; year <= 2030; year++) {
          for (let month = 1; month <= 12; month++) {
            const index = LIFECYCLE_PHASES.indexOf(phaseOf(release, CalendarDate.of(year, month, 1)));
            expect(index).toBeGreaterThanOrEqual(previous);
            previous = index;
          }
        }
      }
    });

    it('should keep a series without eol supported', () => {
      expect(phaseOf(findSeries(SCENARIO, 'beta'), day('2040-01-01'))).toBe('supported');
    });
  });

  describe('milestoneDays', () => {
    const bionic = findSeries(UBUNTU, 'bionic');

    it('should count days until an upcoming milestone', () => {
      expect(milestoneDays(bionic, 'release', day('2018-04-20'))).toBe(6);
    });

    it('should go negative once the milestone has passed', () => {
      expect(milestoneDays(bionic, 'eol', day('2023-06-01'))).toBe(-1);
    });

    it('should return zero on the milestone day', () => {
      expect(milestoneDays(bionic, 'eol-extended', day('2028-04-25'))).toBe(0);
    });

    it('should return null for a milestone without a date', () => {
      expect(milestoneDays(findSeries(UBUNTU, 'cosmic'), 'eol-lts', day('2018-06-14'))).toBeNull();
    });
  });
});
