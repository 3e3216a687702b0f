import { describe, expect, it } from 'vitest';

import { ValidationError } from '../errors';
import {
  prepareAutoriftJob,
  prepareInsarIsceBurstJob,
  prepareInsarJob,
  prepareRtcJob,
  validateJobName,
} from '../prepare';

describe('validateJobName', () => {
  it('accepts names up to 20 characters', () => {
    expect(() => validateJobName(undefined)).not.toThrow();
    expect(() => validateJobName('')).not.toThrow();
    expect(() => validateJobName('a'.repeat(20))).not.toThrow();
  });

  it('rejects longer names', () => {
    expect(() => validateJobName('a'.repeat(21))).toThrow(ValidationError);
  });

  it('counts characters rather than UTF-16 units', () => {
    expect(() => validateJobName('\u{1F6F0}'.repeat(20))).not.toThrow();
    expect(() => validateJobName('\u{1F6F0}'.repeat(21))).toThrow('is 21 characters long');
  });
});

describe('prepareRtcJob', () => {
  it('fills in default parameters', () => {
    expect(prepareRtcJob('my_granule')).toEqual({
      job_type: 'RTC_GAMMA',
      job_parameters: {
        granules: ['my_granule'],
        dem_matching: false,
        include_dem: false,
        include_inc_map: false,
        include_rgb: false,
        include_scattering_area: false,
        radiometry: 'gamma0',
        resolution: 30,
        scale: 'power',
        speckle_filter: false,
        dem_name: 'copernicus',
      },
    });
  });

  it('applies options and the name', () => {
    const job = prepareRtcJob('my_granule', { name: 'my_name', radiometry: 'sigma0', include_dem: true });

    expect(job.name).toBe('my_name');
    expect(job.job_parameters).toMatchObject({ radiometry: 'sigma0', include_dem: true, scale: 'power' });
    expect(job.job_parameters).not.toHaveProperty('name');
  });

  it('rejects a name that is too long', () => {
    expect(() => prepareRtcJob('my_granule', { name: 'x'.repeat(21) })).toThrow(ValidationError);
  });
});

describe('prepareInsarJob', () => {
  it('fills in default parameters', () => {
    expect(prepareInsarJob('g1', 'g2')).toEqual({
      job_type: 'INSAR_GAMMA',
      job_parameters: {
        granules: ['g1', 'g2'],
        include_look_vectors: false,
        include_los_displacement: false,
        include_inc_map: false,
        looks: '20x4',
        include_dem: false,
        include_wrapped_phase: false,
        apply_water_mask: false,
        include_displacement_maps: false,
        phase_filter_parameter: 0.6,
      },
    });
  });

  it('keeps the deprecated displacement option when set', () => {
    const job = prepareInsarJob('g1', 'g2', { include_los_displacement: true, looks: '10x2', name: 'pair' });

    expect(job.name).toBe('pair');
    expect(job.job_parameters).toMatchObject({ include_los_displacement: true, looks: '10x2' });
  });
});

describe('prepareInsarIsceBurstJob', () => {
  it('fills in default parameters', () => {
    expect(prepareInsarIsceBurstJob('burst1', 'burst2', { looks: '5x1' })).toEqual({
      job_type: 'INSAR_ISCE_BURST',
      job_parameters: { granules: ['burst1', 'burst2'], apply_water_mask: false, looks: '5x1' },
    });
  });
});

describe('prepareAutoriftJob', () => {
  it('takes a pair of granules', () => {
    expect(prepareAutoriftJob('g1', 'g2', { name: 'glacier' })).toEqual({
      job_type: 'AUTORIFT',
      job_parameters: { granules: ['g1', 'g2'] },
      name: 'glacier',
    });
  });
});
