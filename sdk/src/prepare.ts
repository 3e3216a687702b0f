import type { PreparedJob } from '@hyp3-client/shared';
import { ValidationError } from './errors';
import { componentLogger } from './logger';

export const MAX_NAME_LENGTH = 20;

export interface RtcOptions {
  name?: string;
  /** Coregister SAR data to the DEM instead of using dead reckoning from orbit files */
  dem_matching?: boolean;
  include_dem?: boolean;
  include_inc_map?: boolean;
  /** False-color RGB decomposition; ignored for single-pol granules */
  include_rgb?: boolean;
  include_scattering_area?: boolean;
  radiometry?: 'sigma0' | 'gamma0';
  /** Output pixel spacing in meters */
  resolution?: 10 | 20 | 30;
  scale?: 'amplitude' | 'decibel' | 'power';
  /** Enhanced Lee speckle filter */
  speckle_filter?: boolean;
  dem_name?: 'copernicus';
}

export interface InsarOptions {
  name?: string;
  include_look_vectors?: boolean;
  /** @deprecated use `include_displacement_maps` */
  include_los_displacement?: boolean;
  include_inc_map?: boolean;
  looks?: '20x4' | '10x2';
  include_dem?: boolean;
  include_wrapped_phase?: boolean;
  /** Mask coastal waters and large inland waterbodies before unwrapping */
  apply_water_mask?: boolean;
  include_displacement_maps?: boolean;
  /** Adaptive phase filter strength, useful between 0.2 and 1; 0 skips the filter */
  phase_filter_parameter?: number;
}

export interface InsarIsceBurstOptions {
  name?: string;
  apply_water_mask?: boolean;
  looks?: '20x4' | '10x2' | '5x1';
}

export interface AutoriftOptions {
  name?: string;
}

/**
 * Reject names the API would refuse, before anything is sent.
 */
export function validateJobName(name: string | undefined): void {
  if (name === undefined) return;
  // code points, not UTF-16 units
  const length = [...name].length;
  if (length > MAX_NAME_LENGTH) {
    throw new ValidationError(
      `Job name "${name}" is ${length} characters long; names must be at most ${MAX_NAME_LENGTH} characters`
    );
  }
}

function withName(job: PreparedJob, name: string | undefined): PreparedJob {
  if (name !== undefined) {
    validateJobName(name);
    return { ...job, name };
  }
  return job;
}

export function prepareRtcJob(granule: string, options: RtcOptions = {}): PreparedJob {
  const { name, ...overrides } = options;
  return withName(
    {
      job_type: 'RTC_GAMMA',
      job_parameters: {
        granules: [granule],
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
        ...overrides,
      },
    },
    name
  );
}

export function prepareInsarJob(granule1: string, granule2: string, options: InsarOptions = {}): PreparedJob {
  const { name, ...overrides } = options;
  if (overrides.include_los_displacement) {
    componentLogger('prepare').warn(
      'The include_los_displacement parameter has been deprecated in favor of include_displacement_maps, ' +
        'and will be removed in a future release.'
    );
  }

  return withName(
    {
      job_type: 'INSAR_GAMMA',
      job_parameters: {
        granules: [granule1, granule2],
        include_look_vectors: false,
        include_los_displacement: false,
        include_inc_map: false,
        looks: '20x4',
        include_dem: false,
        include_wrapped_phase: false,
        apply_water_mask: false,
        include_displacement_maps: false,
        phase_filter_parameter: 0.6,
        ...overrides,
      },
    },
    name
  );
}

export function prepareInsarIsceBurstJob(
  granule1: string,
  granule2: string,
  options: InsarIsceBurstOptions = {}
): PreparedJob {
  const { name, ...overrides } = options;
  return withName(
    {
      job_type: 'INSAR_ISCE_BURST',
      job_parameters: {
        granules: [granule1, granule2],
        apply_water_mask: false,
        looks: '20x4',
        ...overrides,
      },
    },
    name
  );
}

export function prepareAutoriftJob(granule1: string, granule2: string, options: AutoriftOptions = {}): PreparedJob {
  return withName(
    {
      job_type: 'AUTORIFT',
      job_parameters: { granules: [granule1, granule2] },
    },
    options.name
  );
}
