import type { Profile, ProfileOptions } from './types';
import { parseGpx } from './gpx-parser';
import { assertAxisData, buildProfile } from './profile-builder';
import { resampleProfile } from './resampler';
import { convertProfile } from './unit-converter';
import { logDebug } from './logger';

// Default profile options
const DEFAULT_OPTIONS: ProfileOptions = {
  x: 'distance',
  y: 'elevation',
  units: 'metric',
  timezone: 'UTC',
  maxPoints: null,   // keep every point
  fillGaps: false,
};

/**
 * Parse a GPX document and derive its profile.
 *
 * Runs parse -> axis check -> build -> resample -> convert. Resampling
 * happens after distances are accumulated, so the reduced profile keeps
 * the full-resolution distance and velocity values.
 */
export function createProfile(xml: string, options: Partial<ProfileOptions> = {}): Profile {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const track = parseGpx(xml, { fillGaps: opts.fillGaps });
  assertAxisData(track.segments, opts);

  let profile = buildProfile(track.segments);
  logDebug('gpx-profile', 'Built profile', {
    track: track.name,
    segments: track.segments.length,
    samples: profile.sampleCount,
  });

  if (opts.maxPoints !== null) {
    profile = resampleProfile(profile, opts.maxPoints);
  }

  return convertProfile(profile, { units: opts.units, timezone: opts.timezone });
}

export { DEFAULT_OPTIONS as GPX_PROFILE_DEFAULTS };
