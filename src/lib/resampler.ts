import type { Profile } from './types';
import { InvalidArgumentError } from './errors';
import { logDebug } from './logger';

/**
 * Reduce a profile to approximately `targetPoints` samples by decimation.
 *
 * Keeps every `ceil(total / targetPoints)`-th sample, the final sample, and
 * every segment start, so the output may run slightly over the target when
 * the track has many segments. No interpolation or smoothing is done; when
 * the profile already fits, it is returned as is.
 */
export function resampleProfile(profile: Profile, targetPoints: number): Profile {
  if (!Number.isInteger(targetPoints) || targetPoints <= 0) {
    throw new InvalidArgumentError(
      `Resample target must be a positive integer, got ${targetPoints}`,
      'targetPoints'
    );
  }

  const total = profile.samples.length;
  if (targetPoints >= total) {
    return profile;
  }

  const stride = Math.ceil(total / targetPoints);
  const samples = profile.samples.filter((sample, i) =>
    i % stride === 0 || sample.segmentStart || i === total - 1
  );

  logDebug('resampler', 'Reduced profile', {
    stride,
    original: total,
    filtered: samples.length,
  });

  const resampled: Profile = {
    ...profile,
    samples: Object.freeze(samples),
    sampleCount: samples.length,
  };
  return Object.freeze(resampled);
}
