import { describe, it, expect } from 'vitest';
import { resampleProfile } from './resampler';
import { InvalidArgumentError } from './errors';
import type { Profile, ProfileSample } from './types';

// Helper to create a profile with the given number of samples per segment
function createProfile(segmentLengths: number[]): Profile {
  const samples: ProfileSample[] = [];
  segmentLengths.forEach((length, segment) => {
    for (let i = 0; i < length; i++) {
      samples.push({
        time: null,
        elapsed: null,
        distance: samples.length * 10,
        ele: samples.length,
        velocity: i === 0 ? null : 2,
        segment,
        segmentStart: i === 0,
      });
    }
  });

  return {
    samples,
    units: 'metric',
    timezone: 'UTC',
    originalPointCount: samples.length,
    sampleCount: samples.length,
  };
}

const indices = (profile: Profile) => profile.samples.map(s => s.ele);

describe('resampleProfile', () => {
  it('should return the input when the target is not below the sample count', () => {
    const profile = createProfile([50]);

    expect(resampleProfile(profile, 50)).toBe(profile);
    expect(resampleProfile(profile, 1000)).toBe(profile);
  });

  it('should reject a target that is not a positive integer', () => {
    const profile = createProfile([10]);

    expect(() => resampleProfile(profile, 0)).toThrow(InvalidArgumentError);
    expect(() => resampleProfile(profile, -5)).toThrow(InvalidArgumentError);
    expect(() => resampleProfile(profile, 2.5)).toThrow('Resample target must be a positive integer, got 2.5');
    expect(() => resampleProfile(profile, Number.NaN)).toThrow(InvalidArgumentError);
  });

  it('should keep every stride-th sample plus the last one', () => {
    const result = resampleProfile(createProfile([100]), 10);

    expect(indices(result)).toEqual([0, 10, 20, 30, 40, 50, 60, 70, 80, 90, 99]);
    expect(result.sampleCount).toBe(11);
    expect(result.originalPointCount).toBe(100);
  });

  it('should round the stride up', () => {
    const result = resampleProfile(createProfile([10]), 3);

    // stride = ceil(10 / 3) = 4
    expect(indices(result)).toEqual([0, 4, 8, 9]);
  });

  it('should never drop a segment start', () => {
    const result = resampleProfile(createProfile([5, 5, 5]), 4);

    // stride 4 keeps 0, 4, 8, 12; segment starts add 5 and 10; 14 is the last
    expect(indices(result)).toEqual([0, 4, 5, 8, 10, 12, 14]);
    expect(result.samples.filter(s => s.segmentStart).map(s => s.segment)).toEqual([0, 1, 2]);
  });

  it('should keep original distance and velocity values', () => {
    const profile = createProfile([20]);
    const result = resampleProfile(profile, 5);

    expect(result.samples[1]).toBe(profile.samples[4]);
    expect(result.samples[1].distance).toBe(40);
    expect(result.samples[1].velocity).toBe(2);
  });

  it('should not modify the input profile', () => {
    const profile = createProfile([30]);
    const before = [...profile.samples];

    const result = resampleProfile(profile, 7);

    expect(result).not.toBe(profile);
    expect(profile.samples).toEqual(before);
    expect(profile.sampleCount).toBe(30);
    expect(Object.isFrozen(result.samples)).toBe(true);
  });

  it('should keep first, last and boundary samples for any target', () => {
    for (const lengths of [[1], [7], [3, 1, 9], [40, 2, 2, 40], [1000]]) {
      const profile = createProfile(lengths);
      const total = profile.samples.length;

      for (let target = 1; target < total; target += 3) {
        const result = resampleProfile(profile, target);
        const kept = new Set(result.samples);
        const stride = Math.ceil(total / target);

        expect(result.samples.length).toBeLessThanOrEqual(total);
        expect(result.samples.length).toBeLessThanOrEqual(target + 1 + lengths.length);
        expect(result.samples.length).toBeGreaterThanOrEqual(Math.ceil(total / stride));
        expect(kept.has(profile.samples[0])).toBe(true);
        expect(kept.has(profile.samples[total - 1])).toBe(true);
        for (const sample of profile.samples) {
          if (sample.segmentStart) {
            expect(kept.has(sample)).toBe(true);
          }
        }
      }
    }
  });
});
