import type { GpxPoint, GpxSegment, Profile, ProfileAxes, ProfileSample } from './types';
import { pointToPointDistance } from './distance';
import { MissingDataError } from './errors';
import { logWarn } from './logger';

function timeOf(point: GpxPoint): number | null {
  return point.time === null ? null : Date.parse(point.time);
}

/**
 * Fail before building when the whole track lacks the data an axis needs.
 * Individual points may still be missing values; those become null samples.
 * A track without any points passes and builds into an empty profile.
 */
export function assertAxisData(segments: GpxSegment[], axes: ProfileAxes): void {
  const points = segments.flatMap(seg => seg.points);
  if (points.length === 0) return;

  if ((axes.x === 'time' || axes.y === 'velocity') && !points.some(p => p.time !== null)) {
    throw new MissingDataError(
      `Cannot plot ${axes.y} against ${axes.x}: track has no timestamps`,
      'time'
    );
  }

  if (axes.y === 'elevation' && !points.some(p => p.ele !== null)) {
    throw new MissingDataError('Cannot plot elevation: track has no elevation data', 'elevation');
  }
}

/**
 * Walk each segment and derive cumulative distance and velocity per point.
 *
 * Distance keeps accumulating across segments, but nothing is measured
 * across a segment boundary: the first point of each segment adds zero and
 * has no velocity. Velocity needs timestamps on both the point and its
 * predecessor, and a non-zero interval between them.
 *
 * The result is metric (meters, m/s) in UTC.
 */
export function buildProfile(segments: GpxSegment[]): Profile {
  const samples: ProfileSample[] = [];
  let totalDistance = 0;
  let pointCount = 0;
  let backwardSteps = 0;

  const firstTimed = segments.flatMap(seg => seg.points).find(p => p.time !== null);
  const start = firstTimed ? timeOf(firstTimed) : null;

  segments.forEach((segment, segmentIndex) => {
    let prev: GpxPoint | null = null;

    for (const point of segment.points) {
      pointCount++;
      const time = timeOf(point);
      let velocity: number | null = null;

      if (prev !== null) {
        const step = pointToPointDistance(prev, point);
        totalDistance += step;

        const prevTime = timeOf(prev);
        if (time !== null && prevTime !== null) {
          const seconds = (time - prevTime) / 1000;
          if (seconds < 0) backwardSteps++;
          velocity = seconds === 0 ? null : step / seconds;
        }
      }

      const sample: ProfileSample = {
        time: point.time,
        elapsed: time !== null && start !== null ? (time - start) / 1000 : null,
        distance: totalDistance,
        ele: point.ele,
        velocity,
        segment: segmentIndex,
        segmentStart: prev === null,
      };
      samples.push(Object.freeze(sample));
      prev = point;
    }
  });

  if (backwardSteps > 0) {
    logWarn('profile-builder', 'Timestamps go backwards; elapsed time and velocity may be negative', {
      count: backwardSteps,
    });
  }

  const profile: Profile = {
    samples: Object.freeze(samples),
    units: 'metric',
    timezone: 'UTC',
    originalPointCount: pointCount,
    sampleCount: samples.length,
  };
  return Object.freeze(profile);
}
