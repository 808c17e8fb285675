import { describe, it, expect } from 'vitest';
import { createProfile, GPX_PROFILE_DEFAULTS } from './gpx-profile';
import { haversineDistance } from './distance';
import { MissingDataError, ParseError, InvalidArgumentError } from './errors';
import { METERS_PER_MILE } from './unit-converter';

describe('createProfile', () => {
  // Helper to create a GPX with points along the equator, one second apart
  function createGpx(numPoints: number, options: { time?: boolean; ele?: boolean } = {}): string {
    const { time = true, ele = true } = options;
    const points = Array.from({ length: numPoints }, (_, i) => {
      const children = [
        ele ? `<ele>${i}</ele>` : '',
        time ? `<time>${new Date(Date.UTC(2024, 0, 1, 10, 0, i)).toISOString()}</time>` : '',
      ].join('');
      return `      <trkpt lat="0" lon="${i / 1000}">${children}</trkpt>`;
    }).join('\n');

    return `<?xml version="1.0" encoding="UTF-8"?>
<gpx version="1.1" xmlns="http://www.topografix.com/GPX/1/1">
  <trk>
    <name>Equator</name>
    <trkseg>
${points}
    </trkseg>
  </trk>
</gpx>`;
  }

  it('should default to a metric distance/elevation profile in UTC', () => {
    expect(GPX_PROFILE_DEFAULTS).toEqual({
      x: 'distance',
      y: 'elevation',
      units: 'metric',
      timezone: 'UTC',
      maxPoints: null,
      fillGaps: false,
    });

    const profile = createProfile(createGpx(3));

    expect(profile.units).toBe('metric');
    expect(profile.timezone).toBe('UTC');
    expect(profile.sampleCount).toBe(3);
    expect(profile.samples[0].time).toBe('2024-01-01T10:00:00Z');
    expect(profile.samples[1].distance).toBe(haversineDistance(0, 0, 0, 0.001));
    expect(profile.samples[1].velocity).toBe(haversineDistance(0, 0, 0, 0.001));
    expect(profile.samples[2].ele).toBe(2);
  });

  it('should produce an empty profile for a track without segments', () => {
    const profile = createProfile('<gpx version="1.1"><trk><name>Nothing</name></trk></gpx>', {
      x: 'time',
      y: 'velocity',
    });

    expect(profile.samples).toHaveLength(0);
    expect(profile.sampleCount).toBe(0);
    expect(profile.originalPointCount).toBe(0);
  });

  it('should resample, convert units and shift time', () => {
    const profile = createProfile(createGpx(100), {
      maxPoints: 10,
      units: 'imperial',
      timezone: '+01:00',
    });

    expect(profile.originalPointCount).toBe(100);
    expect(profile.sampleCount).toBe(11);
    expect(profile.timezone).toBe('+01:00');

    const first = profile.samples[0];
    const last = profile.samples[profile.samples.length - 1];
    expect(first.time).toBe('2024-01-01T11:00:00+01:00');
    expect(last.time).toBe('2024-01-01T11:01:39+01:00');
    expect(last.elapsed).toBe(99);
    expect(last.distance).toBeCloseTo(99 * haversineDistance(0, 0, 0, 0.001) / METERS_PER_MILE, 6);
    expect(last.ele).toBeCloseTo(99 / 0.3048, 9);
  });

  it('should fail a velocity profile on a track without timestamps', () => {
    const gpx = createGpx(5, { time: false });

    expect(() => createProfile(gpx, { y: 'velocity' })).toThrow(MissingDataError);
    expect(() => createProfile(gpx, { x: 'time' })).toThrow(MissingDataError);
    expect(createProfile(gpx).samples.every(s => s.velocity === null)).toBe(true);
  });

  it('should fail an elevation profile on a track without elevation', () => {
    const gpx = createGpx(5, { ele: false });

    expect(() => createProfile(gpx)).toThrow('track has no elevation data');
    expect(createProfile(gpx, { y: 'velocity' }).sampleCount).toBe(5);
  });

  it('should fill gaps when asked', () => {
    const gpx = `<gpx>
  <trk><trkseg>
    <trkpt lat="0" lon="0"><ele>5</ele><time>2024-01-01T10:00:00Z</time></trkpt>
    <trkpt lat="0" lon="0.001"></trkpt>
  </trkseg></trk>
</gpx>`;

    expect(createProfile(gpx).samples[1].ele).toBeNull();

    const filled = createProfile(gpx, { fillGaps: true });
    expect(filled.samples[1].ele).toBe(5);
    expect(filled.samples[1].elapsed).toBe(0);
    // Same timestamp on both points: no velocity
    expect(filled.samples[1].velocity).toBeNull();
  });

  it('should report malformed input and bad options', () => {
    expect(() => createProfile('<gpx><trk>')).toThrow(ParseError);
    expect(() => createProfile(createGpx(3), { maxPoints: 0 })).toThrow(InvalidArgumentError);
    expect(() => createProfile(createGpx(3), { timezone: 'Nowhere/Special' })).toThrow(InvalidArgumentError);
  });
});
