import type { ConvertOptions, Profile, ProfileSample, UnitSystem } from './types';
import { InvalidArgumentError } from './errors';

// Unit conversion constants
export const METERS_PER_MILE = 1609.344;
export const METERS_PER_FOOT = 0.3048;

interface UnitScale {
  distance: number;
  ele: number;
  velocity: number;
}

// Multipliers from metric into each system
const SCALES: Record<UnitSystem, UnitScale> = {
  metric: { distance: 1, ele: 1, velocity: 1 },
  imperial: {
    distance: 1 / METERS_PER_MILE,
    ele: 1 / METERS_PER_FOOT,
    velocity: 3600 / METERS_PER_MILE, // m/s -> mph
  },
};

export const UNIT_LABELS: Record<UnitSystem, { distance: string; ele: string; velocity: string }> = {
  metric: { distance: 'm', ele: 'm', velocity: 'm/s' },
  imperial: { distance: 'mi', ele: 'ft', velocity: 'mph' },
};

export interface TimeZone {
  name: string;
  /** Offset from UTC in minutes at the given instant */
  offsetAt(epochMs: number): number;
}

const FIXED_OFFSET = /^([+-])(\d{1,2})(?::?(\d{2}))?$/;

function parseOffset(value: string): number | null {
  const match = value.match(FIXED_OFFSET);
  if (!match) return null;

  const hours = parseInt(match[2], 10);
  const minutes = match[3] ? parseInt(match[3], 10) : 0;
  if (hours > 14 || minutes >= 60) return null;

  return (match[1] === '-' ? -1 : 1) * (hours * 60 + minutes);
}

// Intl "longOffset" text after GMT; historical zones carry seconds
const INTL_OFFSET = /^([+-])(\d{2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Offset in whole minutes from an Intl zone name such as "GMT+05:30",
 * "GMT+00:19:32" or "GMT". Seconds are rounded to the nearest minute.
 */
function parseIntlOffset(zoneName: string): number | null {
  const value = zoneName.replace(/^GMT/, '');
  if (value === '') return 0;

  const match = value.match(INTL_OFFSET);
  if (!match) return null;

  const seconds = parseInt(match[2], 10) * 3600 + parseInt(match[3], 10) * 60 + (match[4] ? parseInt(match[4], 10) : 0);
  return (match[1] === '-' ? -1 : 1) * Math.round(seconds / 60);
}

function formatOffset(minutes: number): string {
  if (minutes === 0) return 'Z';
  const sign = minutes < 0 ? '-' : '+';
  const abs = Math.abs(minutes);
  const hh = String(Math.floor(abs / 60)).padStart(2, '0');
  const mm = String(abs % 60).padStart(2, '0');
  return `${sign}${hh}:${mm}`;
}

function fixedZone(name: string, minutes: number): TimeZone {
  return { name, offsetAt: () => minutes };
}

/**
 * Resolve a timezone name: "UTC", a fixed offset such as "+03:00", "-0530"
 * or "+3", or an IANA zone such as "Europe/Moscow". IANA zones give
 * per-instant offsets, so daylight saving is applied to each timestamp.
 */
export function resolveTimeZone(name: string): TimeZone {
  const trimmed = name.trim();
  if (/^(utc|gmt|z)$/i.test(trimmed)) {
    return fixedZone('UTC', 0);
  }

  const fixed = parseOffset(trimmed);
  if (fixed !== null) {
    return fixedZone(formatOffset(fixed).replace('Z', '+00:00'), fixed);
  }

  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: trimmed,
      timeZoneName: 'longOffset',
    });
  } catch (error) {
    throw new InvalidArgumentError(
      `Unknown timezone "${name}": ${error instanceof Error ? error.message : String(error)}`,
      'timezone'
    );
  }

  return {
    name: trimmed,
    offsetAt(epochMs: number): number {
      const part = formatter.formatToParts(new Date(epochMs)).find(p => p.type === 'timeZoneName');
      const offset = parseIntlOffset(part?.value ?? 'GMT');
      if (offset === null) {
        throw new InvalidArgumentError(`Cannot read offset "${part?.value}" for timezone "${trimmed}"`, 'timezone');
      }
      return offset;
    },
  };
}

/**
 * Format an instant as ISO-8601 local time with its offset, e.g.
 * 2024-01-01T13:00:00+03:00. Milliseconds appear only when non-zero.
 */
export function formatLocalTime(epochMs: number, zone: TimeZone): string {
  const offset = zone.offsetAt(epochMs);
  const shifted = new Date(epochMs + offset * 60000);
  const iso = shifted.toISOString();
  const base = shifted.getUTCMilliseconds() === 0 ? iso.slice(0, 19) : iso.slice(0, 23);
  return base + formatOffset(offset);
}

function scale(value: number | null, from: number, to: number): number | null {
  return value === null ? null : value / from * to;
}

/**
 * Rescale every distance, elevation and velocity into `units` and rewrite
 * timestamps in `timezone`. Sample count, order, elapsed time and segment
 * markers are left untouched.
 */
export function convertProfile(profile: Profile, options: ConvertOptions): Profile {
  if (!Object.prototype.hasOwnProperty.call(SCALES, options.units)) {
    throw new InvalidArgumentError(`Unknown unit system "${options.units}"`, 'units');
  }

  const zone = resolveTimeZone(options.timezone);
  const from = SCALES[profile.units];
  const to = SCALES[options.units];

  const samples = profile.samples.map(sample => {
    const converted: ProfileSample = {
      ...sample,
      time: sample.time === null ? null : formatLocalTime(Date.parse(sample.time), zone),
      distance: sample.distance / from.distance * to.distance,
      ele: scale(sample.ele, from.ele, to.ele),
      velocity: scale(sample.velocity, from.velocity, to.velocity),
    };
    return Object.freeze(converted);
  });

  const result: Profile = {
    ...profile,
    samples: Object.freeze(samples),
    units: options.units,
    timezone: zone.name,
  };
  return Object.freeze(result);
}
