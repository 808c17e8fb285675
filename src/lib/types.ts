// GPX Types
export interface GpxPoint {
  lat: number;
  lon: number;
  ele: number | null;
  time: string | null; // ISO-8601, UTC
}

export interface GpxSegment {
  points: GpxPoint[];
}

export interface GpxTrack {
  name: string;
  segments: GpxSegment[];
}

export interface ParseOptions {
  fillGaps: boolean; // carry previous ele/time forward within a segment
}

// Profile Types
export type UnitSystem = 'metric' | 'imperial';
export type XAxisVariable = 'time' | 'distance';
export type YAxisVariable = 'elevation' | 'velocity';
export type AxisVariable = XAxisVariable | YAxisVariable;

export interface ProfileAxes {
  x: XAxisVariable;
  y: YAxisVariable;
}

export interface ProfileSample {
  time: string | null;      // ISO-8601 in the profile's timezone
  elapsed: number | null;   // seconds since the first timestamp of the track
  distance: number;         // cumulative, m or mi
  ele: number | null;       // m or ft
  velocity: number | null;  // m/s or mph
  segment: number;          // index of the source segment
  segmentStart: boolean;
}

export interface Profile {
  samples: readonly ProfileSample[];
  units: UnitSystem;
  timezone: string;
  originalPointCount: number;
  sampleCount: number;
}

export interface ConvertOptions {
  units: UnitSystem;
  timezone: string;
}

export interface ProfileOptions extends ConvertOptions, ParseOptions, ProfileAxes {
  maxPoints: number | null;  // resample target (null = keep every sample)
}

// Export Types
export type CsvDelimiter = ',' | ';' | '\t' | ' ';

export interface TableOptions {
  delimiter: CsvDelimiter;
  precision: number; // decimal places for numeric columns
}

export interface GnuplotOptions {
  output: string | null; // image file; null plots interactively
}

export type SeriesPoint = [x: number, y: number];
