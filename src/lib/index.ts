// Types
export type {
  GpxPoint,
  GpxSegment,
  GpxTrack,
  ParseOptions,
  UnitSystem,
  AxisVariable,
  XAxisVariable,
  YAxisVariable,
  ProfileAxes,
  ProfileSample,
  Profile,
  ConvertOptions,
  ProfileOptions,
  CsvDelimiter,
  TableOptions,
  GnuplotOptions,
  SeriesPoint,
} from './types';

// Errors
export { ParseError, MissingDataError, InvalidArgumentError, EXIT_EOPTION, EXIT_EFORMAT, exitCodeFor } from './errors';

// GPX Parser
export { parseGpx, GPX_PARSER_DEFAULTS } from './gpx-parser';

// Distance Utilities
export {
  EARTH_RADIUS_METERS,
  haversineDistance,
  pointToPointDistance,
  initialBearing,
} from './distance';

// Profile
export { buildProfile, assertAxisData } from './profile-builder';
export { resampleProfile } from './resampler';
export {
  convertProfile,
  resolveTimeZone,
  formatLocalTime,
  METERS_PER_MILE,
  METERS_PER_FOOT,
  UNIT_LABELS,
} from './unit-converter';
export type { TimeZone } from './unit-converter';
export { createProfile, GPX_PROFILE_DEFAULTS } from './gpx-profile';

// Export
export { parseAxisVariable, resolveAxes } from './axes';
export {
  profileSeries,
  formatProfileTable,
  generateGnuplotScript,
  PROFILE_TABLE_DEFAULTS,
} from './profile-export';
