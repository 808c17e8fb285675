import Papa from 'papaparse';
import type {
  GnuplotOptions,
  Profile,
  ProfileAxes,
  ProfileSample,
  SeriesPoint,
  TableOptions,
} from './types';
import { InvalidArgumentError, MissingDataError } from './errors';
import { UNIT_LABELS } from './unit-converter';

const DEFAULT_TABLE_OPTIONS: TableOptions = {
  delimiter: ',',
  precision: 3,
};

const DEFAULT_GNUPLOT_OPTIONS: GnuplotOptions = {
  output: null,
};

const GNUPLOT_TERMINALS: Record<string, string> = {
  png: 'png',
  jpg: 'jpeg',
  jpeg: 'jpeg',
  eps: 'post eps',
  svg: 'svg',
};

/**
 * Split samples into runs, one per source segment
 */
function segmentRuns(samples: readonly ProfileSample[]): ProfileSample[][] {
  const runs: ProfileSample[][] = [];
  for (const sample of samples) {
    const current = runs[runs.length - 1];
    if (!current || sample.segmentStart) {
      runs.push([sample]);
    } else {
      current.push(sample);
    }
  }
  return runs;
}

function xValue(sample: ProfileSample, axes: ProfileAxes): number | null {
  return axes.x === 'time' ? sample.elapsed : sample.distance;
}

function yValue(sample: ProfileSample, axes: ProfileAxes): number | null {
  return axes.y === 'elevation' ? sample.ele : sample.velocity;
}

/**
 * Extract (x, y) pairs for plotting, one array per segment.
 * Samples missing either value are skipped; segments left empty are dropped.
 */
export function profileSeries(profile: Profile, axes: ProfileAxes): SeriesPoint[][] {
  const { samples } = profile;
  if (samples.length === 0) return [];

  if ((axes.x === 'time' || axes.y === 'velocity') && !samples.some(s => s.elapsed !== null)) {
    throw new MissingDataError(`Cannot plot ${axes.y} against ${axes.x}: profile has no time data`, 'time');
  }
  if (axes.y === 'elevation' && !samples.some(s => s.ele !== null)) {
    throw new MissingDataError('Cannot plot elevation: profile has no elevation data', 'elevation');
  }

  return segmentRuns(samples)
    .map(run => {
      const points: SeriesPoint[] = [];
      for (const sample of run) {
        const x = xValue(sample, axes);
        const y = yValue(sample, axes);
        if (x !== null && y !== null) {
          points.push([x, y]);
        }
      }
      return points;
    })
    .filter(points => points.length > 0);
}

/**
 * Format a profile as a delimited table with a unit-labelled header.
 * Segments are separated by a blank line; missing values are left empty.
 */
export function formatProfileTable(profile: Profile, options: Partial<TableOptions> = {}): string {
  const opts = { ...DEFAULT_TABLE_OPTIONS, ...options };
  const labels = UNIT_LABELS[profile.units];
  const format = (value: number | null) => value === null ? '' : value.toFixed(opts.precision);
  const unparseOptions = { delimiter: opts.delimiter, newline: '\n' };

  const header = Papa.unparse([[
    'Time',
    'Elapsed (s)',
    `Distance (${labels.distance})`,
    `Elevation (${labels.ele})`,
    `Velocity (${labels.velocity})`,
  ]], unparseOptions);

  const blocks = segmentRuns(profile.samples).map(run =>
    Papa.unparse(run.map(sample => [
      sample.time ?? '',
      format(sample.elapsed),
      format(sample.distance),
      format(sample.ele),
      format(sample.velocity),
    ]), unparseOptions)
  );

  return blocks.length > 0 ? `${header}\n${blocks.join('\n\n')}` : header;
}

/**
 * Generate a gnuplot script with the profile inlined as data.
 * Each segment becomes its own data block so gnuplot breaks the line
 * between them. With `output`, the terminal is chosen from its extension.
 */
export function generateGnuplotScript(
  profile: Profile,
  axes: ProfileAxes,
  options: Partial<GnuplotOptions> = {}
): string {
  const opts = { ...DEFAULT_GNUPLOT_OPTIONS, ...options };
  const labels = UNIT_LABELS[profile.units];
  const lines: string[] = ['unset key'];

  lines.push(axes.x === 'time'
    ? "set xlabel 'elapsed time, s'"
    : `set xlabel 'distance, ${labels.distance}'`);
  lines.push(axes.y === 'elevation'
    ? `set ylabel 'elevation, ${labels.ele}'`
    : `set ylabel 'velocity, ${labels.velocity}'`);

  if (opts.output) {
    const ext = opts.output.toLowerCase().split('.').pop() ?? '';
    const terminal = GNUPLOT_TERMINALS[ext];
    if (!terminal) {
      throw new InvalidArgumentError(`Unsupported image type "${ext}"`, 'output');
    }
    const output = opts.output.replace(/'/g, "''");
    lines.push(`set terminal ${terminal}; set output '${output}'`);
  }

  lines.push("plot '-' u 1:2 w l");
  const blocks = profileSeries(profile, axes).map(points =>
    points.map(([x, y]) => `${x} ${y}`).join('\n')
  );
  if (blocks.length > 0) {
    lines.push(blocks.join('\n\n'));
  }
  lines.push('e');

  return lines.join('\n') + '\n';
}

export { DEFAULT_TABLE_OPTIONS as PROFILE_TABLE_DEFAULTS };
