import * as fs from 'fs';
import {
  createProfile,
  formatProfileTable,
  generateGnuplotScript,
  resolveAxes,
  InvalidArgumentError,
  EXIT_EOPTION,
  exitCodeFor,
} from '../src/lib/index.js';
import type { CsvDelimiter, ProfileOptions } from '../src/lib/index.js';
import { logError, logInfo } from '../src/lib/logger.js';

const USAGE = `Usage: tsx scripts/gpx-profile.ts [action] [options] <track.gpx | ->

Analyze a GPS track and print its elevation or velocity profile.

Actions:
  --table         print data table (default)
  --gprint        print gnuplot script

Options:
  -h, --help      print this message
  -E              use English units (metric units used by default)
  -x var          plot var = { time | distance } against x-axis
  -y var          plot var = { elevation | velocity } against y-axis
  -o imagefile    make the gnuplot script save to an image (PNG, JPG, EPS, SVG)
  -t tzname       show times in timezone tzname (e.g. 'Europe/Moscow', '+03:00')
  -n N_points     reduce number of points to approximately N_points
  --delimiter c   table delimiter: ',' ';' 'tab' or 'space' (default ',')`;

const DELIMITERS: Record<string, CsvDelimiter> = {
  ',': ',',
  ';': ';',
  tab: '\t',
  space: ' ',
};

interface CliOptions {
  action: 'table' | 'gnuplot';
  profile: Partial<ProfileOptions>;
  x: string;
  y: string;
  output: string | null;
  delimiter: CsvDelimiter;
  file: string;
}

function optionValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined) {
    throw new InvalidArgumentError(`Option ${flag} requires a value`, flag);
  }
  return value;
}

function parseArgs(args: string[]): CliOptions | null {
  const options: CliOptions = {
    action: 'table',
    profile: {},
    x: 'distance',
    y: 'elevation',
    output: null,
    delimiter: ',',
    file: '',
  };
  const files: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-h':
      case '--help':
        return null;
      case '-E':
        options.profile.units = 'imperial';
        break;
      case '--table':
        options.action = 'table';
        break;
      case '--gprint':
        options.action = 'gnuplot';
        break;
      case '-x':
        options.x = optionValue(args, i++, arg);
        break;
      case '-y':
        options.y = optionValue(args, i++, arg);
        break;
      case '-o':
        options.output = optionValue(args, i++, arg);
        break;
      case '-t':
        options.profile.timezone = optionValue(args, i++, arg);
        break;
      case '-n': {
        const value = optionValue(args, i++, arg);
        const n = Number(value);
        if (!Number.isInteger(n) || n <= 0) {
          throw new InvalidArgumentError(`-n expects a positive integer, got "${value}"`, arg);
        }
        options.profile.maxPoints = n;
        break;
      }
      case '--delimiter': {
        const value = optionValue(args, i++, arg);
        const delimiter = DELIMITERS[value];
        if (!delimiter) {
          throw new InvalidArgumentError(`Unknown delimiter "${value}"`, arg);
        }
        options.delimiter = delimiter;
        break;
      }
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new InvalidArgumentError(`Unknown option ${arg}`, arg);
        }
        files.push(arg);
    }
  }

  if (files.length !== 1) {
    throw new InvalidArgumentError(
      files.length === 0 ? 'Please provide a GPX file to process' : 'Only one GPX file should be specified',
      'file'
    );
  }
  options.file = files[0];
  return options;
}

function readInput(file: string): string {
  return fs.readFileSync(file === '-' ? 0 : file, 'utf-8');
}

function main() {
  let options: CliOptions | null;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    logError('gpx-profile', error);
    console.error('See usage: tsx scripts/gpx-profile.ts --help');
    process.exit(EXIT_EOPTION);
  }

  if (options === null) {
    console.log(USAGE);
    process.exit(0);
  }

  try {
    const axes = resolveAxes(options.x, options.y);
    const xml = readInput(options.file);
    logInfo('gpx-profile', 'Read input', { file: options.file, length: xml.length });

    const profile = createProfile(xml, { ...options.profile, ...axes });
    const output = options.action === 'gnuplot'
      ? generateGnuplotScript(profile, axes, { output: options.output })
      : formatProfileTable(profile, { delimiter: options.delimiter });

    process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
  } catch (error) {
    logError('gpx-profile', error, { file: options.file });
    process.exit(exitCodeFor(error));
  }
}

main();
