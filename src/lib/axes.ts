import type { AxisVariable, ProfileAxes } from './types';
import { InvalidArgumentError } from './errors';

const AXIS_NAMES: Record<string, AxisVariable> = {
  t: 'time',
  time: 'time',
  d: 'distance',
  dist: 'distance',
  distance: 'distance',
  ele: 'elevation',
  elevation: 'elevation',
  a: 'elevation',
  alt: 'elevation',
  altitude: 'elevation',
  v: 'velocity',
  vel: 'velocity',
  velocity: 'velocity',
};

/**
 * Map a variable name or its short alias ("t", "d", "alt", "v", ...) to an axis variable
 */
export function parseAxisVariable(name: string): AxisVariable {
  const key = name.trim().toLowerCase();
  if (!Object.prototype.hasOwnProperty.call(AXIS_NAMES, key)) {
    throw new InvalidArgumentError(`Unknown variable "${name}"`, 'axis');
  }
  return AXIS_NAMES[key];
}

/**
 * Resolve x/y names into profile axes: time or distance against elevation or velocity
 */
export function resolveAxes(x: string, y: string): ProfileAxes {
  const xVar = parseAxisVariable(x);
  const yVar = parseAxisVariable(y);

  if (xVar !== 'time' && xVar !== 'distance') {
    throw new InvalidArgumentError(`Cannot use ${xVar} on the x axis (expected time or distance)`, 'x');
  }
  if (yVar !== 'elevation' && yVar !== 'velocity') {
    throw new InvalidArgumentError(`Cannot use ${yVar} on the y axis (expected elevation or velocity)`, 'y');
  }

  return { x: xVar, y: yVar };
}
