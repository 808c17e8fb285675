export class ParseError extends Error {
  constructor(
    message: string,
    public location?: string
  ) {
    super(location ? `${message} (at ${location})` : message);
    this.name = 'ParseError';
  }
}

export class MissingDataError extends Error {
  constructor(
    message: string,
    public field: 'time' | 'elevation'
  ) {
    super(message);
    this.name = 'MissingDataError';
  }
}

export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public argument: string
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export const EXIT_EOPTION = 1;
export const EXIT_EFORMAT = 3;

/**
 * Process exit code for an error raised while producing a profile:
 * bad options give EXIT_EOPTION, unreadable or malformed input and
 * missing data give EXIT_EFORMAT.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof InvalidArgumentError && error.argument !== 'output') {
    return EXIT_EOPTION;
  }
  return EXIT_EFORMAT;
}
