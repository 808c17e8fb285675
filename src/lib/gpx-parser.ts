import { JSDOM } from 'jsdom';
import type { GpxPoint, GpxSegment, GpxTrack, ParseOptions } from './types';
import { ParseError } from './errors';

const DEFAULT_OPTIONS: ParseOptions = {
  fillGaps: false,
};

// Date, optional time (T or space separated) and optional Z / ±hh:mm / ±hhmm zone
const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(z|[+-]\d{2}:?\d{2})?)?$/i;

/**
 * Parse XML into a document using jsdom's DOMParser (for Node.js environment)
 */
function parseXml(xml: string): Document {
  if (!xml.trim()) {
    throw new ParseError('Invalid GPX XML: empty input');
  }

  const { window } = new JSDOM('');
  let doc: Document;
  try {
    doc = new window.DOMParser().parseFromString(xml, 'text/xml');
  } catch (error) {
    throw new ParseError('Invalid GPX XML: ' + (error instanceof Error ? error.message : String(error)));
  }

  // Check for parse errors
  const parseError = doc.getElementsByTagName('parsererror')[0];
  if (parseError) {
    throw new ParseError('Invalid GPX XML: ' + (parseError.textContent || '').trim());
  }

  const root = doc.documentElement;
  if (!root || root.localName !== 'gpx') {
    throw new ParseError(`Not a GPX document: root element is <${root ? root.localName : ''}>`);
  }

  return doc;
}

/**
 * Direct children with the given local name, in any namespace (GPX 1.0, 1.1 or none)
 */
function childElements(parent: Element, localName: string): Element[] {
  return Array.from(parent.children).filter(el => el.localName === localName);
}

function childText(parent: Element, localName: string): string | null {
  const text = childElements(parent, localName)[0]?.textContent?.trim();
  return text ? text : null;
}

function parseCoordinate(pt: Element, attr: 'lat' | 'lon', location: string): number {
  const raw = pt.getAttribute(attr);
  if (raw === null || raw.trim() === '') {
    throw new ParseError(`Missing ${attr} attribute`, location);
  }

  const value = parseFloat(raw);
  const limit = attr === 'lat' ? 90 : 180;
  if (!Number.isFinite(value)) {
    throw new ParseError(`Invalid ${attr} "${raw}"`, location);
  }
  if (Math.abs(value) > limit) {
    throw new ParseError(`${attr} ${value} out of range [-${limit}, ${limit}]`, location);
  }
  return value;
}

function parseElevation(pt: Element, location: string): number | null {
  const text = childText(pt, 'ele');
  if (text === null) return null;

  const value = parseFloat(text);
  if (!Number.isFinite(value)) {
    throw new ParseError(`Invalid elevation "${text}"`, location);
  }
  return value;
}

/**
 * Normalize a GPX timestamp to an ISO-8601 UTC string.
 * GPX times are UTC; a date-time without a zone designator is read as UTC,
 * never in the host's local zone.
 */
function parseTime(pt: Element, location: string): string | null {
  const text = childText(pt, 'time');
  if (text === null) return null;

  const match = text.match(ISO_DATE_TIME);
  let ms = NaN;
  if (match) {
    const [, date, clock, zone] = match;
    const offset = !zone || zone.toUpperCase() === 'Z' ? 'Z' : zone.replace(/^([+-]\d{2}):?(\d{2})$/, '$1:$2');
    ms = Date.parse(`${date}T${clock ?? '00:00:00'}${offset}`);
  }
  if (Number.isNaN(ms)) {
    throw new ParseError(`Invalid timestamp "${text}"`, location);
  }
  return new Date(ms).toISOString();
}

function parseSegment(
  container: Element,
  pointTag: string,
  location: string,
  opts: ParseOptions
): GpxSegment {
  const points: GpxPoint[] = [];
  let prevEle: number | null = null;
  let prevTime: string | null = null;

  childElements(container, pointTag).forEach((pt, index) => {
    const pointLocation = `${location}/${pointTag}[${index}]`;
    let ele = parseElevation(pt, pointLocation);
    let time = parseTime(pt, pointLocation);

    if (opts.fillGaps) {
      ele = ele ?? prevEle;
      time = time ?? prevTime;
      prevEle = ele;
      prevTime = time;
    }

    points.push({
      lat: parseCoordinate(pt, 'lat', pointLocation),
      lon: parseCoordinate(pt, 'lon', pointLocation),
      ele,
      time,
    });
  });

  return { points };
}

/**
 * Parse GPX XML content into a single track of ordered segments.
 *
 * Every <trkseg> of every <trk> becomes one segment, in document order.
 * When the file has no track segments, each <rte> is read as a segment
 * of its <rtept> points instead.
 *
 * Missing <ele> and <time> are kept as null unless `fillGaps` is set, in
 * which case the previous point's values are carried forward.
 */
export function parseGpx(xml: string, options: Partial<ParseOptions> = {}): GpxTrack {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const doc = parseXml(xml);

  const tracks = Array.from(doc.getElementsByTagNameNS('*', 'trk'));
  const name = childText(tracks[0] ?? doc.documentElement, 'name') ?? '';

  const segments = tracks.flatMap((trk, i) =>
    childElements(trk, 'trkseg').map((seg, j) => parseSegment(seg, 'trkpt', `trk[${i}]/trkseg[${j}]`, opts))
  );
  if (segments.length > 0) {
    return { name, segments };
  }

  // Try routes if the track is missing
  const routes = Array.from(doc.getElementsByTagNameNS('*', 'rte'));
  return {
    name: routes[0] ? childText(routes[0], 'name') ?? '' : name,
    segments: routes.map((rte, i) => parseSegment(rte, 'rtept', `rte[${i}]`, opts)),
  };
}

export { DEFAULT_OPTIONS as GPX_PARSER_DEFAULTS };
