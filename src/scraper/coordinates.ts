import { ParseError } from '../errors/scrape-error';
import { Coordinates } from '../types/scrape';

const COORDINATE_MARKER = '/@';

function parseFloatStrict(token: string | undefined): number | undefined {
  const trimmed = token?.trim();
  if (!trimmed || !/^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i.test(trimmed)) {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Reads the map centre out of a place URL such as
 * `https://www.google.com/maps/place/Cafe/@12.34,-56.78,17z/data=...`.
 */
export function parseCoordinates(url: string): Coordinates {
  const markerIndex = url.indexOf(COORDINATE_MARKER);
  if (markerIndex === -1) {
    throw new ParseError(`No coordinate segment in URL '${url}'`, url);
  }

  const segment = url.slice(markerIndex + COORDINATE_MARKER.length).split('/')[0];
  const tokens = segment.split(',');
  if (tokens.length < 2) {
    throw new ParseError(`Expected latitude and longitude in '${segment}'`, url);
  }

  const latitude = parseFloatStrict(tokens[0]);
  const longitude = parseFloatStrict(tokens[1]);
  if (latitude === undefined || longitude === undefined) {
    throw new ParseError(`Invalid coordinates '${tokens[0]},${tokens[1]}'`, url);
  }

  return { latitude, longitude };
}
