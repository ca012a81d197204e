import { ParseError } from '../errors/scrape-error';
import { DetailRegion, DetailView, ListingEntry } from '../types/maps';
import { PlaceRecord } from '../types/scrape';
import { logger } from '../utils/logger';

export type PlaceFields = Omit<PlaceRecord, 'latitude' | 'longitude'>;

function leadingToken(text: string): string {
  return text.trim().split(/\s+/)[0] ?? '';
}

/** "1,234 reviews" -> 1234 */
export function parseReviewCount(text: string): number {
  const token = leadingToken(text).replace(/[,.]/g, '');
  if (!/^\d+$/.test(token)) {
    throw new ParseError(`Invalid review count '${text}'`, text);
  }
  return Number.parseInt(token, 10);
}

/** "4,5 stars" -> 4.5 */
export function parseRating(label: string): number {
  const token = leadingToken(label).replace(',', '.');
  if (!/^\d+(\.\d+)?$/.test(token)) {
    throw new ParseError(`Invalid rating '${label}'`, label);
  }
  return Number.parseFloat(token);
}

async function readOptionalText(view: DetailView, region: DetailRegion): Promise<string> {
  try {
    if (!(await view.exists(region))) return '';
    const text = await view.text(region);
    return text?.trim() ?? '';
  } catch (error) {
    logger.debug(`Could not read ${region}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return '';
  }
}

async function readName(entry: ListingEntry): Promise<string> {
  try {
    return (await entry.label()) ?? '';
  } catch (error) {
    logger.debug('Could not read entry label', {
      error: error instanceof Error ? error.message : String(error),
    });
    return '';
  }
}

async function readReviewsCount(view: DetailView): Promise<number | undefined> {
  if (!(await view.exists('reviewsCount'))) return undefined;
  const text = await view.text('reviewsCount');
  return parseReviewCount(text ?? '');
}

async function readReviewsAverage(view: DetailView): Promise<number | undefined> {
  if (!(await view.exists('rating'))) return undefined;
  const label = await view.attribute('rating', 'aria-label');
  if (label === null) {
    throw new ParseError('Rating element has no aria-label');
  }
  return parseRating(label);
}

/**
 * Reads every field of the currently open detail view. Text fields degrade to
 * an empty string; review numbers are absent when their element is, and a
 * malformed one throws `ParseError`.
 */
export async function extractFields(entry: ListingEntry, view: DetailView): Promise<PlaceFields> {
  const name = await readName(entry);
  const address = await readOptionalText(view, 'address');
  const website = await readOptionalText(view, 'website');
  const phoneNumber = await readOptionalText(view, 'phone');
  const reviewsCount = await readReviewsCount(view);
  const reviewsAverage = await readReviewsAverage(view);

  return { name, address, website, phoneNumber, reviewsCount, reviewsAverage };
}
