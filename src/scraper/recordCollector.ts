import { ExtractionError, ParseError, errorMessage, toEntryError } from '../errors/scrape-error';
import { DetailView, ListingEntry } from '../types/maps';
import { CollectionResult, EntryFailure, EntryOutcome, PlaceRecord } from '../types/scrape';
import { logger } from '../utils/logger';
import { SettleTiming, settle } from '../utils/wait';
import { parseCoordinates } from './coordinates';
import { extractFields } from './fieldExtractor';

export interface CollectOptions {
  timing: SettleTiming;
  signal?: AbortSignal;
  onRecord?: (record: PlaceRecord, index: number) => void;
}

async function safeKey(entry: ListingEntry): Promise<string | undefined> {
  try {
    return (await entry.key()) ?? undefined;
  } catch {
    return undefined;
  }
}

/**
 * Opens one entry and turns its detail view into a record. Never throws:
 * any failure comes back as an `EntryFailure`.
 */
export async function collectEntry(
  entry: ListingEntry,
  index: number,
  view: DetailView,
  timing: SettleTiming,
): Promise<EntryOutcome> {
  try {
    const previousUrl = view.currentUrl();
    await entry.activate();
    const loaded = await settle(() => {
      const url = view.currentUrl();
      return url !== previousUrl && url.includes('/@');
    }, timing);
    // Still on the previous place: its fields must not be read under this entry
    if (!loaded && view.currentUrl() === previousUrl) {
      throw new ExtractionError('Detail view did not load');
    }

    const fields = await extractFields(entry, view);
    const { latitude, longitude } = parseCoordinates(view.currentUrl());
    return { ok: true, record: { ...fields, latitude, longitude } };
  } catch (error) {
    const entryError = toEntryError(error);
    const failure: EntryFailure = {
      index,
      key: await safeKey(entry),
      kind: entryError instanceof ParseError ? 'parse' : 'extraction',
      message: errorMessage(entryError),
    };
    return { ok: false, failure };
  }
}

export async function collectRecords(
  entries: ListingEntry[],
  view: DetailView,
  options: CollectOptions,
): Promise<CollectionResult> {
  const records: PlaceRecord[] = [];
  const failures: EntryFailure[] = [];

  for (const [index, entry] of entries.entries()) {
    if (options.signal?.aborted) {
      logger.warn(`Collection cancelled after ${index} of ${entries.length} entries`);
      return { records, failures, cancelled: true };
    }

    const outcome = await collectEntry(entry, index, view, options.timing);
    if (outcome.ok) {
      records.push(outcome.record);
      options.onRecord?.(outcome.record, index);
    } else {
      failures.push(outcome.failure);
      logger.warn(`Skipping entry ${index}: ${outcome.failure.message}`, {
        kind: outcome.failure.kind,
        key: outcome.failure.key,
      });
    }
  }

  return { records, failures, cancelled: false };
}
