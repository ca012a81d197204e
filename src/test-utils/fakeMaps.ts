import {
  DetailRegion,
  DetailView,
  ListingEntry,
  MapsSession,
  ResultsPanel,
} from '../types/maps';
import { RecordBatch, RecordSink } from '../types/scrape';
import { SettleTiming } from '../utils/wait';

export const NO_WAIT: SettleTiming = { timeoutMs: 0, pollIntervalMs: 1, fallbackDelayMs: 0 };

export const START_URL = 'https://www.google.com/maps';

export interface FakeRegion {
  text?: string | null;
  attributes?: Record<string, string>;
  /** Reads from this region throw, like a detached element. */
  fail?: boolean;
}

export interface FakePlace {
  key?: string | null;
  label?: string | null;
  url?: string;
  regions?: Partial<Record<DetailRegion, FakeRegion>>;
  activateError?: Error;
  /** Clicking does nothing, so the detail view keeps showing the previous place. */
  ignoresClick?: boolean;
}

/** A place whose every field is present and parseable. */
export function fakePlace(n: number, overrides: Partial<FakePlace> = {}): FakePlace {
  return {
    key: `https://www.google.com/maps/place/Place+${n}/data=!4m${n}`,
    label: `Place ${n}`,
    url: `https://www.google.com/maps/place/Place+${n}/@40.${n},-73.${n},17z/data=!4m${n}`,
    regions: {
      address: { text: ` ${n} Main St ` },
      website: { text: `place${n}.example.com` },
      phone: { text: `+1 555-010${n}` },
      reviewsCount: { text: '1,234 reviews' },
      rating: { attributes: { 'aria-label': '4.5 stars' } },
    },
    ...overrides,
  };
}

export function fakePlaces(count: number): FakePlace[] {
  return Array.from({ length: count }, (_, index) => fakePlace(index + 1));
}

export class FakeDetailView implements DetailView {
  url = START_URL;
  current?: FakePlace;

  show(place: FakePlace) {
    this.current = place;
    if (place.url) {
      this.url = place.url;
    }
  }

  private region(region: DetailRegion): FakeRegion {
    const found = this.current?.regions?.[region];
    if (!found) {
      throw new Error(`No element for ${region}`);
    }
    if (found.fail) {
      throw new Error(`Element for ${region} is detached`);
    }
    return found;
  }

  async exists(region: DetailRegion): Promise<boolean> {
    return this.current?.regions?.[region] !== undefined;
  }

  async text(region: DetailRegion): Promise<string | null> {
    return this.region(region).text ?? null;
  }

  async attribute(region: DetailRegion, name: string): Promise<string | null> {
    return this.region(region).attributes?.[name] ?? null;
  }

  currentUrl(): string {
    return this.url;
  }
}

export class FakeEntry implements ListingEntry {
  activations = 0;

  constructor(
    readonly place: FakePlace,
    private readonly view: FakeDetailView,
  ) {}

  async key(): Promise<string | null> {
    return this.place.key ?? null;
  }

  async label(): Promise<string | null> {
    return this.place.label ?? null;
  }

  async activate(): Promise<void> {
    this.activations++;
    if (this.place.activateError) {
      throw this.place.activateError;
    }
    if (this.place.ignoresClick) return;
    this.view.show(this.place);
  }
}

/**
 * Results panel whose visible count after the n-th scroll is `counts[n - 1]`
 * (the last value repeats once the sequence runs out).
 */
export class FakeResultsPanel implements ResultsPanel<FakeEntry> {
  scrolls = 0;

  constructor(
    private readonly counts: number[],
    private readonly pool: FakeEntry[],
  ) {}

  async scroll(): Promise<void> {
    this.scrolls++;
  }

  async count(): Promise<number> {
    if (this.scrolls === 0 || this.counts.length === 0) return 0;
    return this.counts[Math.min(this.scrolls, this.counts.length) - 1];
  }

  async entries(): Promise<FakeEntry[]> {
    return this.pool.slice(0, await this.count());
  }
}

export interface FakeQueryScenario {
  counts: number[];
  places: FakePlace[];
}

export interface FakeSearchFailure {
  error: Error;
  closesSession?: boolean;
}

export class FakeMapsSession implements MapsSession<FakeEntry> {
  readonly view = new FakeDetailView();
  readonly searches: string[] = [];
  open = true;
  private panel = new FakeResultsPanel([], []);

  constructor(private readonly scenarios: Record<string, FakeQueryScenario | FakeSearchFailure>) {}

  async search(query: string): Promise<void> {
    this.searches.push(query);
    const scenario = this.scenarios[query];
    if (scenario && 'error' in scenario) {
      if (scenario.closesSession) {
        this.open = false;
      }
      throw scenario.error;
    }
    const { counts, places } = scenario ?? { counts: [0], places: [] };
    this.panel = new FakeResultsPanel(
      counts,
      places.map((place) => new FakeEntry(place, this.view)),
    );
  }

  resultsPanel(): FakeResultsPanel {
    return this.panel;
  }

  detailView(): DetailView {
    return this.view;
  }

  isOpen(): boolean {
    return this.open;
  }
}

export class MemorySink implements RecordSink {
  readonly writes: { name: string; records: RecordBatch }[] = [];

  async write(name: string, records: RecordBatch): Promise<string[]> {
    this.writes.push({ name, records: [...records] });
    return [`${name}.xlsx`, `${name}.csv`];
  }
}
