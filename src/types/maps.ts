/**
 * Browser capability boundary. The scraper core only talks to these
 * interfaces; `sites/maps/googlemaps.site.ts` implements them with Playwright.
 */

export type DetailRegion = 'address' | 'website' | 'phone' | 'reviewsCount' | 'rating';

/** One result row in the listing panel. */
export interface ListingEntry {
  /** Stable identity (the detail-page URL) used to dedupe across scroll passes. */
  key(): Promise<string | null>;
  /** Accessible label of the entry itself, used as the place name. */
  label(): Promise<string | null>;
  /** Selects the entry so that the detail view loads it. */
  activate(): Promise<void>;
}

export interface ResultsPanel<E extends ListingEntry = ListingEntry> {
  scroll(): Promise<void>;
  count(): Promise<number>;
  entries(): Promise<E[]>;
}

/** The detail view of whichever entry was activated last. */
export interface DetailView {
  exists(region: DetailRegion): Promise<boolean>;
  text(region: DetailRegion): Promise<string | null>;
  attribute(region: DetailRegion, name: string): Promise<string | null>;
  currentUrl(): string;
}

export interface MapsSession<E extends ListingEntry = ListingEntry> {
  /** Types the query into the search box, submits it and waits for results. */
  search(query: string): Promise<void>;
  resultsPanel(): ResultsPanel<E>;
  detailView(): DetailView;
  /** False once the underlying browser page or context has gone away. */
  isOpen(): boolean;
}

export interface SessionOptions {
  headless?: boolean;
  requestId?: string;
}

/** Opens a session on the maps search page that lives as long as `handler` runs. */
export interface MapsSessionProvider {
  withMapsSession<T>(handler: (session: MapsSession) => Promise<T>, options?: SessionOptions): Promise<T>;
}
