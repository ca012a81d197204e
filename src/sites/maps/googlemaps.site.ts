import { Locator, Page } from 'playwright';
import { TimingConfig } from '../../config';
import {
  DetailRegion,
  DetailView,
  ListingEntry,
  MapsSession,
  ResultsPanel,
} from '../../types/maps';
import { logger } from '../../utils/logger';
import { settle } from '../../utils/wait';

const SEARCH_INPUT = '//input[@id="searchboxinput"]';
const PLACE_LINK = '//a[contains(@href, "https://www.google.com/maps/place")]';
const RESULTS_FEED = 'div[role="feed"]';
const SCROLL_STEP = 10_000;

const DETAIL_REGIONS: Record<DetailRegion, string> = {
  address: '//button[@data-item-id="address"]//div[contains(@class, "fontBodyMedium")]',
  website: '//a[@data-item-id="authority"]//div[contains(@class, "fontBodyMedium")]',
  phone: '//button[contains(@data-item-id, "phone:tel:")]//div[contains(@class, "fontBodyMedium")]',
  reviewsCount: '//button[@jsaction="pane.reviewChart.moreReviews"]//span',
  rating: '//div[@jsaction="pane.reviewChart.moreReviews"]//div[@role="img"]',
};

export class GoogleMapsListingEntry implements ListingEntry {
  constructor(private readonly link: Locator) {}

  key(): Promise<string | null> {
    return this.link.getAttribute('href');
  }

  label(): Promise<string | null> {
    return this.link.getAttribute('aria-label');
  }

  async activate(): Promise<void> {
    // The link's parent row is the clickable container
    await this.link.locator('xpath=..').click();
  }
}

export class GoogleMapsResultsPanel implements ResultsPanel<GoogleMapsListingEntry> {
  constructor(private readonly page: Page) {}

  async scroll(): Promise<void> {
    const feed = this.page.locator(RESULTS_FEED).first();
    if (await feed.count() > 0) {
      await feed.evaluate((el) => {
        el.scrollTop = el.scrollHeight;
      });
      return;
    }

    // Fallback: wheel over the first result so the list pane receives it
    const firstLink = this.page.locator(PLACE_LINK).first();
    if (await firstLink.count() > 0) {
      await firstLink.hover();
    }
    await this.page.mouse.wheel(0, SCROLL_STEP);
  }

  count(): Promise<number> {
    return this.page.locator(PLACE_LINK).count();
  }

  async entries(): Promise<GoogleMapsListingEntry[]> {
    const links = await this.page.locator(PLACE_LINK).all();
    return links.map((link) => new GoogleMapsListingEntry(link));
  }
}

export class GoogleMapsDetailView implements DetailView {
  constructor(private readonly page: Page) {}

  private region(region: DetailRegion): Locator {
    return this.page.locator(DETAIL_REGIONS[region]).first();
  }

  async exists(region: DetailRegion): Promise<boolean> {
    return (await this.page.locator(DETAIL_REGIONS[region]).count()) > 0;
  }

  text(region: DetailRegion): Promise<string | null> {
    return this.region(region).textContent();
  }

  attribute(region: DetailRegion, name: string): Promise<string | null> {
    return this.region(region).getAttribute(name);
  }

  currentUrl(): string {
    return this.page.url();
  }
}

/**
 * Google Maps search page driven through one Playwright page. The page must
 * already be on the maps entry URL.
 */
export class GoogleMapsSession implements MapsSession<GoogleMapsListingEntry> {
  private readonly panel: GoogleMapsResultsPanel;
  private readonly view: GoogleMapsDetailView;

  constructor(
    private readonly page: Page,
    private readonly timing: TimingConfig,
  ) {
    this.panel = new GoogleMapsResultsPanel(page);
    this.view = new GoogleMapsDetailView(page);
  }

  async waitUntilReady(): Promise<boolean> {
    const ready = await settle(
      async () => (await this.page.locator(SEARCH_INPUT).count()) > 0,
      this.timing.search,
    );
    if (!ready) {
      logger.warn('Search box did not appear before the timeout');
    }
    return ready;
  }

  async search(query: string): Promise<void> {
    await this.page.locator(SEARCH_INPUT).fill(query);
    await this.page.keyboard.press('Enter');

    const found = await settle(
      async () => (await this.panel.count()) > 0,
      this.timing.search,
    );
    if (!found) {
      logger.info(`No listings appeared for "${query}" before the timeout`);
    }
  }

  resultsPanel(): GoogleMapsResultsPanel {
    return this.panel;
  }

  detailView(): DetailView {
    return this.view;
  }

  isOpen(): boolean {
    return !this.page.isClosed();
  }
}
