import { describe, it, expect } from '@jest/globals';
import { discoverListings } from './listingDiscovery';
import {
  FakeDetailView,
  FakeEntry,
  FakePlace,
  FakeResultsPanel,
  NO_WAIT,
  fakePlace,
  fakePlaces,
} from '../test-utils/fakeMaps';

function panelWith(counts: number[], places: FakePlace[]) {
  const view = new FakeDetailView();
  return new FakeResultsPanel(counts, places.map((place) => new FakeEntry(place, view)));
}

describe('discoverListings', () => {
  it('stops when the count stops growing', async () => {
    const panel = panelWith([3, 7, 7], fakePlaces(10));

    const result = await discoverListings(panel, { target: 20, timing: NO_WAIT });

    expect(result.outcome).toBe('exhausted');
    expect(result.entries).toHaveLength(7);
    expect(result.iterations).toBe(3);
    expect(result.lastCount).toBe(7);
  });

  it('truncates to the target once it is reached', async () => {
    const panel = panelWith([5, 12, 25], fakePlaces(25));

    const result = await discoverListings(panel, { target: 20, timing: NO_WAIT });

    expect(result.outcome).toBe('target-reached');
    expect(result.entries).toHaveLength(20);
    expect(result.entries[19].place.label).toBe('Place 20');
    expect(panel.scrolls).toBe(3);
  });

  it('scrolls until exhaustion when no target is given', async () => {
    const panel = panelWith([2, 2], fakePlaces(2));

    const result = await discoverListings(panel, { timing: NO_WAIT });

    expect(result.outcome).toBe('exhausted');
    expect(result.entries.map((entry) => entry.place.label)).toEqual(['Place 1', 'Place 2']);
  });

  it('returns nothing for an empty result list', async () => {
    const panel = panelWith([0], []);

    const result = await discoverListings(panel, { target: 20, timing: NO_WAIT });

    expect(result.outcome).toBe('exhausted');
    expect(result.entries).toEqual([]);
    expect(result.iterations).toBe(1);
  });

  it('drops entries that repeat a detail URL', async () => {
    const places = [fakePlace(1), fakePlace(2), fakePlace(1, { label: 'Place 1 again' }), fakePlace(3)];
    const panel = panelWith([4, 4], places);

    const result = await discoverListings(panel, { timing: NO_WAIT });

    expect(result.entries.map((entry) => entry.place.label)).toEqual(['Place 1', 'Place 2', 'Place 3']);
  });

  it('keeps scrolling when repeated rows make up part of the target', async () => {
    const places = [fakePlace(1), fakePlace(2), fakePlace(2), fakePlace(3), fakePlace(4)];
    const panel = panelWith([3, 5, 5], places);

    const result = await discoverListings(panel, { target: 3, timing: NO_WAIT });

    expect(result.outcome).toBe('target-reached');
    expect(result.iterations).toBe(2);
    expect(result.entries.map((entry) => entry.place.label)).toEqual(['Place 1', 'Place 2', 'Place 3']);
  });

  it('keeps entries that have no detail URL', async () => {
    const places = [fakePlace(1, { key: null }), fakePlace(2, { key: null })];
    const panel = panelWith([2, 2], places);

    const result = await discoverListings(panel, { timing: NO_WAIT });

    expect(result.entries).toHaveLength(2);
  });

  it('gives up after the iteration limit', async () => {
    const panel = panelWith([1, 2, 3, 4, 5, 6], fakePlaces(6));

    const result = await discoverListings(panel, { target: 100, maxIterations: 3, timing: NO_WAIT });

    expect(result.outcome).toBe('gave-up');
    expect(result.iterations).toBe(3);
    expect(result.entries).toHaveLength(3);
    expect(panel.scrolls).toBe(3);
  });

  it('does not scroll once cancelled', async () => {
    const panel = panelWith([5], fakePlaces(5));
    const controller = new AbortController();
    controller.abort();

    const result = await discoverListings(panel, { timing: NO_WAIT, signal: controller.signal });

    expect(result.outcome).toBe('gave-up');
    expect(result.entries).toEqual([]);
    expect(panel.scrolls).toBe(0);
  });
});
