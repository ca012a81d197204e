import { describe, it, expect } from '@jest/globals';
import { ScrapeService } from './scrape.service';
import { loadConfig } from '../config';
import { MapsSession, MapsSessionProvider, SessionOptions } from '../types/maps';
import { StreamEvent } from '../types/scrape';
import { FakeMapsSession, MemorySink, fakePlaces } from '../test-utils/fakeMaps';

const config = loadConfig({
  OUTPUT_DIR: 'exports',
  SCROLL_TIMEOUT_MS: '0',
  DETAIL_TIMEOUT_MS: '0',
  FALLBACK_DELAY_MS: '0',
});

class FakeSessionProvider implements MapsSessionProvider {
  readonly calls: SessionOptions[] = [];

  constructor(private readonly session: MapsSession | Error) {}

  async withMapsSession<T>(
    handler: (session: MapsSession) => Promise<T>,
    options: SessionOptions = {},
  ): Promise<T> {
    this.calls.push(options);
    if (this.session instanceof Error) {
      throw this.session;
    }
    return handler(this.session);
  }
}

function setup(session: MapsSession | Error) {
  const provider = new FakeSessionProvider(session);
  const sink = new MemorySink();
  const sinkDirs: string[] = [];
  const events: StreamEvent[] = [];
  const service = new ScrapeService(config, provider, (dir) => {
    sinkDirs.push(dir);
    return sink;
  });
  return { provider, sink, sinkDirs, events, service };
}

describe('ScrapeService', () => {
  it('stamps every event with the request id and a timestamp', async () => {
    const { events, service } = setup(
      new FakeMapsSession({ bakeries: { counts: [1, 1], places: fakePlaces(1) } }),
    );

    const summary = await service.run(
      { queries: ['bakeries'] },
      { requestId: 'req-1', onStream: (event) => events.push(event) },
    );

    expect(summary.reports.map((report) => report.status)).toEqual(['completed']);
    expect(events.map((event) => event.type)).toEqual(['progress', 'progress', 'data', 'complete']);
    expect(events.map((event) => event.requestId)).toEqual(['req-1', 'req-1', 'req-1', 'req-1']);
    expect(events.every((event) => typeof event.timestamp === 'number')).toBe(true);
  });

  it('writes to the configured output directory by default', async () => {
    const { provider, sink, sinkDirs, service } = setup(
      new FakeMapsSession({ bakeries: { counts: [1, 1], places: fakePlaces(1) } }),
    );

    await service.run({ queries: ['bakeries'] }, { requestId: 'req-2' });

    expect(sinkDirs).toEqual(['exports']);
    expect(sink.writes.map((write) => write.name)).toEqual(['google_maps_data_bakeries']);
    expect(provider.calls).toEqual([{ headless: undefined, requestId: 'req-2' }]);
  });

  it('honours a per-request output directory and headless flag', async () => {
    const { provider, sinkDirs, service } = setup(new FakeMapsSession({}));

    await service.run(
      { queries: ['bakeries'], options: { outputDir: 'custom', headless: false } },
      { requestId: 'req-3' },
    );

    expect(sinkDirs).toEqual(['custom']);
    expect(provider.calls).toEqual([{ headless: false, requestId: 'req-3' }]);
  });

  it('emits an error event and rethrows when the session cannot open', async () => {
    const { events, service } = setup(new Error('browser failed to launch'));

    await expect(
      service.run({ queries: ['bakeries'] }, { requestId: 'req-4', onStream: (event) => events.push(event) }),
    ).rejects.toThrow('browser failed to launch');

    expect(events.map((event) => event.type)).toEqual(['progress', 'error']);
    expect(events[1]).toMatchObject({ type: 'error', error: 'browser failed to launch', requestId: 'req-4' });
  });
});
