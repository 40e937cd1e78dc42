/**
 * Weather Update Service
 * Keeps the store filled from the METAR, TAF and airport directory feeds
 */

import { createRedisStorage, errorMessage, schedule, ScheduleHandle, StorageEngine } from '@wx/shared';
import { loadConfig, UpdateConfig } from './config';
import { FeedClient, HttpFeedClient } from './services/feedClient';
import type { FeedRunner } from './services/feedIngestor';
import { MetarIngestor } from './services/metarIngestor';
import { TafIngestor } from './services/tafIngestor';
import { AirportIngestor } from './services/airportIngestor';

interface ScheduledFeed {
  ingestor: FeedRunner;
  intervalMs: number;
}

export class WxUpdateService {
  private feeds: ScheduledFeed[];
  private handles: ScheduleHandle[] = [];

  constructor(
    config: UpdateConfig,
    private storage: StorageEngine,
    feedClient: FeedClient = new HttpFeedClient(config.feedTimeoutMs)
  ) {
    this.feeds = [
      // Airports first: locations are looked up alongside every report
      { ingestor: new AirportIngestor({ url: config.airports.url, storage, feedClient }), intervalMs: config.airports.intervalMs },
      { ingestor: new MetarIngestor({ url: config.metar.url, storage, feedClient }), intervalMs: config.metar.intervalMs },
      { ingestor: new TafIngestor({ url: config.taf.url, storage, feedClient }), intervalMs: config.taf.intervalMs }
    ];
  }

  get ingestors(): FeedRunner[] {
    return this.feeds.map((feed) => feed.ingestor);
  }

  start() {
    if (this.handles.length > 0) {
      throw new Error('Update service is already running');
    }
    this.handles = this.feeds.map(({ ingestor, intervalMs }) => {
      console.log(`[WX-UPDATE] Scheduling ${ingestor.feed} every ${intervalMs}ms`);
      return schedule(() => ingestor.run(), intervalMs, ingestor.feed);
    });
    console.log('🚀 Weather update service started');
  }

  /** Stops scheduling and waits for runs in flight */
  async stop() {
    await Promise.all(this.handles.map((handle) => handle.stop()));
    this.handles = [];
    console.log('[WX-UPDATE] Stopped');
  }

  async shutdown() {
    await this.stop();
    await this.storage.close();
  }
}

async function main() {
  const config = loadConfig();
  const storage = await createRedisStorage(config.redis);
  const service = new WxUpdateService(config, storage);
  service.start();

  const onSignal = (signal: string) => {
    console.log(`[WX-UPDATE] ${signal} received, shutting down`);
    service.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('❌ Shutdown failed:', errorMessage(error));
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('❌ Weather update service failed to start', error);
    process.exit(1);
  });
}
