import { AggregatedView, NotFoundError, ReportKeyspace, StorageEngine, toAggregatedView } from '@wx/shared';
import type { Endpoint } from './requestDispatcher';

/**
 * Builds served views from the store. Each keyspace is read on its own, so
 * an `all` view may combine reports from different ingestion cycles.
 */
export class LocationAggregator {
  constructor(private storage: StorageEngine) {}

  /**
   * Views for the codes that have data for the endpoint, in request order
   */
  async query(endpoint: Endpoint, codes: readonly string[]): Promise<AggregatedView[]> {
    switch (endpoint) {
      case 'metar':
      case 'taf':
        return this.reports(endpoint, codes);
      case 'location': {
        const records = await this.storage.getLocations(codes);
        const views: AggregatedView[] = [];
        for (const record of records) {
          if (record) {
            views.push(toAggregatedView(record));
          }
        }
        return views;
      }
      case 'all': {
        const [records, metars, tafs] = await Promise.all([
          this.storage.getLocations(codes),
          this.storage.batchGet('metar', codes),
          this.storage.batchGet('taf', codes)
        ]);
        const views: AggregatedView[] = [];
        codes.forEach((code, i) => {
          const record = records[i];
          if (!record && !metars[i] && !tafs[i]) {
            return;
          }
          views.push({
            ...(record ? toAggregatedView(record) : { location: code }),
            metar: metars[i] || undefined,
            taf: tafs[i] || undefined
          });
        });
        return views;
      }
    }
  }

  async single(endpoint: Endpoint, code: string): Promise<AggregatedView> {
    const [view] = await this.query(endpoint, [code]);
    if (view) {
      return view;
    }
    // Known location without current data for this endpoint
    if (await this.storage.exists(code)) {
      return { location: code };
    }
    throw new NotFoundError(`Location ${code} is not found`);
  }

  /** Unknown codes are left out */
  async batch(endpoint: Endpoint, codes: readonly string[]): Promise<AggregatedView[]> {
    return this.query(endpoint, codes);
  }

  private async reports(keyspace: ReportKeyspace, codes: readonly string[]): Promise<AggregatedView[]> {
    const values = await this.storage.batchGet(keyspace, codes);
    const views: AggregatedView[] = [];
    values.forEach((value, i) => {
      if (value) {
        views.push(keyspace === 'metar' ? { location: codes[i], metar: value } : { location: codes[i], taf: value });
      }
    });
    return views;
  }
}
