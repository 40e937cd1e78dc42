import { describe, it, expect, beforeEach } from '@jest/globals';
import { FeedTransportError, MemoryStorage, ReportKeyspace, StorageError } from '@wx/shared';
import { MetarIngestor } from '../services/metarIngestor';
import { TafIngestor } from '../services/tafIngestor';
import { AirportIngestor } from '../services/airportIngestor';
import { StubFeedClient, fetched } from './stubFeedClient';

const NOW = new Date('2026-10-19T13:00:00Z');
const FETCHED_AT = new Date('2026-10-19T12:59:00Z');

const METAR_CSV = [
  'No errors',
  'No warnings',
  '5 ms',
  'data source=metars',
  '3 results',
  'raw_text,station_id,observation_time,latitude,longitude,metar_type',
  'UKLL 191200Z 27005MPS CAVOK 12/05 Q1018 NOSIG,UKLL,2026-10-19T12:00:00Z,49.81,23.95,METAR',
  'EPWA 191230Z 25008KT 9999 FEW030 10/04 Q1015,epwa,2026-10-19T12:30:00Z,52.16,20.96,SPECI',
  'EDDF 191200Z 24010KT CAVOK 11/03 Q1016,EDDF,yesterday noon,50.03,8.57,METAR',
  ''
].join('\n');

const TAF_CSV = [
  'No errors',
  'No warnings',
  '3 ms',
  'data source=tafs',
  '2 results',
  'raw_text,station_id,issue_time,valid_time_from,valid_time_to,change_indicator',
  'TAF UKLL 191100Z 1912/2012 27005MPS 9999 BKN030,UKLL,2026-10-19T11:00:00Z,2026-10-19T12:00:00Z,2026-10-20T12:00:00Z,,FM,BECMG',
  'TAF EPWA 190500Z 1906/1912 25008KT 9999 SCT025,EPWA,2026-10-19T05:00:00Z,2026-10-19T06:00:00Z,2026-10-19T12:00:00Z',
  ''
].join('\n');

const AIRPORTS_CSV = [
  '"id","ident","type","name","latitude_deg","longitude_deg","elevation_ft","continent","iso_country","iso_region","municipality","scheduled_service","gps_code"',
  '1,"UKLL","large_airport","Lviv Danylo Halytskyi International Airport",49.8125,23.9561,1071,"EU","UA","UA-46","Lviv","yes","UKLL"',
  '2,"EPWA","large_airport","Warsaw Chopin Airport",52.1657,20.9671,362,"EU","PL","PL-MZ","Warsaw","yes","EPWA"',
  '3,"XX01","closed","Old Field, North",50.0,20.0,100,"EU","PL","PL-MZ","Nowhere","no","XX01"',
  '4,"US-0001","heliport","Roof Pad",40.7,-74.0,40,"NA","US","US-NY","New York","no",""',
  '5,"K2B7","small_airport","Unknown Elevation Field",44.1,-70.1,,"NA","US","US-ME","Town","no","K2B7"',
  '6,"EGLL","large_airport","London Heathrow Airport",51.4706,-0.461941,83,"EU","GB","GB-ENG","London","yes","EGLL"',
  '7,"EPXA","small_airport","Overflow Latitude Field",1e400,20.0,300,"EU","PL","PL-MZ","Nowhere","no","EPXA"',
  '8,"EPXB","small_airport","Overflow Elevation Field",52.0,20.0,99999999999999999999,"EU","PL","PL-MZ","Nowhere","no","EPXB"',
  ''
].join('\n');

describe('Feed ingestors', () => {
  let storage: MemoryStorage;
  let feedClient: StubFeedClient;

  const read = (keyspace: ReportKeyspace, ...codes: string[]) => storage.batchGet(keyspace, codes);

  beforeEach(() => {
    storage = new MemoryStorage(() => NOW.getTime());
    feedClient = new StubFeedClient();
  });

  describe('MetarIngestor', () => {
    const create = () => new MetarIngestor({ url: 'http://feeds.test/metars.csv', storage, feedClient, now: () => NOW });

    it('should store "{type} {raw text}" per station after the info lines', async () => {
      feedClient.enqueue(fetched(METAR_CSV, FETCHED_AT));

      const report = await create().run();

      expect(report).toMatchObject({ feed: 'metar', status: 'updated', stored: 2, skipped: 1, filtered: 0, unchanged: 0 });
      expect(await read('metar', 'UKLL', 'EPWA', 'EDDF')).toEqual([
        'METAR UKLL 191200Z 27005MPS CAVOK 12/05 Q1018 NOSIG',
        'SPECI EPWA 191230Z 25008KT 9999 FEW030 10/04 Q1015',
        ''
      ]);
    });

    it('should expire observations three hours after they were made', async () => {
      const ttls: number[] = [];
      storage.upsertWithTTL = async (_keyspace, _code, _value, ttl) => {
        ttls.push(ttl);
      };
      feedClient.enqueue(fetched(METAR_CSV, FETCHED_AT));

      await create().run();

      // Observed 12:00 and 12:30, now 13:00
      expect(ttls).toEqual([7200, 9000]);
    });

    it('should abort the run on a row of the wrong width, keeping rows already stored', async () => {
      const csv = METAR_CSV.replace('EDDF 191200Z 24010KT CAVOK 11/03 Q1016,EDDF,yesterday noon,50.03,8.57,METAR', 'short,row');
      feedClient.enqueue(fetched(csv, FETCHED_AT));

      const report = await create().run();

      expect(report.status).toBe('failed');
      expect(report.error).toBe('Wrong number of fields: expected 6, got 2 (line 9)');
      expect(report.stored).toBe(2);
    });

    it('should fail the run when a required column is missing', async () => {
      const csv = METAR_CSV.replace(',metar_type', ',flight_category');
      feedClient.enqueue(fetched(csv, FETCHED_AT));

      const report = await create().run();

      expect(report.status).toBe('failed');
      expect(report.error).toBe('Fields not found in CSV header: metar_type');
      expect(await read('metar', 'UKLL')).toEqual(['']);
    });
  });

  describe('TafIngestor', () => {
    const create = () => new TafIngestor({ url: 'http://feeds.test/tafs.csv', storage, feedClient, now: () => NOW });

    it('should accept rows wider than the header', async () => {
      feedClient.enqueue(fetched(TAF_CSV, FETCHED_AT));

      const report = await create().run();

      expect(report).toMatchObject({ feed: 'taf', status: 'updated', stored: 2, skipped: 0 });
      expect(await read('taf', 'UKLL')).toEqual(['TAF UKLL 191100Z 1912/2012 27005MPS 9999 BKN030']);
    });

    it('should remove a forecast whose validity has already ended', async () => {
      await storage.upsertWithTTL('taf', 'EPWA', 'TAF EPWA older', 600);
      feedClient.enqueue(fetched(TAF_CSV, FETCHED_AT));

      await create().run();

      expect(await read('taf', 'EPWA')).toEqual(['']);
    });
  });

  describe('AirportIngestor', () => {
    const create = () => new AirportIngestor({ url: 'http://feeds.test/airports.csv', storage, feedClient });

    it('should create locations and skip closed, unnamed, malformed and out-of-range rows', async () => {
      feedClient.enqueue(fetched(AIRPORTS_CSV, FETCHED_AT));

      const report = await create().run();

      expect(report).toMatchObject({ feed: 'airports', status: 'updated', stored: 3, skipped: 3, filtered: 2, unchanged: 0 });
      expect(await storage.getLocation('UKLL')).toEqual({
        location: 'UKLL',
        name: 'Lviv Danylo Halytskyi International Airport',
        city: 'Lviv',
        countryCode: 'UA',
        latitude: 49.8125,
        longitude: 23.9561,
        altitudeFeet: 1071
      });
      expect(await storage.getLocation('EGLL')).toMatchObject({ longitude: -0.461941, altitudeFeet: 83 });
      expect(await storage.getLocation('XX01')).toBeNull();
      expect(await storage.getLocation('K2B7')).toBeNull();
      expect(await storage.getLocation('EPXA')).toBeNull();
      expect(await storage.getLocation('EPXB')).toBeNull();
    });

    it('should never overwrite an existing location', async () => {
      await storage.createLocationIfAbsent({
        location: 'EPWA',
        name: 'Okecie',
        city: 'Warsaw',
        countryCode: 'PL',
        latitude: 52.1,
        longitude: 20.9,
        altitudeFeet: 360
      });
      feedClient.enqueue(fetched(AIRPORTS_CSV, FETCHED_AT));

      const report = await create().run();

      expect(report.stored).toBe(2);
      expect(report.unchanged).toBe(1);
      expect(await storage.getLocation('EPWA')).toMatchObject({ name: 'Okecie', altitudeFeet: 360 });
    });
  });

  describe('update cycle', () => {
    const create = () => new AirportIngestor({ url: 'http://feeds.test/airports.csv', storage, feedClient });

    it('should pass the time of the last successful fetch to the next one', async () => {
      const ingestor = create();
      feedClient.enqueue(fetched(AIRPORTS_CSV, FETCHED_AT), { status: 'not-modified', lastModified: FETCHED_AT });

      const first = await ingestor.run();
      const second = await ingestor.run();

      expect(first.status).toBe('updated');
      expect(second).toMatchObject({ status: 'not-modified', stored: 0 });
      expect(feedClient.calls.map((call) => call.since)).toEqual([new Date(0), FETCHED_AT]);
      expect(ingestor.lastUpdatedAt).toEqual(FETCHED_AT);
    });

    it('should keep the marker when the fetch fails so the next run retries', async () => {
      const ingestor = create();
      feedClient.enqueue(
        new FeedTransportError('GET http://feeds.test/airports.csv resulted in code 503', 'http://feeds.test/airports.csv'),
        fetched(AIRPORTS_CSV, FETCHED_AT)
      );

      const failed = await ingestor.run();
      const retried = await ingestor.run();

      expect(failed).toMatchObject({ status: 'failed', error: 'GET http://feeds.test/airports.csv resulted in code 503' });
      expect(retried.status).toBe('updated');
      expect(feedClient.calls[1].since).toEqual(new Date(0));
    });

    it('should stop at the first storage failure', async () => {
      let writes = 0;
      storage.createLocationIfAbsent = async () => {
        writes++;
        throw new StorageError('Redis createLocationIfAbsent failed: connection lost', 'createLocationIfAbsent');
      };
      feedClient.enqueue(fetched(AIRPORTS_CSV, FETCHED_AT));

      const report = await create().run();

      expect(report).toMatchObject({
        status: 'failed',
        stored: 0,
        error: 'Redis createLocationIfAbsent failed: connection lost'
      });
      expect(writes).toBe(1);
    });
  });
});
