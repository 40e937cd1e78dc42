import { LocationRecord, MemoryStorage } from '@wx/shared';

export const LVIV: LocationRecord = {
  location: 'UKLL',
  name: 'Lviv Danylo Halytskyi International Airport',
  city: 'Lviv',
  countryCode: 'UA',
  latitude: 49.8125,
  longitude: 23.9561,
  altitudeFeet: 1071
};

export const WARSAW: LocationRecord = {
  location: 'EPWA',
  name: 'Warsaw Chopin Airport',
  city: 'Warsaw',
  countryCode: 'PL',
  latitude: 52.1657,
  longitude: 20.9671,
  altitudeFeet: 362
};

export const UKLL_METAR = 'METAR UKLL 191200Z 27005MPS CAVOK 12/05 Q1018 NOSIG';
export const UKLL_TAF = 'TAF UKLL 191100Z 1912/2012 27005MPS 9999 BKN030';
export const EGLL_METAR = 'METAR EGLL 191150Z 24012KT 9999 BKN025 13/08 Q1012';

/**
 * UKLL: location, METAR and TAF
 * EPWA: location only
 * EGLL: METAR only
 */
export async function seededStorage(): Promise<MemoryStorage> {
  const storage = new MemoryStorage();
  await storage.createLocationIfAbsent(LVIV);
  await storage.createLocationIfAbsent(WARSAW);
  await storage.upsertWithTTL('metar', 'UKLL', UKLL_METAR, 600);
  await storage.upsertWithTTL('taf', 'UKLL', UKLL_TAF, 600);
  await storage.upsertWithTTL('metar', 'EGLL', EGLL_METAR, 600);
  return storage;
}
