import ukRegionTables from './data/ukRegions.json' with { type: 'json' };
import { UK_REGIONS, UNKNOWN_REGION } from './regions.types.js';
import type { RegionName, RegionTables, UkRegion } from './regions.types.js';

const FRAGMENT_SEPARATOR = /[;|]/;
// Outward code followed by the inward code, e.g. "SW1A 1AA", "M1 1AE", "B33 8TH".
const POSTCODE_PATTERN = /\b([A-Z]{1,2})(\d{1,2})([A-Z]?)\s*\d[A-Z]{2}\b/;
const MEMO_LIMIT = 5000;

const isUkRegion = (value: unknown): value is UkRegion =>
  typeof value === 'string' && (UK_REGIONS as readonly string[]).includes(value);

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

export const parseRegionTables = (value: unknown): RegionTables => {
  if (!isPlainObject(value)) {
    throw new Error('Region tables must be an object.');
  }
  const postcodes: Record<string, UkRegion> = {};
  if (isPlainObject(value.postcodes)) {
    for (const [prefix, region] of Object.entries(value.postcodes)) {
      if (!isUkRegion(region)) {
        throw new Error(`Postcode prefix ${prefix} maps to an unknown region: ${String(region)}`);
      }
      postcodes[prefix.trim().toUpperCase()] = region;
    }
  }
  const places: RegionTables['places'] = [];
  if (Array.isArray(value.places)) {
    for (const entry of value.places) {
      if (!isPlainObject(entry) || !isUkRegion(entry.region) || !Array.isArray(entry.names)) {
        throw new Error('Each place entry needs a known region and a list of names.');
      }
      const names = entry.names
        .filter((name): name is string => typeof name === 'string')
        .map((name) => name.trim().toLowerCase())
        .filter((name) => name.length > 0);
      places.push({ region: entry.region, names });
    }
  }
  return { postcodes, places };
};

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

interface PlaceMatcher {
  region: UkRegion;
  pattern: RegExp;
}

const buildPlaceMatchers = (tables: RegionTables): PlaceMatcher[] =>
  tables.places.flatMap(({ region, names }) =>
    names.map((name) => ({
      region,
      // Word-bounded so "hull" does not fire inside "solihull".
      pattern: new RegExp(`(^|[^a-z])${escapeRegExp(name)}($|[^a-z])`)
    }))
  );

export const extractPostcodeCandidates = (fragment: string): string[] => {
  const match = POSTCODE_PATTERN.exec(fragment.toUpperCase());
  if (!match) {
    return [];
  }
  const [, area, district, suffix] = match;
  const candidates = [`${area}${district}${suffix}`, `${area}${district}`, area];
  return candidates.filter((candidate, index) => candidates.indexOf(candidate) === index);
};

export type RegionClassifier = (location: string | null | undefined) => RegionName;

export const createRegionClassifier = (tables: RegionTables): RegionClassifier => {
  const placeMatchers = buildPlaceMatchers(tables);
  const memo = new Map<string, RegionName>();

  const classifyFragment = (fragment: string): UkRegion | null => {
    for (const candidate of extractPostcodeCandidates(fragment)) {
      const region = tables.postcodes[candidate];
      if (region) {
        return region;
      }
    }
    const lowered = fragment.toLowerCase();
    for (const matcher of placeMatchers) {
      if (matcher.pattern.test(lowered)) {
        return matcher.region;
      }
    }
    return null;
  };

  const classify = (location: string): RegionName => {
    const fragments = location
      .split(FRAGMENT_SEPARATOR)
      .map((fragment) => fragment.trim())
      .filter((fragment) => fragment.length > 0);
    for (const fragment of fragments) {
      const region = classifyFragment(fragment);
      if (region) {
        return region;
      }
    }
    return UNKNOWN_REGION;
  };

  return (location) => {
    if (typeof location !== 'string' || !location.trim()) {
      return UNKNOWN_REGION;
    }
    const cached = memo.get(location);
    if (cached) {
      return cached;
    }
    const region = classify(location);
    if (memo.size >= MEMO_LIMIT) {
      memo.clear();
    }
    memo.set(location, region);
    return region;
  };
};

export const defaultRegionTables = parseRegionTables(ukRegionTables);

export const classifyLocation: RegionClassifier = createRegionClassifier(defaultRegionTables);
