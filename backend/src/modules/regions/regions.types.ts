export const UK_REGIONS = [
  'London',
  'South East',
  'South West',
  'East of England',
  'East Midlands',
  'West Midlands',
  'Yorkshire and the Humber',
  'North West',
  'North East',
  'Scotland',
  'Wales',
  'Northern Ireland'
] as const;

export type UkRegion = (typeof UK_REGIONS)[number];

export const UNKNOWN_REGION = 'Unknown';

export type RegionName = UkRegion | typeof UNKNOWN_REGION;

export interface RegionTables {
  postcodes: Record<string, UkRegion>;
  // Checked in order; earlier entries win when several names appear in one fragment.
  places: Array<{ region: UkRegion; names: string[] }>;
}
