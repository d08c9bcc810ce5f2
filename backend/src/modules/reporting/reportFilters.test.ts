import { describe, expect, it } from 'vitest';
import { applyReportFilters, dimensionValues, hasActiveFilters, isActiveDuring } from './reportFilters.js';
import type { ReportFilters, ReportRow } from './reporting.types.js';

const row = (entityId: string, overrides: Partial<ReportRow> = {}): ReportRow => ({
  entityId,
  eventName: 'visit',
  eventDate: '2024-03-10',
  title: null,
  organization: 'Northwind',
  region: 'London',
  importer: 'Feed A',
  occupations: [],
  upgrades: [],
  workflowState: 'published',
  publishingDate: null,
  expirationDate: null,
  matched: true,
  ...overrides
});

const ids = (rows: ReportRow[]) => rows.map((item) => item.entityId);

describe('dimensionValues', () => {
  it('fans out multi-valued dimensions and substitutes defaults for empty ones', () => {
    const tagged = row('A', { occupations: ['Care', 'Admin'], upgrades: ['Featured'] });
    expect(dimensionValues(tagged, 'occupation')).toEqual(['Care', 'Admin']);
    expect(dimensionValues(tagged, 'upgrade')).toEqual(['Featured']);
    expect(dimensionValues(row('B'), 'occupation')).toEqual(['Unknown']);
    expect(dimensionValues(row('B'), 'upgrade')).toEqual(['None']);
    expect(dimensionValues(row('B'), 'region')).toEqual(['London']);
  });
});

describe('applyReportFilters', () => {
  const rows = [
    row('A', { region: 'London', importer: 'Feed A', occupations: ['Care'] }),
    row('B', { region: 'Wales', importer: 'Feed A', occupations: ['Admin', 'Care'] }),
    row('C', { region: 'Wales', importer: 'Feed B' }),
    row('D', { region: 'Scotland', importer: 'Feed B', upgrades: ['Featured'] })
  ];

  it('returns the input untouched when no filter is set', () => {
    expect(applyReportFilters(rows)).toBe(rows);
    expect(hasActiveFilters({ regions: [], title: '  ' })).toBe(false);
  });

  it('combines values of one dimension with OR', () => {
    expect(ids(applyReportFilters(rows, { regions: ['London', 'Scotland'] }))).toEqual(['A', 'D']);
  });

  it('combines dimensions with AND', () => {
    expect(ids(applyReportFilters(rows, { regions: ['Wales'], importers: ['Feed A'] }))).toEqual(['B']);
  });

  it('matches any tag of a multi-valued dimension, including the defaults', () => {
    expect(ids(applyReportFilters(rows, { occupations: ['Care'] }))).toEqual(['A', 'B']);
    expect(ids(applyReportFilters(rows, { occupations: ['Unknown'] }))).toEqual(['C', 'D']);
    expect(ids(applyReportFilters(rows, { upgrades: ['None'] }))).toEqual(['A', 'B', 'C']);
  });

  it('searches titles case-insensitively', () => {
    const titled = [row('A', { title: 'Senior Care Assistant' }), row('B', { title: 'Driver' }), row('C')];
    expect(ids(applyReportFilters(titled, { title: ' care ' }))).toEqual(['A']);
  });

  it('gives the same rows whichever order the filters are applied in', () => {
    const byRegion: ReportFilters = { regions: ['Wales', 'Scotland'] };
    const byImporter: ReportFilters = { importers: ['Feed B'] };
    const regionFirst = applyReportFilters(applyReportFilters(rows, byRegion), byImporter);
    const importerFirst = applyReportFilters(applyReportFilters(rows, byImporter), byRegion);
    const combined = applyReportFilters(rows, { ...byRegion, ...byImporter });

    expect(ids(regionFirst)).toEqual(['C', 'D']);
    expect(ids(importerFirst)).toEqual(ids(regionFirst));
    expect(ids(combined)).toEqual(ids(regionFirst));
  });
});

describe('date range filtering', () => {
  const range = { start: '2024-03-01', end: '2024-03-31' };

  it('treats unknown publishing and expiration dates as open bounds', () => {
    expect(isActiveDuring(row('A'), range)).toBe(true);
    expect(isActiveDuring(row('A', { publishingDate: '2024-04-01' }), range)).toBe(false);
    expect(isActiveDuring(row('A', { expirationDate: '2024-02-29' }), range)).toBe(false);
    expect(isActiveDuring(row('A', { publishingDate: '2024-02-01', expirationDate: '2024-03-01' }), range)).toBe(true);
  });

  it('requires the event itself to fall inside the range', () => {
    const rows = [
      row('A', { eventDate: '2024-03-10', publishingDate: '2024-02-01', expirationDate: '2024-04-30' }),
      row('B', { eventDate: '2024-04-02', publishingDate: '2024-02-01' }),
      row('C', { eventDate: null }),
      row('D', { eventDate: '2024-03-31', expirationDate: '2024-02-15' })
    ];
    expect(ids(applyReportFilters(rows, { dateRange: range }))).toEqual(['A']);
  });
});
