import { describe, expect, it } from 'vitest';
import { InvalidReportQueryError } from '../../shared/pipelineErrors.js';
import { normalizeList, parseReportFilters, resolveDimension, resolveHeatmapMetric } from './reportQuery.js';

describe('normalizeList', () => {
  it('accepts comma separated and repeated parameters', () => {
    expect(normalizeList('London, Wales,')).toEqual(['London', 'Wales']);
    expect(normalizeList(['North West', ' ', 'Scotland'])).toEqual(['North West', 'Scotland']);
    expect(normalizeList('')).toBeUndefined();
    expect(normalizeList(' , ')).toBeUndefined();
  });
});

describe('resolveDimension and resolveHeatmapMetric', () => {
  it('falls back to the default when the parameter is absent', () => {
    expect(resolveDimension(undefined, 'region')).toBe('region');
    expect(resolveDimension(' occupation ', 'region')).toBe('occupation');
    expect(resolveHeatmapMetric(undefined)).toBe('clicksPerVacancy');
  });

  it('rejects unknown values', () => {
    expect(() => resolveDimension('country', 'region')).toThrow(InvalidReportQueryError);
    expect(() => resolveHeatmapMetric('revenue')).toThrow('metric must be one of');
  });
});

describe('parseReportFilters', () => {
  it('reads the date range, dimension lists and title search', () => {
    const filters = parseReportFilters({
      from: '2024-01-01',
      to: '2024-01-31',
      regions: 'London,Wales',
      upgrades: ['Featured'],
      title: ' nurse '
    });

    expect(filters).toEqual({
      dateRange: { start: '2024-01-01', end: '2024-01-31' },
      regions: ['London', 'Wales'],
      importers: undefined,
      organizations: undefined,
      occupations: undefined,
      upgrades: ['Featured'],
      title: 'nurse'
    });
  });

  it('reads one side of a comparison by prefix', () => {
    const query = { 'a.regions': 'London', 'b.regions': 'Wales', 'b.from': '2024-02-01', 'b.to': '2024-02-29' };

    expect(parseReportFilters(query, 'a.').regions).toEqual(['London']);
    expect(parseReportFilters(query, 'a.').dateRange).toBeNull();
    expect(parseReportFilters(query, 'b.').dateRange).toEqual({ start: '2024-02-01', end: '2024-02-29' });
  });

  it('rejects incomplete, malformed or inverted date ranges', () => {
    expect(() => parseReportFilters({ from: '2024-01-01' })).toThrow('from and to must be provided together.');
    expect(() => parseReportFilters({ from: '01/02/2024', to: '2024-02-01' })).toThrow(
      'from must be a calendar date (YYYY-MM-DD).'
    );
    expect(() => parseReportFilters({ from: '2024-03-01', to: '2024-02-01' })).toThrow(
      'from must not be later than to.'
    );
  });
});
