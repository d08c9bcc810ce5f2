import { NO_UPGRADE, UNKNOWN_OCCUPATION } from './reporting.types.js';
import type { DateRange, ReportDimension, ReportFilters, ReportRow } from './reporting.types.js';

export const REPORT_DIMENSIONS: ReportDimension[] = ['region', 'importer', 'organization', 'occupation', 'upgrade'];

// Multi-valued dimensions return one value per tag, so a row can belong to several groups.
export const dimensionValues = (row: ReportRow, dimension: ReportDimension): string[] => {
  switch (dimension) {
    case 'region':
      return [row.region];
    case 'importer':
      return [row.importer];
    case 'organization':
      return [row.organization];
    case 'occupation':
      return row.occupations.length ? row.occupations : [UNKNOWN_OCCUPATION];
    case 'upgrade':
      return row.upgrades.length ? row.upgrades : [NO_UPGRADE];
    default:
      return [];
  }
};

type RowPredicate = (row: ReportRow) => boolean;

const matchesAny = (dimension: ReportDimension, selected: string[]): RowPredicate => {
  const allowed = new Set(selected);
  return (row) => dimensionValues(row, dimension).some((value) => allowed.has(value));
};

// An unknown publishing or expiration date leaves that side of the window open.
export const isActiveDuring = (row: ReportRow, range: DateRange) =>
  (!row.publishingDate || row.publishingDate <= range.end) && (!row.expirationDate || row.expirationDate >= range.start);

export const isDatedWithin = (row: ReportRow, range: DateRange) =>
  row.eventDate !== null && row.eventDate >= range.start && row.eventDate <= range.end;

const hasSelection = (values: string[] | undefined): values is string[] => Array.isArray(values) && values.length > 0;

export const buildFilterPredicates = (filters: ReportFilters): RowPredicate[] => {
  const predicates: RowPredicate[] = [];
  const range = filters.dateRange;
  if (range) {
    predicates.push((row) => isActiveDuring(row, range) && isDatedWithin(row, range));
  }
  const selections: Array<[ReportDimension, string[] | undefined]> = [
    ['region', filters.regions],
    ['importer', filters.importers],
    ['organization', filters.organizations],
    ['occupation', filters.occupations],
    ['upgrade', filters.upgrades]
  ];
  for (const [dimension, selected] of selections) {
    if (hasSelection(selected)) {
      predicates.push(matchesAny(dimension, selected));
    }
  }
  const search = filters.title?.trim().toLowerCase();
  if (search) {
    predicates.push((row) => Boolean(row.title?.toLowerCase().includes(search)));
  }
  return predicates;
};

export const applyReportFilters = (rows: ReportRow[], filters: ReportFilters = {}): ReportRow[] => {
  const predicates = buildFilterPredicates(filters);
  if (!predicates.length) {
    return rows;
  }
  return rows.filter((row) => predicates.every((predicate) => predicate(row)));
};

export const hasActiveFilters = (filters: ReportFilters) => buildFilterPredicates(filters).length > 0;
