import { DateTime } from 'luxon';
import { InvalidReportQueryError } from '../../shared/pipelineErrors.js';
import { REPORT_DIMENSIONS } from './reportFilters.js';
import type { DateRange, HeatmapMetric, ReportDimension, ReportFilters } from './reporting.types.js';

export type QueryParams = Record<string, unknown>;

const heatmapMetrics: HeatmapMetric[] = ['clicksPerVacancy', 'appliesPerVacancy', 'applyClickRatio'];

const isDimension = (value: string): value is ReportDimension =>
  REPORT_DIMENSIONS.some((dimension) => dimension === value);

const isHeatmapMetric = (value: string): value is HeatmapMetric => heatmapMetrics.some((metric) => metric === value);

const readString = (value: unknown): string | undefined => {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
};

export const resolveDimension = (value: unknown, fallback: ReportDimension, parameter = 'groupBy'): ReportDimension => {
  const text = readString(value);
  if (!text) {
    return fallback;
  }
  if (!isDimension(text)) {
    throw new InvalidReportQueryError(`${parameter} must be one of: ${REPORT_DIMENSIONS.join(', ')}.`);
  }
  return text;
};

export const resolveHeatmapMetric = (value: unknown): HeatmapMetric => {
  const text = readString(value);
  if (!text) {
    return 'clicksPerVacancy';
  }
  if (!isHeatmapMetric(text)) {
    throw new InvalidReportQueryError(`metric must be one of: ${heatmapMetrics.join(', ')}.`);
  }
  return text;
};

// Accepts repeated parameters as well as comma separated values.
export const normalizeList = (value: unknown): string[] | undefined => {
  if (!value) {
    return undefined;
  }
  const toArray = Array.isArray(value) ? value : typeof value === 'string' ? value.split(',') : [];
  const normalized = toArray
    .map((item) => (typeof item === 'string' ? item.trim() : ''))
    .filter((item) => item.length > 0);
  return normalized.length ? normalized : undefined;
};

const parseQueryDate = (value: string, parameter: string) => {
  const parsed = DateTime.fromISO(value, { zone: 'utc' });
  if (!parsed.isValid) {
    throw new InvalidReportQueryError(`${parameter} must be a calendar date (YYYY-MM-DD).`);
  }
  return parsed.toFormat('yyyy-MM-dd');
};

export const resolveDateRange = (fromValue: unknown, toValue: unknown, prefix = ''): DateRange | null => {
  const from = readString(fromValue);
  const to = readString(toValue);
  if (!from && !to) {
    return null;
  }
  if (!from || !to) {
    throw new InvalidReportQueryError(`${prefix}from and ${prefix}to must be provided together.`);
  }
  const range = { start: parseQueryDate(from, `${prefix}from`), end: parseQueryDate(to, `${prefix}to`) };
  if (range.start > range.end) {
    throw new InvalidReportQueryError(`${prefix}from must not be later than ${prefix}to.`);
  }
  return range;
};

/**
 * Reads report filters from query parameters. A prefix such as `a.` selects one side of a
 * comparison (`a.regions=London&b.regions=Wales`).
 */
export const parseReportFilters = (query: QueryParams, prefix = ''): ReportFilters => {
  const list = (parameter: string) => normalizeList(query[`${prefix}${parameter}`]);
  return {
    dateRange: resolveDateRange(query[`${prefix}from`], query[`${prefix}to`], prefix),
    regions: list('regions'),
    importers: list('importers'),
    organizations: list('organizations'),
    occupations: list('occupations'),
    upgrades: list('upgrades'),
    title: readString(query[`${prefix}title`])
  };
};
