import { applyReportFilters, dimensionValues } from './reportFilters.js';
import { median, percentage, percentChange, perUnit, quantile, resolveBenchmarkBand, robustMean } from './reportStatistics.js';
import type {
  AggregateMetrics,
  AggregateRow,
  BreakdownResult,
  ComparedMetric,
  ComparisonResult,
  FilterOptions,
  HeatmapMetric,
  HeatmapResult,
  MetricDelta,
  QuartileBreakdown,
  QuartileBucket,
  ReportDimension,
  ReportFilters,
  ReportRow,
  SummaryResult,
  TrendPoint
} from './reporting.types.js';
import type { EmptyResultWarning } from '../../shared/pipelineErrors.js';

interface EntityTally {
  clicks: number;
  applies: number;
}

const emptyResultWarnings = (rows: ReportRow[]): EmptyResultWarning[] =>
  rows.length ? [] : [{ code: 'EMPTY_RESULT', message: 'No records match the selected filters.' }];

export const tallyByEntity = (rows: ReportRow[]): Map<string, EntityTally> => {
  const tallies = new Map<string, EntityTally>();
  for (const row of rows) {
    if (!row.entityId) {
      continue;
    }
    let tally = tallies.get(row.entityId);
    if (!tally) {
      tally = { clicks: 0, applies: 0 };
      tallies.set(row.entityId, tally);
    }
    if (row.eventName === 'visit') {
      tally.clicks += 1;
    } else if (row.eventName === 'apply_start') {
      tally.applies += 1;
    }
  }
  return tallies;
};

export const computeMetrics = (rows: ReportRow[]): AggregateMetrics => {
  let clicks = 0;
  let applies = 0;
  for (const row of rows) {
    if (row.eventName === 'visit') {
      clicks += 1;
    } else if (row.eventName === 'apply_start') {
      applies += 1;
    }
  }
  const tallies = Array.from(tallyByEntity(rows).values());
  const clickDistribution = tallies.map((tally) => tally.clicks);
  const applyDistribution = tallies.map((tally) => tally.applies);
  const vacancies = tallies.length;

  return {
    vacancies,
    clicks,
    applies,
    applyClickRatio: percentage(applies, clicks),
    clicksPerVacancy: perUnit(clicks, vacancies),
    appliesPerVacancy: perUnit(applies, vacancies),
    medianClicksPerVacancy: median(clickDistribution),
    robustMeanClicksPerVacancy: robustMean(clickDistribution),
    medianAppliesPerVacancy: median(applyDistribution),
    robustMeanAppliesPerVacancy: robustMean(applyDistribution)
  };
};

// Tag -> rows, built once per call so multi-valued dimensions fan out without rescanning.
export const buildDimensionIndex = (rows: ReportRow[], dimension: ReportDimension): Map<string, ReportRow[]> => {
  const index = new Map<string, ReportRow[]>();
  for (const row of rows) {
    // A row listing the same tag twice still belongs to that group once.
    for (const value of new Set(dimensionValues(row, dimension))) {
      const bucket = index.get(value);
      if (bucket) {
        bucket.push(row);
      } else {
        index.set(value, [row]);
      }
    }
  }
  return index;
};

const compareGroups = (a: AggregateRow, b: AggregateRow) =>
  b.medianClicksPerVacancy - a.medianClicksPerVacancy || a.key.localeCompare(b.key);

export const aggregateByDimension = (
  rows: ReportRow[],
  dimension: ReportDimension
): { summary: AggregateMetrics; groups: AggregateRow[] } => {
  const summary = computeMetrics(rows);
  const groups: AggregateRow[] = [];
  for (const [key, members] of buildDimensionIndex(rows, dimension)) {
    const metrics = computeMetrics(members);
    groups.push({
      key,
      ...metrics,
      benchmark: {
        clicksPerVacancy: resolveBenchmarkBand(metrics.clicksPerVacancy, summary.clicksPerVacancy),
        applyClickRatio: resolveBenchmarkBand(metrics.applyClickRatio, summary.applyClickRatio)
      }
    });
  }
  groups.sort(compareGroups);
  return { summary, groups };
};

export const buildBreakdown = (
  rows: ReportRow[],
  groupBy: ReportDimension,
  filters: ReportFilters = {}
): BreakdownResult => {
  const filtered = applyReportFilters(rows, filters);
  const { summary, groups } = aggregateByDimension(filtered, groupBy);
  return { groupBy, filters, summary, groups, warnings: emptyResultWarnings(filtered) };
};

const summarizeBucket = (entries: Array<[string, EntityTally]>): QuartileBucket => {
  const clicks = entries.reduce((sum, [, tally]) => sum + tally.clicks, 0);
  const applies = entries.reduce((sum, [, tally]) => sum + tally.applies, 0);
  return {
    vacancies: entries.length,
    clicks,
    applies,
    applyClickRatio: percentage(applies, clicks),
    clicksPerVacancy: perUnit(clicks, entries.length),
    appliesPerVacancy: perUnit(applies, entries.length)
  };
};

/**
 * Splits vacancies into top 25%, middle 50% and bottom 25% by clicks. Needs at least four
 * vacancies; returns null otherwise.
 */
export const buildQuartileBreakdown = (rows: ReportRow[]): QuartileBreakdown | null => {
  const entries = Array.from(tallyByEntity(rows).entries());
  if (entries.length < 4) {
    return null;
  }
  const clickCounts = entries.map(([, tally]) => tally.clicks);
  const lowerThreshold = quantile(clickCounts, 0.25);
  const upperThreshold = quantile(clickCounts, 0.75);
  return {
    top25: summarizeBucket(entries.filter(([, tally]) => tally.clicks >= upperThreshold)),
    middle50: summarizeBucket(
      entries.filter(([, tally]) => tally.clicks >= lowerThreshold && tally.clicks < upperThreshold)
    ),
    bottom25: summarizeBucket(entries.filter(([, tally]) => tally.clicks < lowerThreshold))
  };
};

export const summarizeReport = (rows: ReportRow[], filters: ReportFilters = {}): SummaryResult => {
  const filtered = applyReportFilters(rows, filters);
  return {
    filters,
    rowCount: filtered.length,
    summary: computeMetrics(filtered),
    quartiles: buildQuartileBreakdown(filtered),
    warnings: emptyResultWarnings(filtered)
  };
};

export const buildDailyTrend = (rows: ReportRow[]): TrendPoint[] => {
  const points = new Map<string, TrendPoint>();
  for (const row of rows) {
    if (!row.eventDate || row.eventName === 'other') {
      continue;
    }
    let point = points.get(row.eventDate);
    if (!point) {
      point = { date: row.eventDate, clicks: 0, applies: 0 };
      points.set(row.eventDate, point);
    }
    if (row.eventName === 'visit') {
      point.clicks += 1;
    } else {
      point.applies += 1;
    }
  }
  return Array.from(points.values()).sort((a, b) => a.date.localeCompare(b.date));
};

export const buildHeatmap = (
  rows: ReportRow[],
  rowDimension: ReportDimension,
  columnDimension: ReportDimension,
  metric: HeatmapMetric
): HeatmapResult => {
  const cells: HeatmapResult['cells'] = [];
  const rowIndex = buildDimensionIndex(rows, rowDimension);
  for (const rowKey of Array.from(rowIndex.keys()).sort()) {
    const columnIndex = buildDimensionIndex(rowIndex.get(rowKey) ?? [], columnDimension);
    for (const columnKey of Array.from(columnIndex.keys()).sort()) {
      const metrics = computeMetrics(columnIndex.get(columnKey) ?? []);
      cells.push({ row: rowKey, column: columnKey, value: metrics[metric] });
    }
  }
  return { rows: rowDimension, columns: columnDimension, metric, cells };
};

export const compareMetrics = (sideA: AggregateMetrics, sideB: AggregateMetrics): ComparisonResult => {
  const delta = (metric: ComparedMetric): MetricDelta => {
    const a = sideA[metric];
    const b = sideB[metric];
    return { a, b, difference: b - a, percentChange: percentChange(a, b) };
  };
  return {
    sideA,
    sideB,
    deltas: {
      vacancies: delta('vacancies'),
      clicks: delta('clicks'),
      applies: delta('applies'),
      applyClickRatio: delta('applyClickRatio'),
      clicksPerVacancy: delta('clicksPerVacancy'),
      appliesPerVacancy: delta('appliesPerVacancy')
    }
  };
};

export const compareReports = (rows: ReportRow[], filtersA: ReportFilters, filtersB: ReportFilters) =>
  compareMetrics(computeMetrics(applyReportFilters(rows, filtersA)), computeMetrics(applyReportFilters(rows, filtersB)));

export const collectFilterOptions = (rows: ReportRow[]): FilterOptions => {
  const collect = (dimension: ReportDimension) => Array.from(buildDimensionIndex(rows, dimension).keys()).sort();
  let start: string | null = null;
  let end: string | null = null;
  for (const row of rows) {
    if (!row.eventDate) {
      continue;
    }
    if (start === null || row.eventDate < start) {
      start = row.eventDate;
    }
    if (end === null || row.eventDate > end) {
      end = row.eventDate;
    }
  }
  return {
    dateBounds: start !== null && end !== null ? { start, end } : null,
    regions: collect('region'),
    importers: collect('importer'),
    organizations: collect('organization'),
    occupations: collect('occupation'),
    upgrades: collect('upgrade')
  };
};
