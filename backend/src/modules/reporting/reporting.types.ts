import type { EmptyResultWarning, JoinKeyCollisionWarning } from '../../shared/pipelineErrors.js';
import type { CalendarDate, EventName, MalformedDateIssue, WorkflowState } from '../normalization/normalization.types.js';
import type { RegionName } from '../regions/regions.types.js';

export type ReportDimension = 'region' | 'importer' | 'organization' | 'occupation' | 'upgrade';

export const UNKNOWN_ORGANIZATION = 'Unknown organization';
export const UNKNOWN_IMPORTER = 'Unknown';
export const UNKNOWN_OCCUPATION = 'Unknown';
export const NO_UPGRADE = 'None';

export interface ReportRow {
  entityId: string | null;
  eventName: EventName;
  eventDate: CalendarDate | null;
  title: string | null;
  organization: string;
  region: RegionName;
  importer: string;
  occupations: string[];
  upgrades: string[];
  workflowState: WorkflowState | null;
  publishingDate: CalendarDate | null;
  expirationDate: CalendarDate | null;
  matched: boolean;
}

export interface DateRange {
  start: CalendarDate;
  end: CalendarDate;
}

export interface ReportFilters {
  dateRange?: DateRange | null;
  regions?: string[];
  importers?: string[];
  organizations?: string[];
  occupations?: string[];
  upgrades?: string[];
  title?: string;
}

export interface AggregateMetrics {
  vacancies: number;
  clicks: number;
  applies: number;
  applyClickRatio: number;
  clicksPerVacancy: number;
  appliesPerVacancy: number;
  medianClicksPerVacancy: number;
  robustMeanClicksPerVacancy: number;
  medianAppliesPerVacancy: number;
  robustMeanAppliesPerVacancy: number;
}

export type BenchmarkBand = 'above' | 'normal' | 'below' | 'unrated';

export interface AggregateRow extends AggregateMetrics {
  key: string;
  benchmark: {
    clicksPerVacancy: BenchmarkBand;
    applyClickRatio: BenchmarkBand;
  };
}

export interface BreakdownResult {
  groupBy: ReportDimension;
  filters: ReportFilters;
  summary: AggregateMetrics;
  groups: AggregateRow[];
  warnings: EmptyResultWarning[];
}

export interface QuartileBucket {
  vacancies: number;
  clicks: number;
  applies: number;
  applyClickRatio: number;
  clicksPerVacancy: number;
  appliesPerVacancy: number;
}

export interface QuartileBreakdown {
  top25: QuartileBucket;
  middle50: QuartileBucket;
  bottom25: QuartileBucket;
}

export interface SummaryResult {
  filters: ReportFilters;
  rowCount: number;
  summary: AggregateMetrics;
  quartiles: QuartileBreakdown | null;
  warnings: EmptyResultWarning[];
}

export interface TrendPoint {
  date: CalendarDate;
  clicks: number;
  applies: number;
}

export interface VacancyReportRow {
  entityId: string;
  title: string | null;
  organization: string;
  workflowState: WorkflowState | null;
  publishingDate: CalendarDate | null;
  expirationDate: CalendarDate | null;
  daysActive: number | null;
  region: RegionName;
  occupation: string;
  importer: string;
  upgrades: string;
  clicks: number;
  applies: number;
  applyClickRatio: number | null;
  clicksPerDay: number | null;
  appliesPerDay: number | null;
  occupationAvgClicks: number;
  occupationAvgApplies: number;
}

export type HeatmapMetric = 'clicksPerVacancy' | 'appliesPerVacancy' | 'applyClickRatio';

export interface HeatmapCell {
  row: string;
  column: string;
  value: number;
}

export interface HeatmapResult {
  rows: ReportDimension;
  columns: ReportDimension;
  metric: HeatmapMetric;
  cells: HeatmapCell[];
}

export type ComparedMetric =
  | 'vacancies'
  | 'clicks'
  | 'applies'
  | 'applyClickRatio'
  | 'clicksPerVacancy'
  | 'appliesPerVacancy';

export interface MetricDelta {
  a: number;
  b: number;
  difference: number;
  // null when side A is zero and the change has no finite value.
  percentChange: number | null;
}

export interface ComparisonResult {
  sideA: AggregateMetrics;
  sideB: AggregateMetrics;
  deltas: Record<ComparedMetric, MetricDelta>;
}

export interface FilterOptions {
  dateBounds: DateRange | null;
  regions: string[];
  importers: string[];
  organizations: string[];
  occupations: string[];
  upgrades: string[];
}

export interface DatasetDiagnostics {
  eventRows: number;
  metadataRows: number;
  unmatchedEvents: number;
  malformedDates: MalformedDateIssue[];
  collisions: JoinKeyCollisionWarning[];
}
