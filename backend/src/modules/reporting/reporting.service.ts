import { DateTime } from 'luxon';
import type { CachedDataset, DatasetCache } from '../../shared/datasetCache.js';
import type { CalendarDate, RawRow } from '../normalization/normalization.types.js';
import type { RegionClassifier } from '../regions/regionClassifier.js';
import type { EventSource, ImporterMappingSource, MetadataSource } from '../sources/sources.types.js';
import {
  buildBreakdown,
  buildDailyTrend,
  buildHeatmap,
  collectFilterOptions,
  compareReports,
  summarizeReport
} from './reportAggregator.js';
import { exportBreakdownCsv, exportVacanciesCsv } from './reportExport.js';
import { applyReportFilters } from './reportFilters.js';
import { buildReportDataset } from './reportPipeline.js';
import type { ReportingConfig } from './reporting.config.js';
import type {
  BreakdownResult,
  ComparisonResult,
  DatasetDiagnostics,
  FilterOptions,
  HeatmapMetric,
  HeatmapResult,
  ReportDimension,
  ReportFilters,
  ReportRow,
  SummaryResult,
  TrendPoint,
  VacancyReportRow
} from './reporting.types.js';
import { buildVacancyReport } from './vacancyReport.js';

export interface ReportingSources {
  events: EventSource;
  metadata: MetadataSource;
  importers: ImporterMappingSource;
}

export interface ReportingCaches {
  events: DatasetCache<RawRow[]>;
  metadata: DatasetCache<RawRow[]>;
  importers: DatasetCache<Map<string, string>>;
}

export interface SourceFreshness {
  fetchedAt: string;
  stale: boolean;
}

export interface DatasetStatus {
  windowStart: CalendarDate | null;
  diagnostics: DatasetDiagnostics;
  sources: {
    events: SourceFreshness;
    metadata: SourceFreshness;
    importers: SourceFreshness;
  };
}

interface LoadedDataset {
  rows: ReportRow[];
  status: DatasetStatus;
}

interface BuiltDataset {
  key: string;
  windowStart: CalendarDate | null;
  rows: ReportRow[];
  diagnostics: DatasetDiagnostics;
}

export interface ReportingServiceOptions {
  today?: () => CalendarDate;
  classifyRegion?: RegionClassifier;
}

const currentDate = (): CalendarDate => DateTime.utc().toFormat('yyyy-MM-dd');

export const resolveWindowStart = (today: CalendarDate, daysBack: number): CalendarDate | null =>
  daysBack > 0 ? DateTime.fromISO(today, { zone: 'utc' }).minus({ days: daysBack }).toISODate() : null;

const toFreshness = <T>(dataset: CachedDataset<T>): SourceFreshness => ({
  fetchedAt: new Date(dataset.fetchedAt).toISOString(),
  stale: dataset.stale
});

export class ReportingService {
  private readonly today: () => CalendarDate;

  private built: BuiltDataset | null = null;

  constructor(
    private readonly sources: ReportingSources,
    private readonly caches: ReportingCaches,
    private readonly config: ReportingConfig,
    private readonly options: ReportingServiceOptions = {}
  ) {
    this.today = options.today ?? currentDate;
  }

  async getSummary(filters: ReportFilters = {}): Promise<SummaryResult> {
    const { rows } = await this.loadDataset();
    return summarizeReport(rows, filters);
  }

  async getBreakdown(groupBy: ReportDimension, filters: ReportFilters = {}): Promise<BreakdownResult> {
    const { rows } = await this.loadDataset();
    return buildBreakdown(rows, groupBy, filters);
  }

  async getTrend(filters: ReportFilters = {}): Promise<TrendPoint[]> {
    const { rows } = await this.loadDataset();
    return buildDailyTrend(applyReportFilters(rows, filters));
  }

  async getVacancies(filters: ReportFilters = {}): Promise<VacancyReportRow[]> {
    const { rows } = await this.loadDataset();
    return buildVacancyReport(applyReportFilters(rows, filters), this.today());
  }

  async getHeatmap(
    rowDimension: ReportDimension,
    columnDimension: ReportDimension,
    metric: HeatmapMetric,
    filters: ReportFilters = {}
  ): Promise<HeatmapResult> {
    const { rows } = await this.loadDataset();
    return buildHeatmap(applyReportFilters(rows, filters), rowDimension, columnDimension, metric);
  }

  async getComparison(filtersA: ReportFilters, filtersB: ReportFilters): Promise<ComparisonResult> {
    const { rows } = await this.loadDataset();
    return compareReports(rows, filtersA, filtersB);
  }

  async getFilterOptions(): Promise<FilterOptions> {
    const { rows } = await this.loadDataset();
    return collectFilterOptions(rows);
  }

  async exportBreakdown(groupBy: ReportDimension, filters: ReportFilters = {}): Promise<string> {
    return exportBreakdownCsv(await this.getBreakdown(groupBy, filters));
  }

  async exportVacancies(filters: ReportFilters = {}): Promise<string> {
    return exportVacanciesCsv(await this.getVacancies(filters));
  }

  async getStatus(): Promise<DatasetStatus> {
    const { status } = await this.loadDataset();
    return status;
  }

  // Reloads every source; a source that fails keeps serving its previous rows as stale.
  async refresh(): Promise<DatasetStatus> {
    this.caches.events.expire();
    this.caches.metadata.expire();
    this.caches.importers.expire();
    return this.getStatus();
  }

  private async loadDataset(): Promise<LoadedDataset> {
    const { eventsTable, eventsLimit, metadataSource, delimiter, daysBack } = this.config;
    const [events, metadata, importers] = await Promise.all([
      this.caches.events.get(`${eventsTable}:${eventsLimit ?? 'all'}`, () => this.sources.events.loadEvents()),
      this.caches.metadata.get(metadataSource, () => this.sources.metadata.loadMetadata()),
      this.caches.importers.get('mapping', () => this.sources.importers.loadImporterNames())
    ]);

    const windowStart = resolveWindowStart(this.today(), daysBack);
    const key = [events.fetchedAt, metadata.fetchedAt, importers.fetchedAt, windowStart ?? 'all'].join(':');
    let dataset = this.built;
    if (!dataset || dataset.key !== key) {
      const built = buildReportDataset(
        { eventRows: events.value, metadataRows: metadata.value, importerNames: importers.value },
        { delimiter, since: windowStart, classifyRegion: this.options.classifyRegion }
      );

      const { collisions, malformedDates } = built.diagnostics;
      if (collisions.length) {
        console.warn(`Metadata has ${collisions.length} duplicate entity id rows; the latest row is kept for each.`);
      }
      if (malformedDates.length) {
        console.warn(`Skipped ${malformedDates.length} malformed date values while normalizing source rows.`);
      }

      dataset = { key, windowStart, rows: built.rows, diagnostics: built.diagnostics };
      this.built = dataset;
    }

    return {
      rows: dataset.rows,
      status: {
        windowStart: dataset.windowStart,
        diagnostics: dataset.diagnostics,
        sources: {
          events: toFreshness(events),
          metadata: toFreshness(metadata),
          importers: toFreshness(importers)
        }
      }
    };
  }
}
