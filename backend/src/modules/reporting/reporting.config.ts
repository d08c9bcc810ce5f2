import { DEFAULT_MULTI_VALUE_DELIMITER } from '../normalization/fieldNormalizer.js';
import type { MetadataSourceKind } from '../sources/sources.types.js';

export interface ReportingConfig {
  eventsTable: string;
  eventsLimit: number | null;
  metadataSource: MetadataSourceKind;
  metadataTable: string;
  metadataSpreadsheetPath: string;
  importerMappingPath: string;
  eventsCacheTtlMs: number;
  metadataCacheTtlMs: number;
  fetchTimeoutMs: number;
  // 0 disables the window
  daysBack: number;
  delimiter: string;
}

const ONE_HOUR_MS = 60 * 60 * 1000;
const FIVE_MINUTES_MS = 5 * 60 * 1000;

const readText = (value: string | undefined, fallback: string) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
};

const readNonNegativeInt = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

const resolveMetadataSource = (value: string | undefined): MetadataSourceKind =>
  value?.trim().toLowerCase() === 'spreadsheet' ? 'spreadsheet' : 'warehouse';

export const resolveReportingConfig = (env: NodeJS.ProcessEnv = process.env): ReportingConfig => {
  const eventsLimit = readNonNegativeInt(env.EVENTS_ROW_LIMIT, 0);
  return {
    eventsTable: readText(env.EVENTS_TABLE, 'job_performance_events'),
    eventsLimit: eventsLimit > 0 ? eventsLimit : null,
    metadataSource: resolveMetadataSource(env.METADATA_SOURCE),
    metadataTable: readText(env.METADATA_TABLE, 'job_metadata'),
    metadataSpreadsheetPath: readText(env.METADATA_SPREADSHEET_PATH, 'data/job_export.csv'),
    importerMappingPath: readText(env.IMPORTER_MAPPING_PATH, 'data/importer_mapping.csv'),
    eventsCacheTtlMs: readNonNegativeInt(env.EVENTS_CACHE_TTL_MS, ONE_HOUR_MS),
    metadataCacheTtlMs: readNonNegativeInt(env.METADATA_CACHE_TTL_MS, FIVE_MINUTES_MS),
    fetchTimeoutMs: readNonNegativeInt(env.SOURCE_FETCH_TIMEOUT_MS, 60_000),
    daysBack: readNonNegativeInt(env.REPORT_DAYS_BACK, 30),
    delimiter: env.MULTI_VALUE_DELIMITER || DEFAULT_MULTI_VALUE_DELIMITER
  };
};
