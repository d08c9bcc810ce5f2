import { DatasetCache } from '../../shared/datasetCache.js';
import type { RawRow } from '../normalization/normalization.types.js';
import { EventsWarehouseRepository } from '../sources/eventsWarehouse.repository.js';
import { ImporterMappingRepository } from '../sources/importerMapping.repository.js';
import { MetadataSpreadsheetRepository } from '../sources/metadataSpreadsheet.repository.js';
import { MetadataWarehouseRepository } from '../sources/metadataWarehouse.repository.js';
import type { MetadataSource } from '../sources/sources.types.js';
import { resolveReportingConfig } from './reporting.config.js';
import { ReportingService } from './reporting.service.js';

export const reportingConfig = resolveReportingConfig();

const metadataSource: MetadataSource =
  reportingConfig.metadataSource === 'spreadsheet'
    ? new MetadataSpreadsheetRepository(reportingConfig.metadataSpreadsheetPath)
    : new MetadataWarehouseRepository(reportingConfig.metadataTable);

const sources = {
  events: new EventsWarehouseRepository(reportingConfig.eventsTable, { limit: reportingConfig.eventsLimit }),
  metadata: metadataSource,
  importers: new ImporterMappingRepository(reportingConfig.importerMappingPath)
};

const timeoutMs = reportingConfig.fetchTimeoutMs;

const caches = {
  events: new DatasetCache<RawRow[]>({ source: 'events', ttlMs: reportingConfig.eventsCacheTtlMs, timeoutMs }),
  metadata: new DatasetCache<RawRow[]>({ source: 'metadata', ttlMs: reportingConfig.metadataCacheTtlMs, timeoutMs }),
  // the mapping file changes as rarely as the metadata export
  importers: new DatasetCache<Map<string, string>>({
    source: 'importers',
    ttlMs: reportingConfig.metadataCacheTtlMs,
    timeoutMs
  })
};

export const reportingService = new ReportingService(sources, caches, reportingConfig);
