import { normalizeEventRows, normalizeMetadataRows } from '../normalization/fieldNormalizer.js';
import type { CalendarDate, RawRow } from '../normalization/normalization.types.js';
import { buildMetadataIndex, joinEventsWithMetadata } from '../joins/joinEngine.js';
import type { JoinedRecord } from '../joins/joinEngine.js';
import { classifyLocation } from '../regions/regionClassifier.js';
import type { RegionClassifier } from '../regions/regionClassifier.js';
import { UNKNOWN_REGION } from '../regions/regions.types.js';
import { UNKNOWN_IMPORTER, UNKNOWN_ORGANIZATION } from './reporting.types.js';
import type { DatasetDiagnostics, ReportRow } from './reporting.types.js';

export interface ReportDatasetInput {
  eventRows: RawRow[];
  metadataRows: RawRow[];
  importerNames: Map<string, string>;
}

export interface ReportDatasetOptions {
  delimiter?: string;
  classifyRegion?: RegionClassifier;
  // Events dated before this day are left out; undated events are kept.
  since?: CalendarDate | null;
}

export interface ReportDataset {
  rows: ReportRow[];
  diagnostics: DatasetDiagnostics;
}

export const resolveImporterLabel = (importerId: string | null, importerNames: Map<string, string>) => {
  if (!importerId) {
    return UNKNOWN_IMPORTER;
  }
  return importerNames.get(importerId) ?? `ID: ${importerId}`;
};

export const toReportRow = ({ event, metadata }: JoinedRecord, importerNames: Map<string, string>): ReportRow => {
  const region = metadata && metadata.region !== UNKNOWN_REGION ? metadata.region : event.region;
  return {
    entityId: event.entityId,
    eventName: event.eventName,
    eventDate: event.eventDate,
    title: metadata?.title ?? null,
    organization: metadata?.organizationProfileName ?? event.organizationName ?? UNKNOWN_ORGANIZATION,
    region,
    importer: resolveImporterLabel(event.importerId, importerNames),
    occupations: metadata?.occupationalFields ?? [],
    upgrades: event.upgrades,
    workflowState: metadata?.workflowState ?? null,
    publishingDate: metadata?.publishingDate ?? null,
    expirationDate: metadata?.expirationDate ?? null,
    matched: metadata !== null
  };
};

export const buildReportDataset = (input: ReportDatasetInput, options: ReportDatasetOptions = {}): ReportDataset => {
  const normalizeOptions = {
    delimiter: options.delimiter,
    classifyRegion: options.classifyRegion ?? classifyLocation
  };
  const events = normalizeEventRows(input.eventRows, normalizeOptions);
  const metadata = normalizeMetadataRows(input.metadataRows, normalizeOptions);

  const since = options.since ?? null;
  const windowed = since
    ? events.records.filter((event) => !event.eventDate || event.eventDate >= since)
    : events.records;

  const index = buildMetadataIndex(metadata.records);
  const joined = joinEventsWithMetadata(windowed, index);
  const rows = joined.map((record) => toReportRow(record, input.importerNames));

  return {
    rows,
    diagnostics: {
      eventRows: input.eventRows.length,
      metadataRows: input.metadataRows.length,
      unmatchedEvents: joined.filter((record) => record.metadata === null).length,
      malformedDates: [...events.issues.malformedDates, ...metadata.issues.malformedDates],
      collisions: index.collisions
    }
  };
};
