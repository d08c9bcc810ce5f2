import { DateTime } from 'luxon';
import { MalformedDateError } from '../../shared/pipelineErrors.js';
import { UNKNOWN_REGION } from '../regions/regions.types.js';
import type { RegionName } from '../regions/regions.types.js';
import type {
  CalendarDate,
  EventName,
  EventRecord,
  MetadataRecord,
  NormalizationIssues,
  NormalizationResult,
  NormalizeOptions,
  RawRow,
  WorkflowState
} from './normalization.types.js';

export const DEFAULT_MULTI_VALUE_DELIMITER = '|';

// Raw event names per tracked event, compared lower-cased with hyphens read as underscores.
export const EVENT_NAME_ALIASES: Record<Exclude<EventName, 'other'>, readonly string[]> = {
  visit: ['job_visit', 'visit'],
  apply_start: ['job_apply_start', 'apply_start']
};

export const TRACKED_EVENT_ALIASES: readonly string[] = [...EVENT_NAME_ALIASES.visit, ...EVENT_NAME_ALIASES.apply_start];

export const canonicalEventName = (value: string) => value.trim().toLowerCase().replace(/-/g, '_');

const COMPACT_DATE_PATTERN = /^\d{8}$/;
const INTEGRAL_DECIMAL_PATTERN = /^(-?\d+)\.0+$/;

const EVENT_FIELDS = {
  entityId: ['entity_id', 'entity_id_str', 'entity_id_original', 'job_id'],
  eventName: ['event_name', 'event'],
  eventDate: ['event_date', 'event_date_parsed', 'event_data', 'event_date_original'],
  organizationName: ['organization_name', 'organisation_name', 'company'],
  regionRaw: ['region_raw', 'regions', 'locations', 'location'],
  upgrades: ['upgrades'],
  importerId: ['importer_id']
} as const;

const METADATA_FIELDS = {
  entityId: ['entity_id', 'entity_id_str', 'id', 'job_id', 'job_id_export'],
  title: ['title', 'title_export', 'job_title'],
  workflowState: ['workflow_state', 'status', 'state'],
  occupationalFields: ['occupational_fields', 'occupational_fields_export', 'occupations', 'occupation'],
  locations: ['locations', 'location', 'regions', 'address'],
  publishingDate: ['publishing_date', 'published_date', 'start_date'],
  expirationDate: ['expiration_date', 'expiry_date', 'end_date'],
  organizationProfileName: ['organization_profile_name', 'organisation_profile_name', 'organization_name', 'company'],
  employmentType: ['employment_type', 'employment_types'],
  updatedAt: ['updated_at', 'last_updated', 'modified_at', 'loaded_at']
} as const;

export const normalizeHeader = (header: string) =>
  header
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);

const isEmpty = (value: unknown) =>
  value === null || value === undefined || (typeof value === 'string' && value.trim() === '');

/**
 * Parses the date representations found in the sources: compact `YYYYMMDD` integers or strings,
 * ISO dates and timestamps, SQL timestamps and `Date` instances. Timestamps carrying an offset are
 * converted to UTC before the calendar date is taken. Empty input gives `null`.
 */
export const parseCalendarDate = (value: unknown): CalendarDate | null => {
  if (isEmpty(value)) {
    return null;
  }
  if (value instanceof Date) {
    const parsed = DateTime.fromJSDate(value);
    const iso = parsed.isValid ? parsed.toISODate() : null;
    if (!iso) {
      throw new MalformedDateError(value);
    }
    return iso;
  }
  if (isPlainObject(value) && 'value' in value) {
    // Warehouse drivers sometimes wrap DATE values as { value: '2024-01-15' }.
    return parseCalendarDate(value.value);
  }
  if (typeof value === 'number') {
    if (Number.isInteger(value) && COMPACT_DATE_PATTERN.test(String(value))) {
      return parseCalendarDate(String(value));
    }
    throw new MalformedDateError(value);
  }
  if (typeof value !== 'string') {
    throw new MalformedDateError(value);
  }
  const trimmed = value.trim();
  const candidates = COMPACT_DATE_PATTERN.test(trimmed)
    ? [DateTime.fromFormat(trimmed, 'yyyyMMdd', { zone: 'utc' })]
    : [DateTime.fromISO(trimmed, { zone: 'utc' }), DateTime.fromSQL(trimmed, { zone: 'utc' })];
  for (const candidate of candidates) {
    if (candidate.isValid) {
      const iso = candidate.toUTC().toISODate();
      if (iso) {
        return iso;
      }
    }
  }
  throw new MalformedDateError(value);
};

const parseTimestamp = (value: unknown): string | null => {
  if (isEmpty(value)) {
    return null;
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new MalformedDateError(value);
    }
    return value.toISOString();
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    for (const candidate of [DateTime.fromISO(trimmed, { zone: 'utc' }), DateTime.fromSQL(trimmed, { zone: 'utc' })]) {
      const iso = candidate.isValid ? candidate.toUTC().toISO() : null;
      if (iso) {
        return iso;
      }
    }
  }
  throw new MalformedDateError(value);
};

export const splitMultiValue = (value: unknown, delimiter = DEFAULT_MULTI_VALUE_DELIMITER): string[] => {
  if (Array.isArray(value)) {
    return value.flatMap((entry) => splitMultiValue(entry, delimiter));
  }
  const text = toText(value);
  if (!text) {
    return [];
  }
  return text
    .split(delimiter)
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
};

export const toText = (value: unknown): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : null;
  }
  if (typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  return null;
};

// Join keys are compared as opaque text, so 42, '42', 42.0 and '42.0' all become '42'.
export const coerceIdentifier = (value: unknown): string | null => {
  const text = toText(value);
  if (!text) {
    return null;
  }
  const integral = INTEGRAL_DECIMAL_PATTERN.exec(text);
  return integral ? integral[1] : text;
};

export const resolveEventName = (value: string | null): EventName => {
  if (!value) {
    return 'other';
  }
  const normalized = canonicalEventName(value);
  if (EVENT_NAME_ALIASES.visit.includes(normalized)) {
    return 'visit';
  }
  if (EVENT_NAME_ALIASES.apply_start.includes(normalized)) {
    return 'apply_start';
  }
  return 'other';
};

export const resolveWorkflowState = (value: string | null): WorkflowState | null => {
  if (!value) {
    return null;
  }
  const normalized = value.toLowerCase();
  if (normalized === 'published' || normalized === 'unpublished') {
    return normalized;
  }
  return 'other';
};

const createFieldReader = (row: RawRow) => {
  const fields = new Map<string, unknown>();
  for (const [header, value] of Object.entries(row)) {
    const key = normalizeHeader(header);
    if (!fields.has(key) || isEmpty(fields.get(key))) {
      fields.set(key, value);
    }
  }
  return (aliases: readonly string[]): unknown => {
    for (const alias of aliases) {
      const value = fields.get(alias);
      if (!isEmpty(value)) {
        return value;
      }
    }
    return null;
  };
};

const createIssueCollector = () => {
  const issues: NormalizationIssues = { malformedDates: [] };
  const recover = <T>(rowIndex: number, field: string, value: unknown, parse: (input: unknown) => T | null): T | null => {
    try {
      return parse(value);
    } catch (error) {
      if (error instanceof MalformedDateError) {
        issues.malformedDates.push({ rowIndex, field, value: String(value) });
        return null;
      }
      throw error;
    }
  };
  return { issues, recover };
};

const unknownRegion = (): RegionName => UNKNOWN_REGION;

export const normalizeEventRows = (rows: RawRow[], options: NormalizeOptions = {}): NormalizationResult<EventRecord> => {
  const delimiter = options.delimiter ?? DEFAULT_MULTI_VALUE_DELIMITER;
  const classifyRegion = options.classifyRegion ?? unknownRegion;
  const { issues, recover } = createIssueCollector();

  const records = rows.map((row, rowIndex): EventRecord => {
    const read = createFieldReader(row);
    const rawEventName = toText(read(EVENT_FIELDS.eventName));
    const regionRaw = toText(read(EVENT_FIELDS.regionRaw));
    return {
      entityId: coerceIdentifier(read(EVENT_FIELDS.entityId)),
      eventName: resolveEventName(rawEventName),
      rawEventName,
      eventDate: recover(rowIndex, 'event_date', read(EVENT_FIELDS.eventDate), parseCalendarDate),
      organizationName: toText(read(EVENT_FIELDS.organizationName)),
      regionRaw,
      region: classifyRegion(regionRaw),
      upgrades: splitMultiValue(read(EVENT_FIELDS.upgrades), delimiter),
      importerId: coerceIdentifier(read(EVENT_FIELDS.importerId))
    };
  });

  return { records, issues };
};

export const normalizeMetadataRows = (
  rows: RawRow[],
  options: NormalizeOptions = {}
): NormalizationResult<MetadataRecord> => {
  const delimiter = options.delimiter ?? DEFAULT_MULTI_VALUE_DELIMITER;
  const classifyRegion = options.classifyRegion ?? unknownRegion;
  const { issues, recover } = createIssueCollector();

  const records = rows.map((row, rowIndex): MetadataRecord => {
    const read = createFieldReader(row);
    const locations = toText(read(METADATA_FIELDS.locations));
    return {
      entityId: coerceIdentifier(read(METADATA_FIELDS.entityId)),
      title: toText(read(METADATA_FIELDS.title)),
      workflowState: resolveWorkflowState(toText(read(METADATA_FIELDS.workflowState))),
      occupationalFields: splitMultiValue(read(METADATA_FIELDS.occupationalFields), delimiter),
      locations,
      region: classifyRegion(locations),
      publishingDate: recover(rowIndex, 'publishing_date', read(METADATA_FIELDS.publishingDate), parseCalendarDate),
      expirationDate: recover(rowIndex, 'expiration_date', read(METADATA_FIELDS.expirationDate), parseCalendarDate),
      organizationProfileName: toText(read(METADATA_FIELDS.organizationProfileName)),
      employmentType: toText(read(METADATA_FIELDS.employmentType)),
      updatedAt: recover(rowIndex, 'updated_at', read(METADATA_FIELDS.updatedAt), parseTimestamp)
    };
  });

  return { records, issues };
};
