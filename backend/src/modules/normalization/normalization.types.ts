import type { RegionName } from '../regions/regions.types.js';

// ISO calendar date, yyyy-MM-dd.
export type CalendarDate = string;

export type RawRow = Record<string, unknown>;

export type EventName = 'visit' | 'apply_start' | 'other';

export type WorkflowState = 'published' | 'unpublished' | 'other';

export interface EventRecord {
  entityId: string | null;
  eventName: EventName;
  rawEventName: string | null;
  eventDate: CalendarDate | null;
  organizationName: string | null;
  regionRaw: string | null;
  region: RegionName;
  upgrades: string[];
  importerId: string | null;
}

export interface MetadataRecord {
  entityId: string | null;
  title: string | null;
  workflowState: WorkflowState | null;
  occupationalFields: string[];
  locations: string | null;
  region: RegionName;
  publishingDate: CalendarDate | null;
  expirationDate: CalendarDate | null;
  organizationProfileName: string | null;
  employmentType: string | null;
  updatedAt: string | null;
}

export interface MalformedDateIssue {
  rowIndex: number;
  field: string;
  value: string;
}

export interface NormalizationIssues {
  malformedDates: MalformedDateIssue[];
}

export interface NormalizationResult<T> {
  records: T[];
  issues: NormalizationIssues;
}

export interface NormalizeOptions {
  delimiter?: string;
  classifyRegion?: (location: string | null) => RegionName;
}
