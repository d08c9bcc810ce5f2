import type { RawRow } from '../normalization/normalization.types.js';

export type MetadataSourceKind = 'warehouse' | 'spreadsheet';

export interface EventSource {
  loadEvents(): Promise<RawRow[]>;
}

export interface MetadataSource {
  readonly kind: MetadataSourceKind;
  loadMetadata(): Promise<RawRow[]>;
}

export interface ImporterMappingSource {
  loadImporterNames(): Promise<Map<string, string>>;
}

export type RowQuery = (text: string, values: unknown[]) => Promise<RawRow[]>;
