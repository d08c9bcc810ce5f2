import { toFetchError } from '../../shared/pipelineErrors.js';
import { coerceIdentifier, normalizeHeader, toText } from '../normalization/fieldNormalizer.js';
import type { RawRow } from '../normalization/normalization.types.js';
import type { ImporterMappingSource } from './sources.types.js';
import { isMissingFileError, loadWorkbookFile } from './workbookReader.js';

const readColumn = (row: RawRow, column: string): unknown => {
  for (const [header, value] of Object.entries(row)) {
    if (normalizeHeader(header) === column) {
      return value;
    }
  }
  return null;
};

// Later rows override earlier ones for the same importer id.
export const parseImporterMapping = (rows: RawRow[]): Map<string, string> => {
  const mapping = new Map<string, string>();
  for (const row of rows) {
    const importerId = coerceIdentifier(readColumn(row, 'importer_id'));
    const importerName = toText(readColumn(row, 'importer_name'));
    if (importerId && importerName) {
      mapping.set(importerId, importerName);
    }
  }
  return mapping;
};

export class ImporterMappingRepository implements ImporterMappingSource {
  constructor(
    private readonly path: string,
    private readonly readRows: (path: string) => Promise<RawRow[]> = loadWorkbookFile
  ) {}

  async loadImporterNames(): Promise<Map<string, string>> {
    try {
      return parseImporterMapping(await this.readRows(this.path));
    } catch (error) {
      if (isMissingFileError(error)) {
        console.warn(`Importer mapping file ${this.path} was not found; importers are shown by id.`);
        return new Map();
      }
      throw toFetchError('importers', error);
    }
  }
}
