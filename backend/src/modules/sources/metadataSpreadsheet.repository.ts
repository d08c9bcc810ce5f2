import { toFetchError } from '../../shared/pipelineErrors.js';
import type { RawRow } from '../normalization/normalization.types.js';
import type { MetadataSource } from './sources.types.js';
import { loadWorkbookFile } from './workbookReader.js';

// Reads a job export (CSV or XLSX) whose headers are matched to metadata fields by the normalizer.
export class MetadataSpreadsheetRepository implements MetadataSource {
  readonly kind = 'spreadsheet';

  constructor(
    private readonly path: string,
    private readonly readRows: (path: string) => Promise<RawRow[]> = loadWorkbookFile
  ) {}

  async loadMetadata(): Promise<RawRow[]> {
    try {
      return await this.readRows(this.path);
    } catch (error) {
      throw toFetchError('metadata', error);
    }
  }
}
