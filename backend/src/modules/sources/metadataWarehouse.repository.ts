import { toFetchError } from '../../shared/pipelineErrors.js';
import type { RawRow } from '../normalization/normalization.types.js';
import type { MetadataSource, RowQuery } from './sources.types.js';
import { queryWarehouseRows, quoteTableName } from './warehouseQuery.js';

export class MetadataWarehouseRepository implements MetadataSource {
  readonly kind = 'warehouse';

  constructor(
    private readonly table: string,
    private readonly query: RowQuery = queryWarehouseRows
  ) {}

  async loadMetadata(): Promise<RawRow[]> {
    try {
      return await this.query(`SELECT * FROM ${quoteTableName(this.table)}`, []);
    } catch (error) {
      throw toFetchError('metadata', error);
    }
  }
}
