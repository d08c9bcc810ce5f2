import { toFetchError } from '../../shared/pipelineErrors.js';
import { TRACKED_EVENT_ALIASES } from '../normalization/fieldNormalizer.js';
import type { RawRow } from '../normalization/normalization.types.js';
import type { EventSource, RowQuery } from './sources.types.js';
import { queryWarehouseRows, quoteTableName } from './warehouseQuery.js';

export interface EventsQuery {
  text: string;
  values: unknown[];
}

export const buildEventsQuery = (table: string, limit?: number | null): EventsQuery => {
  const values: unknown[] = [[...TRACKED_EVENT_ALIASES]];
  let text = `SELECT * FROM ${quoteTableName(table)} WHERE replace(lower(event_name), '-', '_') = ANY($1)`;
  if (limit && limit > 0) {
    values.push(Math.floor(limit));
    text += ` LIMIT $${values.length}`;
  }
  return { text, values };
};

export class EventsWarehouseRepository implements EventSource {
  constructor(
    private readonly table: string,
    private readonly options: { limit?: number | null; query?: RowQuery } = {}
  ) {}

  async loadEvents(): Promise<RawRow[]> {
    const { text, values } = buildEventsQuery(this.table, this.options.limit);
    const query = this.options.query ?? queryWarehouseRows;
    try {
      return await query(text, values);
    } catch (error) {
      throw toFetchError('events', error);
    }
  }
}
