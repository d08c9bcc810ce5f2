import { getWarehousePool } from '../../shared/database/warehouse.client.js';
import type { RawRow } from '../normalization/normalization.types.js';
import type { RowQuery } from './sources.types.js';

// Table names come from configuration, so they are validated and quoted rather than interpolated raw.
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const quoteTableName = (name: string): string => {
  const parts = name.trim().split('.');
  if (parts.length > 2 || parts.some((part) => !IDENTIFIER_PATTERN.test(part))) {
    throw new Error(`Invalid warehouse table name: ${name}`);
  }
  return parts.map((part) => `"${part}"`).join('.');
};

export const queryWarehouseRows: RowQuery = async (text, values) => {
  const result = await getWarehousePool().query<RawRow>(text, values);
  return result.rows;
};
