import { readFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import type { RawRow } from '../normalization/normalization.types.js';

/**
 * Rows of the first sheet keyed by header. CSV cells are kept as text and workbook date cells
 * arrive as `Date`, so date parsing stays with the normalizer.
 */
export const readWorkbookRows = (workbook: XLSX.WorkBook): RawRow[] => {
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) {
    return [];
  }
  const sheet = workbook.Sheets[sheetName];
  if (!sheet) {
    return [];
  }
  return XLSX.utils.sheet_to_json<RawRow>(sheet, { defval: null, raw: true, blankrows: false });
};

export const parseWorkbookText = (text: string): RawRow[] =>
  readWorkbookRows(XLSX.read(text, { type: 'string', raw: true, cellDates: true }));

export const loadWorkbookFile = async (path: string): Promise<RawRow[]> => {
  const buffer = await readFile(path);
  return readWorkbookRows(XLSX.read(buffer, { type: 'buffer', raw: true, cellDates: true }));
};

export const isMissingFileError = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';
