import { describe, expect, it, vi } from 'vitest';
import { FetchError } from '../../shared/pipelineErrors.js';
import { normalizeMetadataRows } from '../normalization/fieldNormalizer.js';
import { ImporterMappingRepository, parseImporterMapping } from './importerMapping.repository.js';
import { MetadataSpreadsheetRepository } from './metadataSpreadsheet.repository.js';
import { parseWorkbookText } from './workbookReader.js';

describe('parseWorkbookText', () => {
  it('reads a job export whose headers the normalizer recognises', () => {
    const csv = [
      'Job ID,Title,Publishing date,Occupational fields,Organization profile name',
      '12345,"Care Assistant, nights",2024-01-05,Care|Health,Northwind Care',
      '12346,Driver,,,'
    ].join('\n');

    const rows = parseWorkbookText(csv);
    const { records, issues } = normalizeMetadataRows(rows);

    expect(rows).toHaveLength(2);
    expect(issues.malformedDates).toEqual([]);
    expect(records[0]).toMatchObject({
      entityId: '12345',
      title: 'Care Assistant, nights',
      publishingDate: '2024-01-05',
      occupationalFields: ['Care', 'Health'],
      organizationProfileName: 'Northwind Care'
    });
    expect(records[1]).toMatchObject({
      entityId: '12346',
      title: 'Driver',
      publishingDate: null,
      occupationalFields: [],
      organizationProfileName: null
    });
  });
});

describe('MetadataSpreadsheetRepository', () => {
  it('reports unreadable exports as a metadata FetchError', async () => {
    const repository = new MetadataSpreadsheetRepository('exports/jobs.xlsx', async () => {
      throw new Error('corrupt workbook');
    });

    await expect(repository.loadMetadata()).rejects.toMatchObject({
      source: 'metadata',
      message: 'Unable to load metadata dataset: corrupt workbook'
    });
  });
});

describe('importer mapping', () => {
  it('maps importer ids to names and skips incomplete rows', () => {
    const mapping = parseImporterMapping([
      { 'Importer ID': 7, 'Importer Name': 'Feed A' },
      { importer_id: '8.0', importer_name: ' Feed B ' },
      { importer_id: '9', importer_name: '' },
      { importer_name: 'Orphan' }
    ]);

    expect(Array.from(mapping.entries())).toEqual([
      ['7', 'Feed A'],
      ['8', 'Feed B']
    ]);
  });

  it('treats a missing mapping file as an empty mapping', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const repository = new ImporterMappingRepository('data/importers.csv', async () => {
      throw Object.assign(new Error('no such file'), { code: 'ENOENT' });
    });

    expect((await repository.loadImporterNames()).size).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('fails on any other read error', async () => {
    const repository = new ImporterMappingRepository('data/importers.csv', async () => {
      throw new Error('permission denied');
    });

    await expect(repository.loadImporterNames()).rejects.toBeInstanceOf(FetchError);
  });
});
