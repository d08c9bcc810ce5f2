import { describe, expect, it, vi } from 'vitest';
import { FetchError } from '../../shared/pipelineErrors.js';
import { canonicalEventName, EVENT_NAME_ALIASES, resolveEventName } from '../normalization/fieldNormalizer.js';
import { buildEventsQuery, EventsWarehouseRepository } from './eventsWarehouse.repository.js';
import { MetadataWarehouseRepository } from './metadataWarehouse.repository.js';
import { quoteTableName } from './warehouseQuery.js';

describe('quoteTableName', () => {
  it('quotes plain and schema-qualified names', () => {
    expect(quoteTableName('job_events')).toBe('"job_events"');
    expect(quoteTableName('analytics.job_events')).toBe('"analytics"."job_events"');
  });

  it('rejects anything that is not an identifier', () => {
    expect(() => quoteTableName('events; DROP TABLE jobs')).toThrow('Invalid warehouse table name');
    expect(() => quoteTableName('a.b.c')).toThrow('Invalid warehouse table name');
  });
});

describe('buildEventsQuery', () => {
  it('covers every event name alias the normalizer accepts', () => {
    const [aliases] = buildEventsQuery('job_events').values;

    expect(aliases).toEqual([...EVENT_NAME_ALIASES.visit, ...EVENT_NAME_ALIASES.apply_start]);
    for (const raw of ['job_visit', 'Visit', 'apply-start', 'JOB-APPLY-START']) {
      expect(resolveEventName(raw)).not.toBe('other');
      expect(aliases).toContain(canonicalEventName(raw));
    }
  });

  it('restricts the read to tracked event names', () => {
    expect(buildEventsQuery('job_events')).toEqual({
      text: `SELECT * FROM "job_events" WHERE replace(lower(event_name), '-', '_') = ANY($1)`,
      values: [['job_visit', 'visit', 'job_apply_start', 'apply_start']]
    });
  });

  it('adds a row limit when one is configured', () => {
    expect(buildEventsQuery('job_events', 500)).toEqual({
      text: `SELECT * FROM "job_events" WHERE replace(lower(event_name), '-', '_') = ANY($1) LIMIT $2`,
      values: [['job_visit', 'visit', 'job_apply_start', 'apply_start'], 500]
    });
  });
});

describe('warehouse repositories', () => {
  it('returns the rows of the events query', async () => {
    const query = vi.fn().mockResolvedValue([{ entity_id: 'J1', event_name: 'job_visit' }]);
    const repository = new EventsWarehouseRepository('job_events', { limit: 10, query });

    expect(await repository.loadEvents()).toEqual([{ entity_id: 'J1', event_name: 'job_visit' }]);
    expect(query).toHaveBeenCalledWith(`SELECT * FROM "job_events" WHERE replace(lower(event_name), '-', '_') = ANY($1) LIMIT $2`, [
      ['job_visit', 'visit', 'job_apply_start', 'apply_start'],
      10
    ]);
  });

  it('wraps query failures in a FetchError for the source', async () => {
    const query = vi.fn().mockRejectedValue(new Error('relation does not exist'));
    const repository = new MetadataWarehouseRepository('job_metadata', query);

    const failure = repository.loadMetadata();

    await expect(failure).rejects.toBeInstanceOf(FetchError);
    await expect(failure).rejects.toMatchObject({
      source: 'metadata',
      message: 'Unable to load metadata dataset: relation does not exist'
    });
  });
});
