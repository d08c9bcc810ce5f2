import { describe, expect, it } from 'vitest';
import type { EventRecord, MetadataRecord } from '../normalization/normalization.types.js';
import { buildMetadataIndex, joinEventsWithMetadata } from './joinEngine.js';

const event = (entityId: string | null, overrides: Partial<EventRecord> = {}): EventRecord => ({
  entityId,
  eventName: 'visit',
  rawEventName: 'job_visit',
  eventDate: '2024-02-01',
  organizationName: null,
  regionRaw: null,
  region: 'Unknown',
  upgrades: [],
  importerId: null,
  ...overrides
});

const metadata = (entityId: string | null, overrides: Partial<MetadataRecord> = {}): MetadataRecord => ({
  entityId,
  title: null,
  workflowState: 'published',
  occupationalFields: [],
  locations: null,
  region: 'Unknown',
  publishingDate: null,
  expirationDate: null,
  organizationProfileName: null,
  employmentType: null,
  updatedAt: null,
  ...overrides
});

describe('buildMetadataIndex', () => {
  it('keeps the last duplicate in input order and reports the collision', () => {
    const first = metadata('J3', { title: 'First' });
    const second = metadata('J3', { title: 'Second' });

    const index = buildMetadataIndex([first, metadata('J4'), second]);

    expect(index.byEntityId.size).toBe(2);
    expect(index.byEntityId.get('J3')).toBe(second);
    expect(index.collisions).toEqual([{ code: 'JOIN_KEY_COLLISION', entityId: 'J3', keptIndex: 2, discardedIndex: 0 }]);
  });

  it('lets a newer recency timestamp win over input order', () => {
    const newer = metadata('J5', { title: 'Newer', updatedAt: '2024-03-02T00:00:00.000Z' });
    const older = metadata('J5', { title: 'Older', updatedAt: '2024-03-01T00:00:00.000Z' });

    const index = buildMetadataIndex([newer, older]);

    expect(index.byEntityId.get('J5')).toBe(newer);
    expect(index.collisions).toEqual([{ code: 'JOIN_KEY_COLLISION', entityId: 'J5', keptIndex: 0, discardedIndex: 1 }]);
  });

  it('skips rows without an id', () => {
    const index = buildMetadataIndex([metadata(null), metadata('J1')]);
    expect(index.skippedWithoutId).toBe(1);
    expect([...index.byEntityId.keys()]).toEqual(['J1']);
  });
});

describe('joinEventsWithMetadata', () => {
  it('keeps every event in order and leaves unmatched metadata null', () => {
    const j1 = metadata('J1', { title: 'Caretaker' });
    const events = [event('J2'), event('J1'), event(null), event('J1', { eventName: 'apply_start' })];

    const joined = joinEventsWithMetadata(events, buildMetadataIndex([j1]));

    expect(joined).toHaveLength(events.length);
    expect(joined.map((record) => record.event)).toEqual(events);
    expect(joined.map((record) => record.metadata)).toEqual([null, j1, null, j1]);
  });

  it('returns an empty list for no events', () => {
    expect(joinEventsWithMetadata([], buildMetadataIndex([metadata('J1')]))).toEqual([]);
  });
});
