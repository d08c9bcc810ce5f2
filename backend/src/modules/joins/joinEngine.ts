import type { JoinKeyCollisionWarning } from '../../shared/pipelineErrors.js';
import type { EventRecord, MetadataRecord } from '../normalization/normalization.types.js';

export interface JoinedRecord {
  event: EventRecord;
  metadata: MetadataRecord | null;
}

export interface MetadataIndex {
  byEntityId: Map<string, MetadataRecord>;
  collisions: JoinKeyCollisionWarning[];
  skippedWithoutId: number;
}

interface IndexedEntry {
  record: MetadataRecord;
  position: number;
}

const isOlder = (incoming: MetadataRecord, existing: MetadataRecord) => {
  if (!incoming.updatedAt || !existing.updatedAt) {
    return false;
  }
  return Date.parse(incoming.updatedAt) < Date.parse(existing.updatedAt);
};

/**
 * Indexes metadata by entity id. A duplicate id replaces the earlier row (last write wins), unless
 * both rows carry a recency timestamp and the later row is older. Every duplicate is reported.
 */
export const buildMetadataIndex = (records: MetadataRecord[]): MetadataIndex => {
  const entries = new Map<string, IndexedEntry>();
  const collisions: JoinKeyCollisionWarning[] = [];
  let skippedWithoutId = 0;

  records.forEach((record, position) => {
    if (!record.entityId) {
      skippedWithoutId += 1;
      return;
    }
    const existing = entries.get(record.entityId);
    if (!existing) {
      entries.set(record.entityId, { record, position });
      return;
    }
    if (isOlder(record, existing.record)) {
      collisions.push({
        code: 'JOIN_KEY_COLLISION',
        entityId: record.entityId,
        keptIndex: existing.position,
        discardedIndex: position
      });
      return;
    }
    collisions.push({
      code: 'JOIN_KEY_COLLISION',
      entityId: record.entityId,
      keptIndex: position,
      discardedIndex: existing.position
    });
    entries.set(record.entityId, { record, position });
  });

  const byEntityId = new Map<string, MetadataRecord>();
  for (const [entityId, entry] of entries) {
    byEntityId.set(entityId, entry.record);
  }
  return { byEntityId, collisions, skippedWithoutId };
};

// Left outer join; output order follows the events.
export const joinEventsWithMetadata = (events: EventRecord[], index: MetadataIndex): JoinedRecord[] =>
  events.map((event) => ({
    event,
    metadata: event.entityId ? index.byEntityId.get(event.entityId) ?? null : null
  }));
