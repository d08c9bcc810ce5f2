import { DateTime } from 'luxon';
import type { CalendarDate } from '../normalization/normalization.types.js';
import { mean } from './reportStatistics.js';
import { NO_UPGRADE, UNKNOWN_OCCUPATION } from './reporting.types.js';
import type { ReportRow, VacancyReportRow } from './reporting.types.js';

const round = (value: number, digits: number) => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const daysBetween = (start: CalendarDate, end: CalendarDate) =>
  Math.floor(DateTime.fromISO(end, { zone: 'utc' }).diff(DateTime.fromISO(start, { zone: 'utc' }), 'days').days);

/**
 * Days a posting has been live: publishing to expiration, or publishing to today for a published
 * posting with no expiration. Non-positive spans are reported as unknown.
 */
export const resolveDaysActive = (row: ReportRow, today: CalendarDate): number | null => {
  if (!row.publishingDate) {
    return null;
  }
  let days: number | null = null;
  if (row.expirationDate) {
    days = daysBetween(row.publishingDate, row.expirationDate);
  } else if (row.workflowState === 'published') {
    days = daysBetween(row.publishingDate, today);
  }
  return days !== null && days > 0 ? days : null;
};

interface VacancyTally {
  first: ReportRow;
  clicks: number;
  applies: number;
}

type VacancyDraft = Omit<VacancyReportRow, 'occupationAvgClicks' | 'occupationAvgApplies'>;

const toDraft = ({ first, clicks, applies }: VacancyTally, entityId: string, today: CalendarDate): VacancyDraft => {
  const daysActive = resolveDaysActive(first, today);
  const perDay = (count: number) =>
    daysActive !== null && first.workflowState === 'published' ? round(count / daysActive, 2) : null;
  return {
    entityId,
    title: first.title ?? first.organization,
    organization: first.organization,
    workflowState: first.workflowState,
    publishingDate: first.publishingDate,
    expirationDate: first.expirationDate,
    daysActive,
    region: first.region,
    occupation: first.occupations[0] ?? UNKNOWN_OCCUPATION,
    importer: first.importer,
    upgrades: first.upgrades.length ? first.upgrades.join(', ') : NO_UPGRADE,
    clicks,
    applies,
    applyClickRatio: clicks > 0 ? round((applies / clicks) * 100, 2) : null,
    clicksPerDay: perDay(clicks),
    appliesPerDay: perDay(applies)
  };
};

export const buildVacancyReport = (
  rows: ReportRow[],
  today: CalendarDate = DateTime.utc().toFormat('yyyy-MM-dd')
): VacancyReportRow[] => {
  const tallies = new Map<string, VacancyTally>();
  for (const row of rows) {
    if (!row.entityId) {
      continue;
    }
    let tally = tallies.get(row.entityId);
    if (!tally) {
      tally = { first: row, clicks: 0, applies: 0 };
      tallies.set(row.entityId, tally);
    }
    if (row.eventName === 'visit') {
      tally.clicks += 1;
    } else if (row.eventName === 'apply_start') {
      tally.applies += 1;
    }
  }

  const drafts = Array.from(tallies.entries()).map(([entityId, tally]) => toDraft(tally, entityId, today));

  const byOccupation = new Map<string, VacancyDraft[]>();
  for (const draft of drafts) {
    const bucket = byOccupation.get(draft.occupation);
    if (bucket) {
      bucket.push(draft);
    } else {
      byOccupation.set(draft.occupation, [draft]);
    }
  }

  return drafts
    .map((draft) => {
      const peers = byOccupation.get(draft.occupation) ?? [draft];
      return {
        ...draft,
        occupationAvgClicks: round(mean(peers.map((peer) => peer.clicks)), 1),
        occupationAvgApplies: round(mean(peers.map((peer) => peer.applies)), 1)
      };
    })
    .sort((a, b) => b.clicks - a.clicks || a.entityId.localeCompare(b.entityId));
};
