import { describe, expect, it } from 'vitest';
import type { ReportRow } from './reporting.types.js';
import { buildVacancyReport, resolveDaysActive } from './vacancyReport.js';

const row = (entityId: string | null, overrides: Partial<ReportRow> = {}): ReportRow => ({
  entityId,
  eventName: 'visit',
  eventDate: '2024-03-10',
  title: null,
  organization: 'Northwind',
  region: 'London',
  importer: 'Feed A',
  occupations: [],
  upgrades: [],
  workflowState: 'published',
  publishingDate: null,
  expirationDate: null,
  matched: true,
  ...overrides
});

const TODAY = '2024-03-31';

describe('resolveDaysActive', () => {
  it('spans publishing to expiration, or to today for live postings', () => {
    expect(resolveDaysActive(row('A', { publishingDate: '2024-03-10', expirationDate: '2024-03-20' }), TODAY)).toBe(10);
    expect(resolveDaysActive(row('A', { publishingDate: '2024-03-01' }), TODAY)).toBe(30);
  });

  it('is unknown without a publishing date, for unpublished open postings and for empty spans', () => {
    expect(resolveDaysActive(row('A'), TODAY)).toBeNull();
    expect(resolveDaysActive(row('A', { publishingDate: '2024-03-01', workflowState: 'unpublished' }), TODAY)).toBeNull();
    expect(resolveDaysActive(row('A', { publishingDate: '2024-03-20', expirationDate: '2024-03-20' }), TODAY)).toBeNull();
  });
});

describe('buildVacancyReport', () => {
  const v1 = {
    title: 'Care Assistant',
    publishingDate: '2024-03-01',
    occupations: ['Care', 'Admin'],
    upgrades: ['Featured', 'Urgent']
  };
  const v2 = {
    workflowState: 'unpublished' as const,
    publishingDate: '2024-03-10',
    expirationDate: '2024-03-20',
    occupations: ['Care']
  };
  const rows = [
    row('V1', v1),
    row('V2', v2),
    row('V1', v1),
    row('V3', { eventName: 'other' }),
    row('V1', { ...v1, eventName: 'apply_start' }),
    row('V4', { publishingDate: '2024-03-20', expirationDate: '2024-03-20' }),
    row('V1', v1),
    row(null)
  ];

  const report = buildVacancyReport(rows, TODAY);

  it('lists one row per vacancy, most clicked first', () => {
    expect(report.map((item) => [item.entityId, item.clicks, item.applies])).toEqual([
      ['V1', 3, 1],
      ['V2', 1, 0],
      ['V4', 1, 0],
      ['V3', 0, 0]
    ]);
  });

  it('reports per-day rates only for published postings', () => {
    const [first, second] = report;

    expect(first).toMatchObject({
      title: 'Care Assistant',
      daysActive: 30,
      occupation: 'Care',
      upgrades: 'Featured, Urgent',
      applyClickRatio: 33.33,
      clicksPerDay: 0.1,
      appliesPerDay: 0.03
    });
    expect(second).toMatchObject({ daysActive: 10, applyClickRatio: 0, clicksPerDay: null, appliesPerDay: null });
  });

  it('falls back to the organization, Unknown and None for missing details', () => {
    const v3 = report.find((item) => item.entityId === 'V3');

    expect(v3).toMatchObject({
      title: 'Northwind',
      occupation: 'Unknown',
      upgrades: 'None',
      daysActive: null,
      applyClickRatio: null
    });
  });

  it('attaches the average clicks and applies of the vacancy occupation', () => {
    const averages = report.map((item) => [item.entityId, item.occupationAvgClicks, item.occupationAvgApplies]);

    expect(averages).toEqual([
      ['V1', 2, 0.5],
      ['V2', 2, 0.5],
      ['V4', 0.5, 0],
      ['V3', 0.5, 0]
    ]);
  });
});
