import type { BreakdownResult, VacancyReportRow } from './reporting.types.js';

export const csvEscape = (value: string) => {
  if (value.includes(',') || value.includes('\n') || value.includes('\r') || value.includes('"')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
};

const formatOptional = (value: number | null, digits: number) => (value == null ? '' : value.toFixed(digits));

export const exportBreakdownCsv = (breakdown: BreakdownResult): string => {
  const header = [
    breakdown.groupBy,
    'vacancies',
    'clicks',
    'applies',
    'apply_click_ratio',
    'robust_mean_clicks_per_vacancy',
    'median_clicks_per_vacancy'
  ];
  const lines = [header.join(',')];

  for (const group of breakdown.groups) {
    lines.push(
      [
        csvEscape(group.key),
        String(group.vacancies),
        String(group.clicks),
        String(group.applies),
        group.applyClickRatio.toFixed(2),
        group.robustMeanClicksPerVacancy.toFixed(1),
        group.medianClicksPerVacancy.toFixed(1)
      ].join(',')
    );
  }

  return lines.join('\n');
};

export const exportVacanciesCsv = (rows: VacancyReportRow[]): string => {
  const header = [
    'entity_id',
    'title',
    'organization',
    'workflow_state',
    'publishing_date',
    'expiration_date',
    'days_active',
    'region',
    'occupation',
    'importer',
    'upgrades',
    'clicks',
    'applies',
    'apply_click_ratio',
    'clicks_per_day',
    'applies_per_day',
    'occupation_avg_clicks',
    'occupation_avg_applies'
  ];
  const lines = [header.join(',')];

  for (const row of rows) {
    lines.push(
      [
        csvEscape(row.entityId),
        csvEscape(row.title ?? ''),
        csvEscape(row.organization),
        row.workflowState ?? '',
        row.publishingDate ?? '',
        row.expirationDate ?? '',
        row.daysActive == null ? '' : String(row.daysActive),
        csvEscape(row.region),
        csvEscape(row.occupation),
        csvEscape(row.importer),
        csvEscape(row.upgrades),
        String(row.clicks),
        String(row.applies),
        formatOptional(row.applyClickRatio, 2),
        formatOptional(row.clicksPerDay, 2),
        formatOptional(row.appliesPerDay, 2),
        row.occupationAvgClicks.toFixed(1),
        row.occupationAvgApplies.toFixed(1)
      ].join(',')
    );
  }

  return lines.join('\n');
};
