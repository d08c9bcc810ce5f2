import { Router } from 'express';
import type { Response } from 'express';
import { FetchError, InvalidReportQueryError } from '../../shared/pipelineErrors.js';
import { reportingService } from './reporting.module.js';
import { parseReportFilters, resolveDimension, resolveHeatmapMetric } from './reportQuery.js';

const router = Router();

const sendReportError = (res: Response, error: unknown, context: string, message: string) => {
  if (error instanceof InvalidReportQueryError) {
    res.status(400).json({ code: error.code, message: error.message });
    return;
  }
  if (error instanceof FetchError) {
    console.error(`${context}: the ${error.source} source is unavailable:`, error);
    res.status(503).json({ code: error.code, message: error.message });
    return;
  }
  console.error(`${context}:`, error);
  res.status(500).json({ code: 'reporting-error', message });
};

const sendCsv = (res: Response, filename: string, csv: string) => {
  res.setHeader('Content-Type', 'text/csv; charset=utf-8');
  res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
  res.send(`\uFEFF${csv}`);
};

router.get('/summary', async (req, res) => {
  try {
    const summary = await reportingService.getSummary(parseReportFilters(req.query));
    res.json(summary);
  } catch (error) {
    sendReportError(res, error, 'Failed to load the report summary', 'Unable to load summary metrics.');
  }
});

router.get('/breakdown', async (req, res) => {
  try {
    const groupBy = resolveDimension(req.query.groupBy, 'region');
    const breakdown = await reportingService.getBreakdown(groupBy, parseReportFilters(req.query));
    res.json(breakdown);
  } catch (error) {
    sendReportError(res, error, 'Failed to load the report breakdown', 'Unable to load the breakdown.');
  }
});

router.get('/trend', async (req, res) => {
  try {
    const points = await reportingService.getTrend(parseReportFilters(req.query));
    res.json({ points });
  } catch (error) {
    sendReportError(res, error, 'Failed to load the daily trend', 'Unable to load the trend.');
  }
});

router.get('/vacancies', async (req, res) => {
  try {
    const vacancies = await reportingService.getVacancies(parseReportFilters(req.query));
    res.json({ vacancies });
  } catch (error) {
    sendReportError(res, error, 'Failed to load the vacancy table', 'Unable to load vacancy performance.');
  }
});

router.get('/heatmap', async (req, res) => {
  try {
    const rows = resolveDimension(req.query.rows, 'region', 'rows');
    const columns = resolveDimension(req.query.columns, 'importer', 'columns');
    const metric = resolveHeatmapMetric(req.query.metric);
    const heatmap = await reportingService.getHeatmap(rows, columns, metric, parseReportFilters(req.query));
    res.json(heatmap);
  } catch (error) {
    sendReportError(res, error, 'Failed to load the heatmap', 'Unable to load the heatmap.');
  }
});

router.get('/comparison', async (req, res) => {
  try {
    const comparison = await reportingService.getComparison(
      parseReportFilters(req.query, 'a.'),
      parseReportFilters(req.query, 'b.')
    );
    res.json(comparison);
  } catch (error) {
    sendReportError(res, error, 'Failed to compare report segments', 'Unable to compare the selected segments.');
  }
});

router.get('/filters', async (_req, res) => {
  try {
    res.json(await reportingService.getFilterOptions());
  } catch (error) {
    sendReportError(res, error, 'Failed to load filter options', 'Unable to load filter options.');
  }
});

router.get('/status', async (_req, res) => {
  try {
    res.json(await reportingService.getStatus());
  } catch (error) {
    sendReportError(res, error, 'Failed to load dataset status', 'Unable to load dataset status.');
  }
});

router.post('/refresh', async (_req, res) => {
  try {
    res.json(await reportingService.refresh());
  } catch (error) {
    sendReportError(res, error, 'Failed to refresh source datasets', 'Unable to refresh the source datasets.');
  }
});

router.get('/export/:dataset', async (req, res) => {
  const dataset = req.params.dataset;

  try {
    const filters = parseReportFilters(req.query);
    switch (dataset) {
      case 'breakdown': {
        const groupBy = resolveDimension(req.query.groupBy, 'region');
        sendCsv(res, `job-performance-${groupBy}.csv`, await reportingService.exportBreakdown(groupBy, filters));
        return;
      }
      case 'vacancies': {
        sendCsv(res, 'vacancy-performance.csv', await reportingService.exportVacancies(filters));
        return;
      }
      default:
        res.status(404).json({ code: 'not-found', message: 'Unknown dataset for export.' });
    }
  } catch (error) {
    sendReportError(res, error, 'Failed to export report dataset', 'Unable to prepare the export file.');
  }
});

export { router as reportingRouter };
