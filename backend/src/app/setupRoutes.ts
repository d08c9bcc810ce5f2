import type { Application } from 'express';
import { reportingRouter } from '../modules/reporting/reporting.router.js';
import { healthRouter } from '../shared/health.router.js';

export const registerAppRoutes = (app: Application) => {
  app.use('/health', healthRouter);
  app.use('/reports', reportingRouter);
};
