import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import { registerAppRoutes } from './setupRoutes.js';
import { pingWarehouse } from '../shared/database/warehouse.client.js';
import { reportingConfig } from '../modules/reporting/reporting.module.js';

const bootstrap = async () => {
  try {
    await pingWarehouse();
  } catch (error) {
    console.warn('Warehouse is not reachable yet; report requests will fail until it is:', error);
  }

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  registerAppRoutes(app);

  const port = process.env.PORT || 4000;

  app.listen(port, () => {
    console.log(
      `Reporting API is running on port ${port} (metadata from ${reportingConfig.metadataSource}, ` +
        `${reportingConfig.daysBack ? `last ${reportingConfig.daysBack} days` : 'full history'})`
    );
  });
};

bootstrap().catch((error) => {
  console.error('Failed to start the server:', error);
  process.exit(1);
});
