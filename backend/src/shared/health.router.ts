import { Router } from 'express';
import { pingWarehouse } from './database/warehouse.client.js';

const router = Router();

router.get('/', async (_req, res) => {
  try {
    await pingWarehouse();
    res.json({ status: 'ok', database: 'up' });
  } catch (error) {
    console.error('Health check could not reach PostgreSQL:', error);
    res.status(503).json({ status: 'degraded', database: 'down' });
  }
});

export { router as healthRouter };
