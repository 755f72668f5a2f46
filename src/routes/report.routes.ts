import { Router } from 'express';
import { RequestLedger } from '@/services/request-ledger.service';
import { createReportController } from '@/controllers/report.controller';

export const createReportRoutes = (ledger: RequestLedger, clock?: () => Date): Router => {
  const router = Router();
  const controller = createReportController(ledger, clock);

  router.get('/', controller.listReports);
  // Registered before the parameterised route so it is not read as a date
  router.get('/next-due', controller.getNextDue);
  router.get('/:intervalStart', controller.getReport);

  return router;
};
