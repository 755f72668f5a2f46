import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import mongoose from 'mongoose';
import { errorHandler } from '@/middleware/errorHandler';
import { createReportRoutes } from '@/routes/report.routes';
import { RequestLedger } from '@/services/request-ledger.service';

const READY_STATES: Record<number, string> = {
  0: 'disconnected',
  1: 'connected',
  2: 'connecting',
  3: 'disconnecting',
};

export interface AppOptions {
  ledger: RequestLedger;
  clock?: () => Date;
  allowedOrigins?: string[];
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '10kb' }));
  app.use(helmet());
  app.use(cors({ origin: options.allowedOrigins }));

  // Routes
  app.use('/api/v1/reports', createReportRoutes(options.ledger, options.clock));

  app.get('/health', (req, res) => {
    const state = mongoose.connection.readyState;
    const database = READY_STATES[state] ?? 'unknown';
    res.status(state === 1 ? 200 : 503).json({
      status: state === 1 ? 'ok' : 'degraded',
      database,
      timestamp: new Date().toISOString(),
    });
  });

  // Error Handler
  app.use(errorHandler);

  return app;
}
