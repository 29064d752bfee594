import cors, { type CorsOptions } from 'cors';
import express, { type Express } from 'express';
import type { Config } from './config';
import type { CreditLedger } from './ledger/creditLedger';
import logger from './logger';
import type { FleetReports } from './reports/fleetReport';
import { createCreditsRouter } from './routes/credits';
import { errorHandler } from './routes/errorHandler';
import { createInvertersRouter } from './routes/inverters';
import { createReportsRouter } from './routes/reports';
import type { ReadingIngest } from './services/ingestion/readingIngest';
import type { IntegrityGuard } from './state/integrityGuard';
import { getReadiness } from './state/readiness';

export interface AppServices {
  ingest: ReadingIngest;
  ledger: CreditLedger;
  reports: FleetReports;
  integrity: IntegrityGuard;
  checkDb: () => Promise<void>;
}

export function createApp(services: AppServices, ingress: Config['ingress']): Express {
  const app = express();

  const allowedOrigins = new Set(ingress.corsAllowedOrigins);
  const corsOptions: CorsOptions = {
    origin(origin, callback) {
      if (!origin) return callback(null, true);
      return callback(null, allowedOrigins.has(origin));
    },
    optionsSuccessStatus: 204,
  };

  app.use(cors(corsOptions));
  app.options('*', cors(corsOptions));
  app.use(express.json({ limit: ingress.jsonBodyLimit }));
  app.use(express.text({ type: 'text/csv', limit: ingress.jsonBodyLimit }));

  app.get('/api/health', async (_req, res) => {
    let dbOk = true;
    try {
      await services.checkDb();
    } catch (err) {
      dbOk = false;
      logger.error({ err }, '[health] db check failed');
    }

    const readiness = getReadiness();
    const integrity = services.integrity.snapshot();
    const overallStatus = dbOk && readiness.dbReady && !integrity.halted ? 'ok' : 'degraded';

    res.json({
      status: overallStatus,
      db: { ok: dbOk, ready: readiness.dbReady, reason: readiness.dbReason },
      integrity,
    });
  });

  app.use('/api/inverters', createInvertersRouter(services.ingest));
  app.use('/api/credits', createCreditsRouter(services.ledger));
  app.use('/api/reports', createReportsRouter(services.reports, services.integrity));

  app.use(errorHandler);
  return app;
}
