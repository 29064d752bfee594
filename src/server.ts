import http from 'http';
import type { Express } from 'express';
import { createApp } from './app';
import { AuditTrail } from './audit/auditTrail';
import config from './config';
import { initSchema, pool } from './db';
import { CreditLedger } from './ledger/creditLedger';
import logger from './logger';
import { createPgStore } from './repositories/pgStore';
import { FleetReports } from './reports/fleetReport';
import { ReadingIngest } from './services/ingestion/readingIngest';
import { IrradianceGateway } from './services/irradiance/irradianceGateway';
import { NasaPowerClient } from './services/irradiance/nasaPowerClient';
import { IntegrityGuard } from './state/integrityGuard';
import { setDbReady } from './state/readiness';

export interface StartServerOptions {
  port?: number;
}

export interface StartedServer {
  app: Express;
  server: http.Server;
  port: number;
  stop: () => Promise<void>;
}

export async function startServer(options: StartServerOptions = {}): Promise<StartedServer> {
  logger.info('[startup] initSchema starting');
  setDbReady(false, 'initializing');
  await initSchema();
  setDbReady(true);
  logger.info('[startup] initSchema done');

  const store = createPgStore();
  const auditTrail = new AuditTrail(store.audit);
  const integrity = new IntegrityGuard();
  const irradiance = new IrradianceGateway(
    new NasaPowerClient(config.irradiance.baseUrl),
    store.irradianceCache,
    config.irradiance,
  );
  const ledger = new CreditLedger({
    store,
    auditTrail,
    irradiance,
    integrity,
    policy: config.verification,
  });
  const reports = new FleetReports(store, auditTrail, integrity);

  const chain = await reports.chainStatus();
  if (chain.valid) {
    logger.info('[startup] audit chain verified', { totalEntries: chain.totalEntries });
  } else {
    logger.error(
      { brokenAtSequenceNo: chain.brokenAtSequenceNo },
      '[startup] audit chain broken, ledger mutations halted',
    );
  }

  const app = createApp(
    {
      ingest: new ReadingIngest(store),
      ledger,
      reports,
      integrity,
      checkDb: async () => {
        await pool.query('SELECT 1');
      },
    },
    config.ingress,
  );

  const server = http.createServer(app);
  const desiredPort = options.port ?? config.port;
  const actualPort = await new Promise<number>((resolve, reject) => {
    server.once('error', reject);
    server.listen(desiredPort, () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : desiredPort;
      logger.info(`dMRV engine listening on http://localhost:${port}`);
      resolve(port);
    });
  });

  const stop = async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await pool.end();
  };

  return { app, server, port: actualPort, stop };
}
