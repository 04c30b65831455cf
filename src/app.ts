import express, { type Express } from 'express';
import cors from 'cors';
import { config, isDebug, isDevelopment } from './config';
import { type BoxCatalog, defaultCatalog } from './services/catalog';
import { createPackRouter, ENDPOINTS } from './routes/pack';
import { errorHandler, notFound } from './middleware/errors';

export const SERVICE_NAME = 'Box Picker API';
export const VERSION = '1.0.0';

export function createApp(catalog: BoxCatalog = defaultCatalog, jsonLimit: string = config.jsonLimit): Express {
  const app = express();

  app.use(cors({
    origin: isDevelopment ? '*' : config.corsOrigins,
  }));

  app.use(express.json({ limit: jsonLimit }));

  app.use((req, _res, next) => {
    if (isDebug) {
      console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
    }
    next();
  });

  app.get('/', (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      version: VERSION,
      boxes: catalog.listAscendingByVolume().map(box => box.box_id),
      endpoints: ENDPOINTS,
    });
  });

  app.use('/', createPackRouter(catalog));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
