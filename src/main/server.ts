import cors from 'cors';
import express, { type Express } from 'express';
import type { MountController, ObjectResolver } from './mountController';
import { createCatalogRouter } from './routes/catalog';
import { createMountRouter } from './routes/mount';
import type { StatusHistory } from './statusHistory';

export interface ServerDeps {
  controller: MountController;
  history: StatusHistory;
  resolver?: ObjectResolver;
}

export function createServer({ controller, history, resolver }: ServerDeps): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use('/api/mount', createMountRouter({ controller, history, resolver }));
  if (resolver) {
    app.use('/api/catalog', createCatalogRouter(resolver));
  }

  app.get('/', (_req, res) => {
    res.send(controller.identify());
  });

  return app;
}
