import express from 'express';
import helmet from 'helmet';
import bodyParser from 'body-parser';
import cors from 'cors';
import { createInvitesRouter } from './routes/invites';
import loggerMiddleware from './middleware/logger';
import errorHandler from './middleware/errorHandler';
import type { InviteService } from './services/inviteService';

export type ServerOptions = {
  inviteService?: InviteService;
};

export function createServer(options: ServerOptions = {}) {
  const app = express();
  app.use(helmet());
  app.use(cors());
  app.use(bodyParser.json());
  app.use(loggerMiddleware);

  app.get('/health', (_req, res) => res.status(200).json({ ok: true }));
  app.use('/api', createInvitesRouter(options.inviteService));

  app.use(errorHandler);

  return app;
}

export default createServer;
