import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import compression from 'compression';
import adminRoutes from './routes/admin';
import errorHandler from './middleware/errorHandler';
import { Services } from './services';

export interface AppOptions {
  adminToken: string;
  /** Access log format; false turns request logging off. */
  accessLog?: string | false;
}

export function createApp(services: Services, options: AppOptions): express.Application {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: false }));
  app.use(express.json({ limit: '1mb' }));
  app.use(compression());
  if (options.accessLog !== false) {
    app.use(morgan(options.accessLog ?? 'combined'));
  }

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    max: 60,
    standardHeaders: true,
    legacyHeaders: false
  });
  app.use('/admin', limiter);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });
  app.use('/admin', adminRoutes(services, options.adminToken));

  app.use(errorHandler);

  return app;
}

export default createApp;
