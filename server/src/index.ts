import 'dotenv/config';
import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { loadAppConfig } from './config';
import { logger } from './logger';
import { registerNotificationRoutes } from './routes/notifications';
import { registerReportRoutes } from './routes/report';
import { registerSalesRoutes } from './routes/sales';
import { createNotificationService } from './service/notificationService';

const config = loadAppConfig();
const app = new Hono();

const notificationService = createNotificationService(config.notification);

app.use(
  '/*',
  cors({
    origin: ['http://localhost:3000', 'http://localhost:5173'],
    allowMethods: ['GET', 'POST'],
    allowHeaders: ['Content-Type', 'Authorization'],
  })
);

app.use('*', async (c, next) => {
  const startedAt = Date.now();
  await next();
  logger.log(
    `[${c.req.method}] ${c.req.path} ${c.res.status} (${Date.now() - startedAt}ms)`
  );
});

app.get('/', (c) => {
  return c.text('KPI Report API Server');
});

registerReportRoutes(app, { config });
registerSalesRoutes(app);
registerNotificationRoutes(app, { notificationService });

serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    logger.log(`KPI report server listening on http://localhost:${info.port}`, {
      notification: notificationService.isConfigured,
      logFile: logger.getLogFilePath(),
    });
  }
);
