import type { Express } from 'express';
import { registerHealthRoutes } from './routes/health.js';
import { registerReportRoutes } from './routes/report.js';
import { createApp, type WxServerSettings } from './server/create-app.js';
import { AVWX_API_KEY } from './server/runtime.js';
import type { WxConfig } from './utils/config.js';
import type { ReportService } from './utils/report-service.js';

interface CreateWxAppOptions {
  reportService: ReportService;
  config: Readonly<WxConfig>;
  now?: () => number;
  server?: Partial<WxServerSettings>;
  avwxKeyConfigured?: boolean;
}

export const createWxApp = ({
  reportService,
  config,
  now,
  server,
  avwxKeyConfigured = AVWX_API_KEY !== '',
}: CreateWxAppOptions): Express => {
  const app = createApp(server);

  registerHealthRoutes({ app, config, avwxKeyConfigured });
  registerReportRoutes({ app, reportService, config, now });

  return app;
};
