import type { Express, Request, Response } from 'express';
import { PACKAGE_VERSION } from '../server/runtime.js';
import type { WxConfig } from '../utils/config.js';
import { describePosition } from '../utils/position.js';

export interface HealthPayload {
  ok: boolean;
  service: 'wxline';
  version: string;
  uptime: number;
  avwxKeyConfigured: boolean;
  position: { kind: WxConfig['position']['kind']; label: string };
  showChangeTimes: boolean;
}

interface RegisterHealthRoutesOptions {
  app: Express;
  config: Readonly<WxConfig>;
  avwxKeyConfigured: boolean;
}

/** Reports are only servable with a provider key, so health follows it. */
export const buildHealthPayload = ({ config, avwxKeyConfigured }: Omit<RegisterHealthRoutesOptions, 'app'>): HealthPayload => ({
  ok: avwxKeyConfigured,
  service: 'wxline',
  version: PACKAGE_VERSION,
  uptime: Math.floor(process.uptime()),
  avwxKeyConfigured,
  position: { kind: config.position.kind, label: describePosition(config.position) },
  showChangeTimes: config.showChangeTimes,
});

export const registerHealthRoutes = ({ app, config, avwxKeyConfigured }: RegisterHealthRoutesOptions) => {
  const respond = (_req: Request, res: Response) => {
    const payload = buildHealthPayload({ config, avwxKeyConfigured });
    res.status(payload.ok ? 200 : 503).json(payload);
  };

  app.get('/healthz', respond);
  app.get('/api/health', respond);
};
