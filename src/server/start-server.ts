import type { Express } from 'express';
import type { Server } from 'node:http';

interface StartServerOptions {
  app: Express;
  port: number;
  signals?: NodeJS.Signals[];
}

/** Serves until one of `signals` arrives, then stops taking connections and lets the process drain. */
export const startServer = ({ app, port, signals = ['SIGINT', 'SIGTERM'] }: StartServerOptions): Server => {
  const server = app.listen(port, () => {
    console.log(`[server] Serving /api/metar and /api/taf on http://localhost:${port}`);
  });

  const stop = (signal: NodeJS.Signals) => {
    console.log(`[server] ${signal}, closing`);
    server.close((error) => {
      if (error) {
        console.error('[server] Close failed:', error);
        process.exitCode = 1;
      }
    });
  };
  for (const signal of signals) {
    process.once(signal, stop);
  }
  server.on('close', () => {
    for (const signal of signals) {
      process.off(signal, stop);
    }
  });

  return server;
};
