#!/usr/bin/env node
import { runCli } from './src/cli.js';
import { startServer } from './src/server/start-server.js';
import { AVWX_API_KEY, AVWX_BASE_URL, PORT, REQUEST_TIMEOUT_MS } from './src/server/runtime.js';
import { createAvwxClient } from './src/utils/avwx-client.js';
import { createFetchWithTimeout } from './src/utils/http-client.js';
import { lookupGeoIp } from './src/utils/position.js';

const fetchWithTimeout = createFetchWithTimeout({ timeoutMs: REQUEST_TIMEOUT_MS });

const createClient = () => {
  if (!AVWX_API_KEY) {
    throw new Error('AVWX_API_KEY is not set. Add it to the environment or a .env file.');
  }
  return createAvwxClient({
    apiKey: AVWX_API_KEY,
    baseUrl: AVWX_BASE_URL,
    fetchWithTimeout,
  });
};

process.exitCode = await runCli(process.argv.slice(2), {
  createClient,
  locateByIp: () => lookupGeoIp({ fetchWithTimeout }),
  serve: (app) => {
    startServer({ app, port: PORT });
  },
});
