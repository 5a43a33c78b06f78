import { serve } from '@hono/node-server';
import { createDb, migrate } from '@loancalc/engine';
import { API_VERSION, createApp } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const db = createDb(config.dbPath);
migrate(db);

const app = createApp(db, config);

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`Loan calculator API v${API_VERSION} → http://localhost:${info.port}`);
});
