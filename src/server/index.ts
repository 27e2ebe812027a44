/**
 * HTTP server entry point
 *
 * Serves the operator API with Hono on Node. Loads `.env`, opens the stores
 * and listens on HOST:PORT.
 */

import { serve } from '@hono/node-server';
import { config as loadEnv } from 'dotenv';
import { loadConfig } from '../config.js';
import { createEngine } from '../engine.js';
import { createApi } from './api.js';

loadEnv();

const config = loadConfig();

console.log(`🧠 Starting concept graph server...`);
console.log(`🔗 API endpoints:`);
console.log(`   GET    /api/health        - Health check`);
console.log(`   GET    /api/status        - Store sizes`);
console.log(`   GET    /api/staging       - Staged entries`);
console.log(`   DELETE /api/staging       - Discard a staged entry`);
console.log(`   GET    /api/clusters      - Cluster check report`);
console.log(`   GET    /api/manifest      - Promotion manifest`);
console.log(`   GET    /api/concepts/:id  - Concept details`);
console.log(`   GET    /api/backups       - Backups and snapshots`);
console.log(`   POST   /api/sync          - Run sync`);
console.log(`   GET    /api/verify        - Store consistency`);

createEngine(config)
  .then(engine => {
    const server = serve(
      {
        fetch: createApi(engine).fetch,
        port: config.server.port,
        hostname: config.server.host
      },
      info => {
        console.log(`✅ Server is running on http://${info.address}:${info.port}`);
      }
    );

    const shutdown = (): void => {
      console.log('\n🛑 Shutting down concept graph server...');
      server.close();
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  })
  .catch((error: unknown) => {
    console.error(`❌ Failed to start server:`, error);
    process.exitCode = 1;
  });
