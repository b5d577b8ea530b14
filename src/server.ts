// src/server.ts
import mongoose from 'mongoose';
import { createApp } from './app';
import { config } from './config';

async function start(): Promise<void> {
  await mongoose.connect(config.mongoUri);
  console.log('[server] Connected to MongoDB');

  if (!config.accessKey) {
    console.log('[server] ACCESS_KEY is not set; POST /api/auth/token is disabled');
  }

  const app = createApp();
  app.listen(config.port, () => {
    console.log(`[server] Listening on port ${config.port} (timezone ${config.scheduler.timezone})`);
  });
}

start().catch(error => {
  console.error('[server] Failed to start:', error);
  process.exit(1);
});
