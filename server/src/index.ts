import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { ArtifactStore } from './services/artifactStore.js';
import { FalProvider } from './services/falProvider.js';

// Load environment variables
dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();

  console.log('===== ENV CHECK =====');
  console.log('PUBLIC_BASE_URL:', config.publicBaseUrl);
  console.log('FAL_RUN_URL:', config.falRunUrl);
  console.log('FAL_KEY exists?', !!config.falKey, 'length:', config.falKey.length);
  console.log('TMP_DIR:', config.tmpDir, 'TTL minutes:', config.ttlMs / 60000);
  console.log('=====================');

  const store = new ArtifactStore({ dir: config.tmpDir, ttlMs: config.ttlMs });
  await store.init();
  store.start(config.sweepIntervalMs);

  const provider = new FalProvider({
    apiKey: config.falKey,
    runUrl: config.falRunUrl,
    authType: config.falAuthType,
    timeoutMs: config.providerTimeoutMs,
  });

  const app = createApp({ config, provider, store });
  const server = app.listen(config.port, config.host, () => {
    console.log(`🚀 Try-on proxy running on http://${config.host}:${config.port}`);
    console.log(`📡 Health check: ${config.publicBaseUrl}/api/health`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    store.stop();
    server.close(err => {
      if (err) {
        console.error('[Server] Close failed:', err);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(error => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
