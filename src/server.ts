import 'dotenv/config';
import { buildApp } from './app.js';
import { env } from './config/env.js';
import { loadEngineConfig } from './config/engine.config.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { startAdvisoryCycleJob, stopAdvisoryCycleJob } from './jobs/advisory-cycle.job.js';
import { LiveMarketDataService } from './modules/market-data/index.js';
import { FilePortfolioSource } from './modules/portfolio/index.js';
import { InMemorySnapshotRepository, MongoSnapshotRepository, type SnapshotRepository } from './modules/snapshots/index.js';

async function main(): Promise<void> {
  console.log('[Server] Starting cycle advisor...');

  const engineConfig = loadEngineConfig(env.ENGINE_CONFIG_PATH);
  const hasMongo = await connectMongo();
  const snapshots: SnapshotRepository = hasMongo ? new MongoSnapshotRepository() : new InMemorySnapshotRepository();

  const deps = {
    marketData: new LiveMarketDataService(),
    portfolio: new FilePortfolioSource(env.PORTFOLIO_PATH),
    snapshots,
  };

  const app = buildApp({ deps, engineConfig });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[Server] Received ${signal}, shutting down...`);
    stopAdvisoryCycleJob();
    await app.close();
    await disconnectMongo();
    console.log('[Server] Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      console.error('[Server] Shutdown error:', err);
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  await app.listen({ port: env.PORT, host: '0.0.0.0' });
  console.log(`[Server] Listening on port ${env.PORT}`);

  if (env.ADVISOR_CRON_ENABLED) {
    startAdvisoryCycleJob(env.ADVISOR_CRON, deps, engineConfig, app.log);
  } else {
    console.log('[Server] Advisor cron disabled (ADVISOR_CRON_ENABLED=false)');
  }
}

main().catch((err) => {
  console.error('[Server] Fatal startup error:', err);
  process.exit(1);
});
