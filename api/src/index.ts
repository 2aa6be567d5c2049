/**
 * Cosmos News API Server
 *
 * Space news publishing with automated fake-news moderation
 */

import { getConfig, loadModerationConfig, validateConfig } from './config.js';
import { initDb, closeDb } from './db/index.js';
import { buildApp } from './app.js';
import { MediaStore } from './services/media-store.js';

async function main() {
  // Load configuration
  const config = getConfig();

  // Validate configuration
  const errors = validateConfig(config);
  if (errors.length > 0) {
    console.error('Configuration errors:');
    errors.forEach(e => console.error(`  - ${e}`));
    process.exit(1);
  }

  const moderation = loadModerationConfig(config);
  console.log(`  Moderation: ${moderation.preset} preset, threshold ${moderation.threshold}, lexicon ${moderation.lexicon.locale}`);
  if (config.sweepIntervalMinutes > 0) {
    console.log(`  Fake news sweep: every ${config.sweepIntervalMinutes} minute(s)`);
  } else {
    console.log('  Fake news sweep: startup and on demand only (SWEEP_INTERVAL_MINUTES=0)');
  }

  // Initialize database and upload directory
  console.log(`Initializing database at ${config.databasePath}...`);
  const db = initDb(config.databasePath);
  const media = new MediaStore(config.uploadDir, config.maxUploadBytes);
  media.init();

  const { fastify, services } = await buildApp({ config, moderation, db, media });

  // One-time sweep at startup
  const startup = services.policy.sweepAndPurge();
  if (startup.purgedCount > 0) {
    console.log(`  Purged ${startup.purgedCount} news item(s) above the fake threshold`);
  }

  let sweepTimer: NodeJS.Timeout | undefined;

  // Graceful shutdown
  const shutdown = async () => {
    console.log('\nShutting down...');
    clearInterval(sweepTimer);
    await fastify.close();
    closeDb();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // Start server
  try {
    const address = await fastify.listen({
      port: config.port,
      host: config.host,
    });
    console.log(`\n  Cosmos News API running at ${address}`);
    console.log(`   Environment: ${config.nodeEnv}`);
    console.log(`   Database: ${config.databasePath}`);
    console.log(`   Uploads: ${config.uploadDir}\n`);

    // Periodic job: purge items above the threshold
    if (config.sweepIntervalMinutes > 0) {
      sweepTimer = setInterval(() => {
        try {
          services.policy.sweepAndPurge();
        } catch (err) {
          fastify.log.error(err, 'Failed to sweep fake news');
        }
      }, config.sweepIntervalMinutes * 60 * 1000);
    }
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

main().catch(err => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
