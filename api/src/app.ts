/**
 * Cosmos News Fastify application
 *
 * Builds the HTTP surface around the moderation services. Kept separate from
 * index.ts so tests can drive it with fastify.inject().
 */

import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';

import { API_VERSION } from '../../shared/constants.js';
import type { Config } from './config.js';
import type { NewsDb } from './db/index.js';
import { configureRateLimits } from './middleware/rate-limit.js';
import { moderationRoutes } from './routes/moderation.js';
import { moonRoutes } from './routes/moon.js';
import { newsRoutes } from './routes/news.js';
import { FakeScoreClassifier } from './services/fake-score.js';
import type { MediaStore } from './services/media-store.js';
import { RetentionPolicy } from './services/retention-policy.js';
import type { ModerationConfig } from './services/scoring-config.js';

export type AppServices = {
  moderation: ModerationConfig;
  db: NewsDb;
  media: MediaStore;
  classifier: FakeScoreClassifier;
  policy: RetentionPolicy;
};

export interface BuildAppOptions {
  config: Config;
  moderation: ModerationConfig;
  db: NewsDb;
  media: MediaStore;
  logger?: FastifyServerOptions['logger'];
}

/**
 * Default logger: pretty debug output in development, JSON info in production
 */
export function loggerOptions(nodeEnv: string): FastifyServerOptions['logger'] {
  return {
    level: nodeEnv === 'production' ? 'info' : 'debug',
    transport: nodeEnv !== 'production' ? {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    } : undefined,
  };
}

export async function buildApp(options: BuildAppOptions): Promise<{ fastify: FastifyInstance; services: AppServices }> {
  const { config, moderation, db, media } = options;

  // Two base64-encoded uploads plus the text fields
  const bodyLimit = Math.ceil((config.maxUploadBytes * 4) / 3) * 2 + 256 * 1024;

  const fastify = Fastify({
    logger: options.logger ?? loggerOptions(config.nodeEnv),
    bodyLimit,
  });

  const classifier = new FakeScoreClassifier(moderation);
  const policy = new RetentionPolicy({
    config: moderation,
    classifier,
    store: db,
    media,
    logger: fastify.log,
  });
  const services: AppServices = { moderation, db, media, classifier, policy };

  // Register plugins
  await fastify.register(cors, {
    origin: true,
  });

  // Stricter per-route limits. These onRoute hooks must be added before the
  // rate-limit plugin's own hook, which reads config.rateLimit.
  configureRateLimits(fastify, { submitPerMinute: config.submitRateLimit });

  await fastify.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  // Health check
  fastify.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
  }));

  // API info
  fastify.get('/', async () => ({
    name: 'Cosmos News API',
    version: API_VERSION,
    description: 'Space news with automated fake-news moderation',
    moderation: {
      preset: moderation.preset,
      threshold: moderation.threshold,
      locale: moderation.lexicon.locale,
    },
    news_count: db.getNewsCount(),
  }));

  // Register routes
  await fastify.register(newsRoutes, { prefix: '/news', ...services });
  await fastify.register(moderationRoutes, { prefix: '/moderation', ...services });
  await fastify.register(moonRoutes, { prefix: '/moon' });

  return { fastify, services };
}
