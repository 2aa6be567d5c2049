/**
 * Rate Limiting Configuration
 *
 * Custom rate limits for different endpoints
 */

import { FastifyInstance } from 'fastify';

export interface RateLimitSettings {
  submitPerMinute: number;
}

/**
 * Apply stricter rate limits to specific routes. Must run before
 * @fastify/rate-limit is registered and before the routes are.
 */
export function configureRateLimits(fastify: FastifyInstance, settings: RateLimitSettings): void {
  // News submission: configurable, per IP
  fastify.addHook('onRoute', (routeOptions) => {
    if ((routeOptions.url === '/news' || routeOptions.url === '/news/') && routeOptions.method === 'POST') {
      routeOptions.config = {
        ...routeOptions.config,
        rateLimit: {
          max: settings.submitPerMinute,
          timeWindow: '1 minute',
        },
      };
    }
  });

  // Manual sweeps walk the whole table: 6 per minute
  fastify.addHook('onRoute', (routeOptions) => {
    if (routeOptions.url === '/moderation/sweep' && routeOptions.method === 'POST') {
      routeOptions.config = {
        ...routeOptions.config,
        rateLimit: {
          max: 6,
          timeWindow: '1 minute',
        },
      };
    }
  });
}
