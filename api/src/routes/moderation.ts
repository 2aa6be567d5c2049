/**
 * Moderation Routes
 *
 * Dry-run scoring, on-demand sweeps and read-only storage audits.
 */

import { FastifyInstance } from 'fastify';
import type { SweepResponse } from '../../../shared/types.js';
import type { AppServices } from '../app.js';
import { findDuplicateTitles, findMissingMedia } from '../services/audits.js';
import { decide } from '../services/retention-policy.js';

interface ScoreBody {
  title?: string;
  content?: string;
}

export async function moderationRoutes(fastify: FastifyInstance, services: AppServices): Promise<void> {
  const { db, media, classifier, policy } = services;

  /**
   * POST /moderation/score
   * Score a text without storing anything. Returns the per-signal breakdown.
   */
  fastify.post<{
    Body: ScoreBody | null;
  }>('/score', async (request, reply) => {
    const body: ScoreBody = request.body ?? {};
    const title = typeof body.title === 'string' ? body.title : '';
    const content = body.content;

    if (typeof content !== 'string') {
      return reply.status(400).send({
        success: false,
        error: 'content must be a string',
      });
    }

    const breakdown = classifier.evaluate(content, title);
    return reply.send({
      success: true,
      data: {
        score: breakdown.score,
        verdict: decide(breakdown.score, policy.threshold),
        threshold: policy.threshold,
        preset: breakdown.preset,
        contributions: breakdown.contributions,
      },
    });
  });

  /**
   * POST /moderation/sweep
   * Purge every stored item above the threshold, with its media.
   */
  fastify.post('/sweep', async (_request, reply) => {
    const result = policy.sweepAndPurge();
    const data: SweepResponse = {
      threshold: result.threshold,
      purgedCount: result.purgedCount,
      purgedIds: result.purgedIds,
      failedIds: result.failures.map(f => f.id),
      mediaErrors: result.mediaErrors.map(e => ({ id: e.id, filename: e.filename, error: e.error })),
    };
    return reply.send({ success: true, data });
  });

  /**
   * GET /moderation/audit/missing-media
   * Stored media references whose file is gone. Read-only.
   */
  fastify.get('/audit/missing-media', async (_request, reply) => {
    const missing = findMissingMedia(db, filename => media.exists(filename));
    return reply.send({ success: true, data: { missing } });
  });

  /**
   * GET /moderation/audit/duplicates
   * Titles stored more than once.
   */
  fastify.get('/audit/duplicates', async (_request, reply) => {
    return reply.send({ success: true, data: { duplicates: findDuplicateTitles(db) } });
  });
}
