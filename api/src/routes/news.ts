/**
 * News Routes
 *
 * Listing, viewing, submitting and deleting news items. Every submission
 * goes through the retention policy before a record is created.
 */

import { FastifyInstance } from 'fastify';
import type { MediaSlot, NewsItem, SubmissionResponse } from '../../../shared/types.js';
import type { AppServices } from '../app.js';
import { formatUtcMinute } from '../utils/time.js';

interface MediaPayload {
  filename?: string;
  data?: string;   // base64
}

interface SubmitBody {
  title?: string;
  author?: string;
  content?: string;
  image?: MediaPayload;
  audio?: MediaPayload;
}

const MAX_LATEST = 50;

function parseId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const id = parseInt(raw, 10);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

function asText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export async function newsRoutes(fastify: FastifyInstance, services: AppServices): Promise<void> {
  const { db, media, policy } = services;

  /**
   * GET /news
   * All items, newest first. Runs a purge sweep before reading.
   */
  fastify.get('/', async (_request, reply) => {
    const sweep = policy.sweepAndPurge();
    return reply.send({
      success: true,
      data: {
        threshold: policy.threshold,
        purged: sweep.purgedCount,
        items: db.listNews(),
      },
    });
  });

  /**
   * GET /news/latest?limit=5
   */
  fastify.get<{
    Querystring: { limit?: string };
  }>('/latest', async (request, reply) => {
    const raw = request.query.limit ?? '5';
    const limit = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
    if (isNaN(limit) || limit < 1 || limit > MAX_LATEST) {
      return reply.status(400).send({
        success: false,
        error: `limit must be an integer between 1 and ${MAX_LATEST}`,
      });
    }
    return reply.send({ success: true, data: db.getLatestNews(limit) });
  });

  /**
   * GET /news/:id
   */
  fastify.get<{
    Params: { id: string };
  }>('/:id', async (request, reply) => {
    const id = parseId(request.params.id);
    const item = id === null ? undefined : db.getNews(id);
    if (!item) {
      return reply.status(404).send({ success: false, error: 'News item not found' });
    }
    return reply.send({ success: true, data: item });
  });

  /**
   * POST /news
   * Submit a news item. Media arrive base64-encoded in the JSON body.
   *
   * 201: accepted and stored, with its frozen fake score
   * 422: rejected as likely fake, with the score that caused it
   */
  fastify.post<{
    Body: SubmitBody | null;
  }>('/', async (request, reply) => {
    const body: SubmitBody = request.body ?? {};
    const title = asText(body.title);
    const author = asText(body.author);
    const content = asText(body.content);

    if (!title || !content) {
      return reply.status(400).send({
        success: false,
        error: 'Title and content are required',
      });
    }

    // Stage uploads; on any invalid upload, undo what was staged
    const staged: Partial<Record<MediaSlot, string>> = {};
    const stagedFiles: string[] = [];
    const slots: MediaSlot[] = ['image', 'audio'];
    for (const slot of slots) {
      const payload = body[slot];
      if (!payload) continue;

      if (typeof payload.filename !== 'string' || typeof payload.data !== 'string') {
        media.removeAll(stagedFiles);
        return reply.status(400).send({
          success: false,
          error: `${slot} must have a filename and base64 data`,
        });
      }

      const result = media.stage(slot, {
        filename: payload.filename,
        data: Buffer.from(payload.data, 'base64'),
      });
      if (!result.ok) {
        media.removeAll(stagedFiles);
        return reply.status(400).send({ success: false, error: result.error });
      }
      staged[slot] = result.filename;
      stagedFiles.push(result.filename);
    }

    const decision = policy.evaluateSubmission({
      title,
      content,
      stagedMedia: stagedFiles,
    });

    if (decision.verdict === 'reject') {
      const data: SubmissionResponse = {
        accepted: false,
        score: decision.score,
        threshold: policy.threshold,
      };
      return reply.status(422).send({
        success: false,
        error: `Rejected as likely fake news (score ${decision.score.toFixed(1)} > ${policy.threshold})`,
        data,
      });
    }

    let item: NewsItem;
    try {
      item = db.createNews({
        title,
        author: author || null,
        content,
        image: staged.image ?? null,
        audio: staged.audio ?? null,
        created_at: formatUtcMinute(new Date()),
        fake_score: decision.score,
      });
    } catch (err) {
      media.removeAll(stagedFiles);
      throw err;
    }

    request.log.info({ id: item.id, score: decision.score }, 'News item published');

    const data: SubmissionResponse = {
      accepted: true,
      score: decision.score,
      threshold: policy.threshold,
      item,
    };
    return reply.status(201).send({ success: true, data });
  });

  /**
   * DELETE /news/:id
   * Removes the item and its media files.
   */
  fastify.delete<{
    Params: { id: string };
  }>('/:id', async (request, reply) => {
    const id = parseId(request.params.id);
    const result = id === null ? { found: false, media: [] } : policy.removeItem(id);
    if (!result.found) {
      return reply.status(404).send({ success: false, error: 'News item not found' });
    }
    return reply.send({ success: true, data: { id, media: result.media } });
  });
}
