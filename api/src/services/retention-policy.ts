/**
 * Retention Policy
 *
 * Applies the fake-score threshold at two call sites:
 * 1. Submission: score > threshold → reject and discard staged media
 * 2. Sweep: every stored item whose frozen score > threshold is purged
 *
 * Order of side effects is always media files first, then the record, so an
 * interruption leaves at worst an orphaned file, never a record pointing at a
 * deleted file. Equality with the threshold is accepted.
 */

import type { ModerationVerdict } from '../../../shared/types.js';
import type { DbMediaRefs, DbScoredMedia } from '../db/index.js';
import type { FakeScoreClassifier } from './fake-score.js';
import { isRemovalFailure, MediaRemovalResult, MediaStore } from './media-store.js';
import type { ModerationConfig } from './scoring-config.js';

// ============ Collaborators ============

export interface RetentionStore {
  getAllScoredMedia(): DbScoredMedia[];
  getMediaRefs(id: number): DbMediaRefs | undefined;
  deleteNews(id: number): boolean;
}

export type MediaRemover = Pick<MediaStore, 'removeAll'>;

export interface PolicyLogger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export interface RetentionPolicyDeps {
  config: ModerationConfig;
  classifier: FakeScoreClassifier;
  store: RetentionStore;
  media: MediaRemover;
  logger?: PolicyLogger;
}

// ============ Results ============

export interface SubmissionCandidate {
  title: string;
  content: string;
  stagedMedia?: string[];
}

export type SubmissionDecision =
  | { verdict: 'accept'; score: number }
  | { verdict: 'reject'; score: number; media: MediaRemovalResult[] };

export type MediaRemovalFailure = Extract<MediaRemovalResult, { status: 'failed' }> & { id?: number };

export interface SweepFailure {
  id: number;
  error: string;
}

export interface SweepResult {
  threshold: number;
  purgedCount: number;
  purgedIds: number[];
  failures: SweepFailure[];
  mediaErrors: MediaRemovalFailure[];
}

export interface RemovalResult {
  found: boolean;
  media: MediaRemovalResult[];
}

// ============ Pure decisions ============

export function decide(score: number, threshold: number): ModerationVerdict {
  return score > threshold ? 'reject' : 'accept';
}

export function selectForPurge<T extends { fake_score: number }>(items: readonly T[], threshold: number): T[] {
  return items.filter(item => decide(item.fake_score, threshold) === 'reject');
}

const silentLogger: PolicyLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

// ============ Policy ============

export class RetentionPolicy {
  private readonly config: ModerationConfig;
  private readonly classifier: FakeScoreClassifier;
  private readonly store: RetentionStore;
  private readonly media: MediaRemover;
  private readonly logger: PolicyLogger;

  constructor(deps: RetentionPolicyDeps) {
    this.config = deps.config;
    this.classifier = deps.classifier;
    this.store = deps.store;
    this.media = deps.media;
    this.logger = deps.logger ?? silentLogger;
  }

  get threshold(): number {
    return this.config.threshold;
  }

  /**
   * Score a candidate. On reject, staged media are removed before returning;
   * on accept the caller persists the item with the returned score.
   */
  evaluateSubmission(candidate: SubmissionCandidate, threshold: number = this.threshold): SubmissionDecision {
    const score = this.classifier.score(candidate.content, candidate.title);

    if (decide(score, threshold) === 'accept') {
      return { verdict: 'accept', score };
    }

    const media = this.media.removeAll(candidate.stagedMedia ?? []);
    this.reportMediaFailures(media);
    this.logger.info({ score, threshold, title: candidate.title }, 'Submission rejected as likely fake');
    return { verdict: 'reject', score, media };
  }

  /**
   * Purge every stored item whose frozen score exceeds the threshold.
   *
   * Media failures are reported but do not stop the record deletion.
   * A record that fails to delete is reported and left for the next sweep.
   * Errors reading the store propagate.
   */
  sweepAndPurge(threshold: number = this.threshold): SweepResult {
    const candidates = selectForPurge(this.store.getAllScoredMedia(), threshold);

    const result: SweepResult = {
      threshold,
      purgedCount: 0,
      purgedIds: [],
      failures: [],
      mediaErrors: [],
    };

    for (const item of candidates) {
      const media = this.media.removeAll([item.image, item.audio]);
      for (const failure of this.reportMediaFailures(media, item.id)) {
        result.mediaErrors.push({ ...failure, id: item.id });
      }

      try {
        // false: already removed by a concurrent sweep or a user deletion
        if (this.store.deleteNews(item.id)) {
          result.purgedIds.push(item.id);
        }
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        result.failures.push({ id: item.id, error });
        this.logger.error({ id: item.id, err }, 'Failed to purge news record');
      }
    }

    result.purgedCount = result.purgedIds.length;
    if (result.purgedCount > 0 || result.failures.length > 0) {
      this.logger.info(
        { threshold, purged: result.purgedIds, failures: result.failures.length, mediaErrors: result.mediaErrors.length },
        'Fake news sweep completed',
      );
    }
    return result;
  }

  /**
   * Explicit deletion of one item, same media-then-record order
   */
  removeItem(id: number): RemovalResult {
    const refs = this.store.getMediaRefs(id);
    if (!refs) {
      return { found: false, media: [] };
    }

    const media = this.media.removeAll([refs.image, refs.audio]);
    this.reportMediaFailures(media, id);
    return { found: this.store.deleteNews(id), media };
  }

  private reportMediaFailures(results: MediaRemovalResult[], id?: number): Array<Extract<MediaRemovalResult, { status: 'failed' }>> {
    const failures = results.filter(isRemovalFailure);
    for (const failure of failures) {
      this.logger.warn({ id, filename: failure.filename, error: failure.error }, 'Failed to remove media file');
    }
    return failures;
  }
}
