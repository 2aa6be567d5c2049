/**
 * Fake Score Classifier
 *
 * Heuristic, rule-based fake-news score in [0, 100]. Signals from
 * text-signals.ts are combined with the additive weights of the configured
 * preset. Higher means more likely fabricated or sensationalised.
 *
 * Keywords and patterns count once each, however often they repeat.
 */

import { SCORE_MAX, SCORE_MIN } from '../../../shared/constants.js';
import type { ModerationConfig, ScoringPresetName } from './scoring-config.js';
import { extractSignals, TextSignals } from './text-signals.js';

// ============ Types ============

export type SignalName =
  | 'sensational_keywords'
  | 'red_flag_patterns'
  | 'missing_source'
  | 'exclamations'
  | 'questions'
  | 'shouting'
  | 'short_text'
  | 'low_richness'
  | 'clickbait';

export interface SignalContribution {
  signal: SignalName;
  points: number;
}

export interface ScoreBreakdown {
  score: number;
  preset: ScoringPresetName;
  contributions: SignalContribution[];
  signals: TextSignals | null;   // null when the body is empty
}

// ============ Classifier ============

export class FakeScoreClassifier {
  constructor(private readonly config: ModerationConfig) {}

  get preset(): ScoringPresetName {
    return this.config.preset;
  }

  /**
   * Score a body and title. An empty body scores 0.
   */
  score(body: string, title = ''): number {
    return this.evaluate(body, title).score;
  }

  /**
   * Score with the per-signal contributions that produced it
   */
  evaluate(body: string, title = ''): ScoreBreakdown {
    if (body.trim().length === 0) {
      return { score: 0, preset: this.config.preset, contributions: [], signals: null };
    }

    const w = this.config.weights;
    const signals = extractSignals(body, title, this.config.lexicon);

    const raw: SignalContribution[] = [
      { signal: 'sensational_keywords', points: signals.sensationalKeywords.length * w.sensationalKeyword },
      { signal: 'red_flag_patterns', points: signals.redFlagPatterns.length * w.redFlagPattern },
      { signal: 'missing_source', points: signals.hasUrl ? 0 : w.missingSource },
      { signal: 'exclamations', points: Math.min(signals.exclamationCount * w.exclamation, w.exclamationCap) },
      { signal: 'questions', points: Math.min(signals.questionCount * w.question, w.questionCap) },
      { signal: 'shouting', points: Math.min(signals.shoutingRatio * w.shouting, w.shoutingCap) },
      { signal: 'short_text', points: signals.combinedLength < w.shortTextLength ? w.shortText : 0 },
      { signal: 'low_richness', points: signals.averageTokenLength < w.lowRichnessAverage ? w.lowRichness : 0 },
      { signal: 'clickbait', points: signals.clickbaitWords.length > 0 ? w.clickbait : 0 },
    ];

    const contributions = raw.filter(c => c.points !== 0);
    const total = contributions.reduce((sum, c) => sum + c.points, 0);

    return {
      score: clampScore(total),
      preset: this.config.preset,
      contributions,
      signals,
    };
  }
}

export function clampScore(value: number): number {
  return Math.min(SCORE_MAX, Math.max(SCORE_MIN, value));
}
