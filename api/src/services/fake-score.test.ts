/**
 * Fake Score Classifier Tests
 *
 * Expected values are derived from the strengthened preset unless a test
 * says otherwise:
 * keyword 10, red flag 18, no link 12, '!' 2 (cap 20), '?' 1.5 (cap 15),
 * shouting 120 (cap 25), short text 6 (< 280), low richness 5 (< 4.0), clickbait 7.
 */

import { describe, it, expect } from 'vitest';
import { createModerationConfig } from './scoring-config.js';
import { FakeScoreClassifier, clampScore } from './fake-score.js';

const classifier = new FakeScoreClassifier(createModerationConfig());

const SENSATIONAL_TITLE = 'СРОЧНО!!! ШОК: обнаружен рептилоид на Марсе!!!';
const SENSATIONAL_BODY = 'Учёные скрывают правду.';

const SOURCED_TITLE = 'James Webb telescope finds new exoplanet';
const SOURCED_BODY =
  'Astronomers confirmed a rocky planet orbiting a nearby red dwarf star. ' +
  'The results were published in a peer reviewed journal: https://science.example.org/webb-exoplanet';

// Over 280 characters, sourced, no capitals or punctuation emphasis
const NEUTRAL_FILLER =
  'Исследователи обсерватории продолжают наблюдения спутников планеты, публикуя подробные отчеты. '.repeat(4) +
  'Источник https://example.org/report';

describe('FakeScoreClassifier', () => {
  // ============ Bounds ============

  describe('bounds', () => {
    it('should score empty text exactly 0', () => {
      expect(classifier.score('', '')).toBe(0);
    });

    it('should score a blank body 0 even with a sensational title', () => {
      expect(classifier.score('   ', 'ШОК!!!')).toBe(0);
    });

    it('should clamp to 100', () => {
      const title = 'ШОК СРОЧНО НЕВЕРОЯТНО СЕНСАЦИЯ СКАНДАЛ!!!!!!!!!!';
      const body = 'РАЗОБЛАЧЕНО: плоская земля, рептилоид, НЛО и заговор! BREAKING EXCLUSIVE???';
      expect(classifier.score(body, title)).toBe(100);
    });

    it('should clamp helper values into [0, 100]', () => {
      expect(clampScore(-5)).toBe(0);
      expect(clampScore(42.5)).toBe(42.5);
      expect(clampScore(250)).toBe(100);
    });
  });

  // ============ Scenarios ============

  describe('sensational unsourced item', () => {
    it('should score far above a threshold of 70', () => {
      // keywords 20 + red flag 18 + no link 12 + '!' 12 + shouting 120/9 + short 6 + clickbait 7
      const score = classifier.score(SENSATIONAL_BODY, SENSATIONAL_TITLE);
      expect(score).toBeCloseTo(88.3333, 3);
      expect(score).toBeGreaterThan(70);
    });

    it('should list the contributing signals in order', () => {
      const breakdown = classifier.evaluate(SENSATIONAL_BODY, SENSATIONAL_TITLE);
      expect(breakdown.preset).toBe('strengthened');
      expect(breakdown.contributions.map(c => c.signal)).toEqual([
        'sensational_keywords',
        'red_flag_patterns',
        'missing_source',
        'exclamations',
        'shouting',
        'short_text',
        'clickbait',
      ]);
      expect(breakdown.signals?.sensationalKeywords).toEqual(['ШОК', 'СРОЧНО']);
    });
  });

  describe('sourced, calm item', () => {
    it('should score only the short-text penalty', () => {
      const score = classifier.score(SOURCED_BODY, SOURCED_TITLE);
      expect(score).toBe(6);
      expect(score).toBeLessThan(30);
    });
  });

  // ============ Additivity ============

  describe('red-flag deduplication', () => {
    const base = `${NEUTRAL_FILLER} рептилоид`;

    it('should score a single red flag at its weight', () => {
      expect(classifier.score(base)).toBe(18);
    });

    it('should not change when an existing flag repeats', () => {
      expect(classifier.score(`${base} рептилоид`)).toBe(18);
    });

    it('should add the full weight for a new distinct flag', () => {
      expect(classifier.score(`${base} заговор`)).toBe(36);
    });
  });

  describe('caps and flat penalties', () => {
    it('should cap question marks', () => {
      const breakdown = classifier.evaluate('Правда ли это' + '?'.repeat(20));
      expect(breakdown.contributions.find(c => c.signal === 'questions')?.points).toBe(15);
    });

    it('should penalise text without any word tokens as low richness', () => {
      // '!' 6 + no link 12 + short 6 + low richness 5
      expect(classifier.score('!!!')).toBe(29);
    });

    it('should score a short unsourced sentence with two flat penalties', () => {
      const breakdown = classifier.evaluate('Новая миссия к Луне стартует весной');
      expect(breakdown.score).toBe(18);
      expect(breakdown.contributions).toEqual([
        { signal: 'missing_source', points: 12 },
        { signal: 'short_text', points: 6 },
      ]);
    });
  });

  // ============ Configuration ============

  describe('presets and overrides', () => {
    it('should score lower with the baseline preset', () => {
      const baseline = new FakeScoreClassifier(createModerationConfig({ preset: 'baseline' }));
      // keywords 16 + red flag 15 + no link 12 + '!' 9 + shouting 100/9 + short 6
      expect(baseline.preset).toBe('baseline');
      expect(baseline.score(SENSATIONAL_BODY, SENSATIONAL_TITLE)).toBeCloseTo(69.1111, 3);
    });

    it('should apply weight overrides on top of the preset', () => {
      const tuned = new FakeScoreClassifier(createModerationConfig({ weights: { missingSource: 0 } }));
      expect(tuned.score('Новая миссия к Луне стартует весной')).toBe(6);
    });

    it('should use a custom lexicon', () => {
      const english = new FakeScoreClassifier(createModerationConfig({
        lexicon: { locale: 'en', sensational: ['shocking'], redFlags: ['\\bflat\\s+earth\\b'], clickbait: [] },
      }));
      const breakdown = english.evaluate(`${NEUTRAL_FILLER} shocking flat earth`);
      expect(breakdown.contributions).toEqual([
        { signal: 'sensational_keywords', points: 10 },
        { signal: 'red_flag_patterns', points: 18 },
      ]);
    });

    it('should be deterministic', () => {
      expect(classifier.score(SENSATIONAL_BODY, SENSATIONAL_TITLE))
        .toBe(classifier.score(SENSATIONAL_BODY, SENSATIONAL_TITLE));
    });
  });
});
