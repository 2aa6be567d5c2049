/**
 * Moderation Configuration Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  createModerationConfig,
  isScoringPresetName,
  loadLexicon,
  loadWeightOverrides,
  parseLexicon,
  parseWeightOverrides,
  SCORING_PRESETS,
} from './scoring-config.js';

describe('createModerationConfig', () => {
  it('should default to the strengthened preset and a threshold of 70', () => {
    const config = createModerationConfig();
    expect(config.threshold).toBe(70);
    expect(config.preset).toBe('strengthened');
    expect(config.weights).toEqual(SCORING_PRESETS.strengthened);
    expect(config.lexicon.locale).toBe('ru');
  });

  it('should be frozen all the way down', () => {
    const config = createModerationConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.weights)).toBe(true);
    expect(Object.isFrozen(config.lexicon)).toBe(true);
    expect(Object.isFrozen(config.lexicon.sensational)).toBe(true);
  });

  it('should not share state between configs', () => {
    const tuned = createModerationConfig({ weights: { clickbait: 0 } });
    const plain = createModerationConfig();
    expect(tuned.weights.clickbait).toBe(0);
    expect(plain.weights.clickbait).toBe(7);
    expect(SCORING_PRESETS.strengthened.clickbait).toBe(7);
  });

  it('should reject thresholds outside [0, 100]', () => {
    expect(() => createModerationConfig({ threshold: -1 })).toThrow('between 0 and 100');
    expect(() => createModerationConfig({ threshold: 100.5 })).toThrow('between 0 and 100');
    expect(() => createModerationConfig({ threshold: NaN })).toThrow('between 0 and 100');
  });

  it('should accept the boundary thresholds', () => {
    expect(createModerationConfig({ threshold: 0 }).threshold).toBe(0);
    expect(createModerationConfig({ threshold: 100 }).threshold).toBe(100);
  });
});

describe('isScoringPresetName', () => {
  it('should recognise the two presets', () => {
    expect(isScoringPresetName('strengthened')).toBe(true);
    expect(isScoringPresetName('baseline')).toBe(true);
    expect(isScoringPresetName('improved')).toBe(false);
  });
});

describe('parseWeightOverrides', () => {
  it('should accept known non-negative weights', () => {
    expect(parseWeightOverrides({ redFlagPattern: 20, clickbait: 0 }, 'test')).toEqual({
      redFlagPattern: 20,
      clickbait: 0,
    });
  });

  it('should reject unknown keys', () => {
    expect(() => parseWeightOverrides({ sarcasm: 3 }, 'weights.json'))
      .toThrow('Unknown weight "sarcasm" in weights.json');
  });

  it('should reject negative or non-numeric weights', () => {
    expect(() => parseWeightOverrides({ shouting: -1 }, 'w')).toThrow('must be a non-negative number');
    expect(() => parseWeightOverrides({ shouting: '10' }, 'w')).toThrow('must be a non-negative number');
  });

  it('should reject non-objects', () => {
    expect(() => parseWeightOverrides([1, 2], 'w')).toThrow('expected an object');
    expect(() => parseWeightOverrides(null, 'w')).toThrow('expected an object');
  });
});

describe('parseLexicon', () => {
  const valid = { locale: 'en', sensational: ['shock'], redFlags: ['flat\\s+earth'], clickbait: ['wow'] };

  it('should accept a complete lexicon', () => {
    expect(parseLexicon(valid, 'test')).toEqual(valid);
  });

  it('should default the locale', () => {
    const { locale: _locale, ...rest } = valid;
    expect(parseLexicon(rest, 'test').locale).toBe('und');
  });

  it('should reject missing lists', () => {
    expect(() => parseLexicon({ sensational: [], redFlags: [] }, 'x.json'))
      .toThrow('"clickbait" must be an array of strings');
  });

  it('should reject invalid patterns', () => {
    expect(() => parseLexicon({ ...valid, redFlags: ['(unclosed'] }, 'x.json'))
      .toThrow('Invalid red-flag pattern in x.json: (unclosed');
  });
});

describe('file loading', () => {
  let dir: string;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
  });

  it('should load the bundled lexicon', () => {
    const lexicon = loadLexicon();
    expect(lexicon.sensational).toHaveLength(8);
    expect(lexicon.redFlags).toContain('рептилоид');
    expect(lexicon.clickbait).toEqual(['сенсация', 'шок', 'эксклюзив']);
  });

  it('should load lexicons and weight overrides from JSON files', () => {
    dir = mkdtempSync(join(tmpdir(), 'cosmos-config-'));
    const lexiconPath = join(dir, 'lexicon.json');
    const weightsPath = join(dir, 'weights.json');
    writeFileSync(lexiconPath, JSON.stringify({ locale: 'en', sensational: ['BREAKING'], redFlags: [], clickbait: [] }));
    writeFileSync(weightsPath, JSON.stringify({ missingSource: 20 }));

    expect(loadLexicon(lexiconPath).sensational).toEqual(['BREAKING']);
    expect(loadWeightOverrides(weightsPath)).toEqual({ missingSource: 20 });
  });
});
