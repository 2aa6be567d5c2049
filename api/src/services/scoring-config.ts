/**
 * Moderation Configuration
 *
 * Weight presets, word lists and the threshold, assembled into one frozen
 * value that the classifier and the retention policy receive at construction.
 *
 * Presets:
 * - strengthened (canonical): heavier keyword / red-flag weights, clickbait bonus
 * - baseline: the earlier, lighter table with no clickbait bonus
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_FAKE_THRESHOLD, SCORE_MAX, SCORE_MIN } from '../../../shared/constants.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_LEXICON_PATH = join(__dirname, 'lexicon.json');

// ============ Types ============

export type ScoringPresetName = 'strengthened' | 'baseline';

export interface ScoringWeights {
  sensationalKeyword: number;   // per distinct keyword present
  redFlagPattern: number;       // per distinct pattern matched
  missingSource: number;        // flat, no URL anywhere
  exclamation: number;          // per '!'
  exclamationCap: number;
  question: number;             // per '?'
  questionCap: number;
  shouting: number;             // multiplied by the shouting ratio
  shoutingCap: number;
  shortText: number;            // flat, combined length below shortTextLength
  shortTextLength: number;
  lowRichness: number;          // flat, average token length below lowRichnessAverage
  lowRichnessAverage: number;
  clickbait: number;            // flat, any clickbait word as a whole word
}

export interface Lexicon {
  locale: string;
  sensational: readonly string[];
  redFlags: readonly string[];   // regular expression sources
  clickbait: readonly string[];
}

export interface ModerationConfig {
  readonly threshold: number;
  readonly preset: ScoringPresetName;
  readonly weights: Readonly<ScoringWeights>;
  readonly lexicon: Readonly<Lexicon>;
}

export interface ModerationConfigOptions {
  threshold?: number;
  preset?: ScoringPresetName;
  weights?: Partial<ScoringWeights>;
  lexicon?: Lexicon;
}

// ============ Presets ============

export const SCORING_PRESETS: Readonly<Record<ScoringPresetName, Readonly<ScoringWeights>>> = {
  strengthened: {
    sensationalKeyword: 10,
    redFlagPattern: 18,
    missingSource: 12,
    exclamation: 2,
    exclamationCap: 20,
    question: 1.5,
    questionCap: 15,
    shouting: 120,
    shoutingCap: 25,
    shortText: 6,
    shortTextLength: 280,
    lowRichness: 5,
    lowRichnessAverage: 4,
    clickbait: 7,
  },
  baseline: {
    sensationalKeyword: 8,
    redFlagPattern: 15,
    missingSource: 12,
    exclamation: 1.5,
    exclamationCap: 15,
    question: 1.2,
    questionCap: 12,
    shouting: 100,
    shoutingCap: 20,
    shortText: 6,
    shortTextLength: 280,
    lowRichness: 4,
    lowRichnessAverage: 4,
    clickbait: 0,
  },
};

const WEIGHT_KEYS = Object.keys(SCORING_PRESETS.strengthened);

export function isScoringPresetName(value: string): value is ScoringPresetName {
  return value === 'strengthened' || value === 'baseline';
}

// ============ Validation ============

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

/**
 * Validate an untrusted word-list document
 */
export function parseLexicon(raw: unknown, source: string): Lexicon {
  if (typeof raw !== 'object' || raw === null) {
    throw new Error(`Invalid lexicon in ${source}: expected an object`);
  }
  if (!('sensational' in raw) || !isStringArray(raw.sensational)) {
    throw new Error(`Invalid lexicon in ${source}: "sensational" must be an array of strings`);
  }
  if (!('redFlags' in raw) || !isStringArray(raw.redFlags)) {
    throw new Error(`Invalid lexicon in ${source}: "redFlags" must be an array of strings`);
  }
  if (!('clickbait' in raw) || !isStringArray(raw.clickbait)) {
    throw new Error(`Invalid lexicon in ${source}: "clickbait" must be an array of strings`);
  }
  const locale = 'locale' in raw && typeof raw.locale === 'string' ? raw.locale : 'und';

  for (const pattern of raw.redFlags) {
    try {
      new RegExp(pattern, 'iu');
    } catch (err) {
      throw new Error(`Invalid red-flag pattern in ${source}: ${pattern} (${err instanceof Error ? err.message : String(err)})`);
    }
  }

  return {
    locale,
    sensational: raw.sensational,
    redFlags: raw.redFlags,
    clickbait: raw.clickbait,
  };
}

/**
 * Validate an untrusted partial weight table
 */
export function parseWeightOverrides(raw: unknown, source: string): Partial<ScoringWeights> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid weight overrides in ${source}: expected an object`);
  }
  const overrides: Partial<ScoringWeights> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isWeightKey(key)) {
      throw new Error(`Unknown weight "${key}" in ${source}`);
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new Error(`Weight "${key}" in ${source} must be a non-negative number`);
    }
    overrides[key] = value;
  }
  return overrides;
}

function isWeightKey(key: string): key is keyof ScoringWeights {
  return WEIGHT_KEYS.includes(key);
}

// ============ Loading ============

export function loadLexicon(path: string = DEFAULT_LEXICON_PATH): Lexicon {
  return parseLexicon(JSON.parse(readFileSync(path, 'utf-8')), path);
}

export function loadWeightOverrides(path: string): Partial<ScoringWeights> {
  return parseWeightOverrides(JSON.parse(readFileSync(path, 'utf-8')), path);
}

/**
 * Build a frozen moderation config. Unspecified parts fall back to the
 * strengthened preset, the bundled lexicon and the default threshold.
 */
export function createModerationConfig(options: ModerationConfigOptions = {}): ModerationConfig {
  const threshold = options.threshold ?? DEFAULT_FAKE_THRESHOLD;
  if (!Number.isFinite(threshold) || threshold < SCORE_MIN || threshold > SCORE_MAX) {
    throw new Error(`Fake threshold must be between ${SCORE_MIN} and ${SCORE_MAX}, got ${threshold}`);
  }

  const preset = options.preset ?? 'strengthened';
  const weights: ScoringWeights = { ...SCORING_PRESETS[preset], ...options.weights };
  const lexicon = options.lexicon ?? loadLexicon();

  return Object.freeze({
    threshold,
    preset,
    weights: Object.freeze(weights),
    lexicon: Object.freeze({
      locale: lexicon.locale,
      sensational: Object.freeze([...lexicon.sensational]),
      redFlags: Object.freeze([...lexicon.redFlags]),
      clickbait: Object.freeze([...lexicon.clickbait]),
    }),
  });
}
