/**
 * Text Signal Extractor
 *
 * Pure feature extraction for the fake-news classifier. Every signal is
 * computed on the combined text `title + "\n" + body` (trimmed).
 *
 * Tokens are maximal runs of Unicode letters/digits. A "shouting" token has
 * four or more letters, all upper-case.
 */

import type { Lexicon } from './scoring-config.js';

// ============ Types ============

export interface TextSignals {
  combinedLength: number;          // code points
  tokenCount: number;
  averageTokenLength: number;      // 0 when there are no tokens
  sensationalKeywords: string[];   // distinct keywords present
  redFlagPatterns: string[];       // distinct pattern sources matched
  clickbaitWords: string[];        // distinct whole-word matches
  hasUrl: boolean;
  exclamationCount: number;
  questionCount: number;
  shoutingRatio: number;           // [0, 1]
}

export interface CompiledLexicon {
  sensational: Array<{ keyword: string; needle: string }>;
  redFlags: Array<{ source: string; regex: RegExp }>;
  clickbait: Array<{ word: string; regex: RegExp }>;
}

// ============ Patterns ============

const TOKEN_REGEX = /[\p{L}\p{N}]+/gu;
const SHOUTING_REGEX = /^\p{Lu}{4,}$/u;
const URL_REGEX = /[a-z][a-z0-9+.-]*:\/\//i;

const WORD_CHAR = '[\\p{L}\\p{N}_]';
const UNICODE_BOUNDARY = `(?:(?<=${WORD_CHAR})(?!${WORD_CHAR})|(?<!${WORD_CHAR})(?=${WORD_CHAR}))`;
const UNICODE_NON_BOUNDARY = `(?:(?<=${WORD_CHAR})(?=${WORD_CHAR})|(?<!${WORD_CHAR})(?!${WORD_CHAR}))`;

/**
 * Rewrite `\b` and `\B` so they also treat non-Latin letters as word
 * characters. JavaScript's boundaries only know [A-Za-z0-9_], even under
 * the `u` flag. Inside a character class `\b` is a backspace and is kept.
 */
export function withUnicodeBoundaries(source: string): string {
  let out = '';
  let inClass = false;

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (ch === '\\' && i + 1 < source.length) {
      const next = source[i + 1];
      if (!inClass && next === 'b') out += UNICODE_BOUNDARY;
      else if (!inClass && next === 'B') out += UNICODE_NON_BOUNDARY;
      else out += ch + next;
      i++;
      continue;
    }
    if (ch === '[') inClass = true;
    else if (ch === ']') inClass = false;
    out += ch;
  }
  return out;
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Compiled lexicons are cached per lexicon object; lexicons are frozen
const compiledCache = new WeakMap<Lexicon, CompiledLexicon>();

export function compileLexicon(lexicon: Lexicon): CompiledLexicon {
  const cached = compiledCache.get(lexicon);
  if (cached) return cached;

  const compiled: CompiledLexicon = {
    sensational: [...new Set(lexicon.sensational)]
      .filter(k => k.length > 0)
      .map(keyword => ({ keyword, needle: keyword.toLowerCase() })),
    redFlags: [...new Set(lexicon.redFlags)]
      .map(source => ({ source, regex: new RegExp(withUnicodeBoundaries(source), 'iu') })),
    clickbait: [...new Set(lexicon.clickbait)]
      .filter(w => w.length > 0)
      .map(word => ({
        word,
        regex: new RegExp(`${UNICODE_BOUNDARY}${escapeRegex(word)}${UNICODE_BOUNDARY}`, 'iu'),
      })),
  };
  compiledCache.set(lexicon, compiled);
  return compiled;
}

// ============ Extraction ============

function countChar(text: string, ch: string): number {
  let count = 0;
  for (const c of text) {
    if (c === ch) count++;
  }
  return count;
}

export function combineText(body: string, title = ''): string {
  return `${title}\n${body}`.trim();
}

/**
 * Derive all classifier signals from a body and optional title
 */
export function extractSignals(body: string, title: string, lexicon: Lexicon): TextSignals {
  const combined = combineText(body, title);
  const lowered = combined.toLowerCase();
  const compiled = compileLexicon(lexicon);

  const tokens = combined.match(TOKEN_REGEX) ?? [];
  const tokenChars = tokens.reduce((sum, t) => sum + Array.from(t).length, 0);
  const shouting = tokens.filter(t => SHOUTING_REGEX.test(t)).length;

  return {
    combinedLength: Array.from(combined).length,
    tokenCount: tokens.length,
    averageTokenLength: tokens.length > 0 ? tokenChars / tokens.length : 0,
    sensationalKeywords: compiled.sensational
      .filter(k => lowered.includes(k.needle))
      .map(k => k.keyword),
    redFlagPatterns: compiled.redFlags
      .filter(p => p.regex.test(combined))
      .map(p => p.source),
    clickbaitWords: compiled.clickbait
      .filter(w => w.regex.test(combined))
      .map(w => w.word),
    hasUrl: URL_REGEX.test(combined),
    exclamationCount: countChar(combined, '!'),
    questionCount: countChar(combined, '?'),
    shoutingRatio: tokens.length > 0 ? shouting / tokens.length : 0,
  };
}
