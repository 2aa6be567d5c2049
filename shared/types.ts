/**
 * Cosmos News Shared Types
 */

import { MOON_PHASE_NAMES } from './constants.js';

// ============ News ============

export interface NewsItem {
  id: number;
  title: string;
  author: string | null;
  content: string;
  image: string | null;
  audio: string | null;
  created_at: string;   // 'YYYY-MM-DD HH:MM UTC'
  fake_score: number;   // frozen at creation, never recomputed
}

export type MediaSlot = 'image' | 'audio';

// ============ Moderation ============

export type ModerationVerdict = 'accept' | 'reject';

export interface SubmissionResponse {
  accepted: boolean;
  score: number;
  threshold: number;
  item?: NewsItem;
}

export interface SweepResponse {
  threshold: number;
  purgedCount: number;
  purgedIds: number[];
  failedIds: number[];
  mediaErrors: Array<{ id?: number; filename: string; error: string }>;
}

// ============ Moon Phase ============

export type MoonPhaseName = (typeof MOON_PHASE_NAMES)[number];

export interface MoonPhaseSample {
  phaseName: MoonPhaseName;
  illuminationPercent: number;  // one decimal
  illuminationFraction: number; // [0, 1]
  cycleFraction: number;        // [0, 1)
  computedAtUtc: string;        // 'YYYY-MM-DD HH:MM UTC'
}
