/**
 * Cosmos News Shared Constants
 */

// ============ API Constants ============

export const API_VERSION = '1.0';

// ============ Moderation ============

// Items scoring strictly above this are rejected at submission and purged by sweeps
export const DEFAULT_FAKE_THRESHOLD = 70;

export const SCORE_MIN = 0;
export const SCORE_MAX = 100;

// ============ Media ============

export const ALLOWED_IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'gif', 'webp'] as const;
export const ALLOWED_AUDIO_EXTENSIONS = ['mp3', 'ogg', 'wav', 'm4a'] as const;

export const DEFAULT_MAX_UPLOAD_BYTES = 16 * 1024 * 1024; // 16MB

// ============ Moon Phase ============

// Reference new moon: 2000-01-06 18:14 UTC
export const LUNAR_EPOCH_MS = Date.UTC(2000, 0, 6, 18, 14);
export const SYNODIC_PERIOD_DAYS = 29.530588853;
export const MS_PER_DAY = 86_400_000;

export const MOON_PHASE_NAMES = [
  'New Moon',
  'Waxing Crescent',
  'First Quarter',
  'Waxing Gibbous',
  'Full Moon',
  'Waning Gibbous',
  'Last Quarter',
  'Waning Crescent',
] as const;
