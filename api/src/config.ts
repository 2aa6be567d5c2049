/**
 * Cosmos News API Configuration
 *
 * Loads configuration from environment variables
 */

import 'dotenv/config';
import { DEFAULT_FAKE_THRESHOLD, DEFAULT_MAX_UPLOAD_BYTES } from '../../shared/constants.js';
import {
  createModerationConfig,
  isScoringPresetName,
  loadLexicon,
  loadWeightOverrides,
  ModerationConfig,
  ScoringPresetName,
} from './services/scoring-config.js';

export interface Config {
  // Server
  port: number;
  host: string;
  nodeEnv: string;

  // Storage
  databasePath: string;
  uploadDir: string;
  maxUploadBytes: number;

  // Moderation
  fakeThreshold: number;
  scoringPreset: ScoringPresetName;
  scoringWeightsPath: string;
  lexiconPath: string;

  // Jobs
  sweepIntervalMinutes: number;

  // Limits
  submitRateLimit: number;
}

function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function optionalEnvInt(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Invalid integer for ${name}: ${value}`);
  }
  return parsed;
}

function optionalEnvFloat(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid number for ${name}: ${value}`);
  }
  return parsed;
}

function optionalPreset(name: string, defaultValue: ScoringPresetName): ScoringPresetName {
  const value = optionalEnv(name, defaultValue);
  if (!isScoringPresetName(value)) {
    throw new Error(`Invalid scoring preset for ${name}: ${value} (expected strengthened or baseline)`);
  }
  return value;
}

/**
 * Load configuration from environment
 */
export function loadConfig(): Config {
  return {
    // Server
    port: optionalEnvInt('PORT', 3000),
    host: optionalEnv('HOST', '0.0.0.0'),
    nodeEnv: optionalEnv('NODE_ENV', 'development'),

    // Storage
    databasePath: optionalEnv('DATABASE_PATH', './news.db'),
    uploadDir: optionalEnv('UPLOAD_DIR', './uploads'),
    maxUploadBytes: optionalEnvInt('MAX_UPLOAD_BYTES', DEFAULT_MAX_UPLOAD_BYTES),

    // Moderation
    fakeThreshold: optionalEnvFloat('FAKE_THRESHOLD', DEFAULT_FAKE_THRESHOLD),
    scoringPreset: optionalPreset('SCORING_PRESET', 'strengthened'),
    scoringWeightsPath: optionalEnv('SCORING_WEIGHTS_PATH', ''),
    lexiconPath: optionalEnv('LEXICON_PATH', ''),

    // Jobs
    sweepIntervalMinutes: optionalEnvInt('SWEEP_INTERVAL_MINUTES', 30),

    // Limits
    submitRateLimit: optionalEnvInt('SUBMIT_RATE_LIMIT', 10), // per minute
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (config.fakeThreshold < 0 || config.fakeThreshold > 100) {
    errors.push('FAKE_THRESHOLD must be between 0 and 100');
  }
  if (config.maxUploadBytes <= 0) {
    errors.push('MAX_UPLOAD_BYTES must be positive');
  }
  if (config.sweepIntervalMinutes < 0) {
    errors.push('SWEEP_INTERVAL_MINUTES must be 0 (disabled) or positive');
  }
  if (config.submitRateLimit <= 0) {
    errors.push('SUBMIT_RATE_LIMIT must be positive');
  }

  if (config.nodeEnv === 'production') {
    if (config.databasePath === ':memory:') {
      errors.push('DATABASE_PATH must be a file in production');
    }
    if (config.scoringPreset !== 'strengthened') {
      console.warn(`  WARNING: running with the ${config.scoringPreset} scoring preset`);
    }
  }

  return errors;
}

/**
 * Assemble the frozen moderation settings from files named in the config
 */
export function loadModerationConfig(config: Config): ModerationConfig {
  return createModerationConfig({
    threshold: config.fakeThreshold,
    preset: config.scoringPreset,
    weights: config.scoringWeightsPath ? loadWeightOverrides(config.scoringWeightsPath) : undefined,
    lexicon: config.lexiconPath ? loadLexicon(config.lexiconPath) : undefined,
  });
}

// Export singleton config
let config: Config | null = null;

export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}
