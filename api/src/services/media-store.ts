/**
 * Media Store
 *
 * Uploaded image/audio files for news items, kept flat in one directory.
 * Each stored filename belongs to exactly one news item.
 *
 * Removal is idempotent: a file that is already gone counts as removed.
 */

import { existsSync, mkdirSync, unlinkSync, writeFileSync } from 'fs';
import { basename, join } from 'path';
import {
  ALLOWED_AUDIO_EXTENSIONS,
  ALLOWED_IMAGE_EXTENSIONS,
  DEFAULT_MAX_UPLOAD_BYTES,
} from '../../../shared/constants.js';
import type { MediaSlot } from '../../../shared/types.js';
import { uploadPrefix } from '../utils/time.js';

// ============ Types ============

export type MediaRemovalResult =
  | { filename: string; status: 'removed' }
  | { filename: string; status: 'absent' }
  | { filename: string; status: 'failed'; error: string };

export interface MediaUpload {
  filename: string;
  data: Buffer;
}

export type StageResult =
  | { ok: true; filename: string }
  | { ok: false; error: string };

const ALLOWED_EXTENSIONS: Record<MediaSlot, readonly string[]> = {
  image: ALLOWED_IMAGE_EXTENSIONS,
  audio: ALLOWED_AUDIO_EXTENSIONS,
};

// ============ Filename handling ============

/**
 * Reduce a client-supplied filename to a safe ASCII basename.
 * Returns '' when nothing usable is left.
 */
export function sanitizeFilename(filename: string): string {
  const base = basename(filename.replace(/\\/g, '/'));
  return base
    .normalize('NFKD')
    .replace(/[^\x00-\x7f]/g, '')
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9_.-]/g, '')
    .replace(/^[._]+|[._]+$/g, '');
}

export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? '' : filename.slice(dot + 1).toLowerCase();
}

const FALLBACK_STEM = 'upload';

/**
 * Stored name for an upload: sanitised stem plus the extension read from the
 * raw name, so non-ASCII names keep their type. Returns '' without a usable
 * extension.
 */
export function uploadName(filename: string): string {
  const base = basename(filename.replace(/\\/g, '/'));
  const ext = fileExtension(base);
  if (!ext || !/^[a-z0-9]+$/.test(ext)) return '';
  const stem = sanitizeFilename(base.slice(0, base.length - ext.length - 1));
  return `${stem || FALLBACK_STEM}.${ext}`;
}

export function isAllowedMedia(slot: MediaSlot, filename: string): boolean {
  return ALLOWED_EXTENSIONS[slot].includes(fileExtension(filename));
}

// ============ Store ============

export class MediaStore {
  constructor(
    private readonly uploadDir: string,
    private readonly maxBytes: number = DEFAULT_MAX_UPLOAD_BYTES,
  ) {}

  /**
   * Create the upload directory if needed
   */
  init(): void {
    mkdirSync(this.uploadDir, { recursive: true });
  }

  pathFor(filename: string): string {
    return join(this.uploadDir, basename(filename));
  }

  exists(filename: string): boolean {
    return existsSync(this.pathFor(filename));
  }

  /**
   * Validate and write an upload under a timestamp-prefixed name. A name
   * already taken gets a numeric suffix.
   */
  stage(slot: MediaSlot, upload: MediaUpload, now: Date = new Date()): StageResult {
    const safe = uploadName(upload.filename);
    if (!safe || !isAllowedMedia(slot, safe)) {
      return {
        ok: false,
        error: `Invalid ${slot} format (allowed: ${ALLOWED_EXTENSIONS[slot].join(', ')})`,
      };
    }
    if (upload.data.length === 0) {
      return { ok: false, error: `Empty ${slot} file` };
    }
    if (upload.data.length > this.maxBytes) {
      return { ok: false, error: `${slot} exceeds ${this.maxBytes} bytes` };
    }

    // Each stored file belongs to one item: never overwrite, pick a free name
    const prefix = uploadPrefix(now);
    const dot = safe.lastIndexOf('.');
    for (let attempt = 0; ; attempt++) {
      const filename = attempt === 0
        ? prefix + safe
        : `${prefix}${safe.slice(0, dot)}_${attempt}${safe.slice(dot)}`;
      try {
        writeFileSync(this.pathFor(filename), upload.data, { flag: 'wx' });
        return { ok: true, filename };
      } catch (err) {
        if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) throw err;
      }
    }
  }

  /**
   * Delete a stored file. Never throws.
   */
  remove(filename: string): MediaRemovalResult {
    try {
      unlinkSync(this.pathFor(filename));
      return { filename, status: 'removed' };
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return { filename, status: 'absent' };
      }
      return {
        filename,
        status: 'failed',
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }

  /**
   * Remove every non-empty reference, in order
   */
  removeAll(filenames: Array<string | null | undefined>): MediaRemovalResult[] {
    const results: MediaRemovalResult[] = [];
    for (const filename of filenames) {
      if (filename) results.push(this.remove(filename));
    }
    return results;
  }
}

export function isRemovalFailure(
  result: MediaRemovalResult,
): result is Extract<MediaRemovalResult, { status: 'failed' }> {
  return result.status === 'failed';
}
