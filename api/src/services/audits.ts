/**
 * Storage Audits
 *
 * Read-only consistency checks over stored news. Nothing here deletes:
 * missing files are reported for an operator, not repaired.
 */

import type { MediaSlot } from '../../../shared/types.js';
import type { DbDuplicateTitle, DbMediaRefs } from '../db/index.js';

export interface AuditStore {
  getAllMediaRefs(): DbMediaRefs[];
  getDuplicateTitles(): DbDuplicateTitle[];
}

export interface MissingMedia {
  id: number;
  slot: MediaSlot;
  filename: string;
}

/**
 * Stored media references whose file no longer exists
 */
export function findMissingMedia(
  store: AuditStore,
  exists: (filename: string) => boolean,
): MissingMedia[] {
  const missing: MissingMedia[] = [];
  for (const row of store.getAllMediaRefs()) {
    if (row.image && !exists(row.image)) {
      missing.push({ id: row.id, slot: 'image', filename: row.image });
    }
    if (row.audio && !exists(row.audio)) {
      missing.push({ id: row.id, slot: 'audio', filename: row.audio });
    }
  }
  return missing;
}

export function findDuplicateTitles(store: AuditStore): DbDuplicateTitle[] {
  return store.getDuplicateTitles();
}
