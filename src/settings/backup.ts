/**
 * Settings Backup
 * Exports client settings to JSON files and restores them
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';

import type { LcuClient } from '../lcu/client.js';
import { settingsDataSchema, type SettingsData } from '../lcu/schemas.js';
import type { ApiResult, SettingsSection } from '../types.js';
import { errorMessage } from '../utils/errors.js';

export const SETTINGS_SECTIONS: readonly SettingsSection[] = ['game-settings', 'input-settings'];

export interface RestoreResult {
  section: SettingsSection;
  // false when the backup file could not be loaded and no request was sent
  attempted: boolean;
  success: boolean;
  status?: number;
  error?: string;
}

export function backupFilePath(backupDir: string, section: SettingsSection): string {
  return join(backupDir, `${section}.json`);
}

/**
 * Load a backup file; the top level must be a JSON object
 */
export async function loadBackupFile(path: string): Promise<ApiResult<SettingsData>> {
  try {
    const content = await readFile(path, 'utf-8');
    const parsed = settingsDataSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      return { success: false, error: `Invalid settings backup ${path}: expected a JSON object` };
    }
    return { success: true, data: parsed.data };
  } catch (error) {
    return {
      success: false,
      error: `Failed to load settings backup: ${errorMessage(error)}`,
    };
  }
}

export async function exportSettings(client: LcuClient, backupDir: string): Promise<string[]> {
  await mkdir(backupDir, { recursive: true });
  const written: string[] = [];

  for (const section of SETTINGS_SECTIONS) {
    const result = await client.getSettings(section);
    if (!result.success || !result.data) {
      throw new Error(result.error ?? `Failed to read ${section}`);
    }

    const path = backupFilePath(backupDir, section);
    await writeFile(path, JSON.stringify(result.data, null, 2));
    written.push(path);
  }

  return written;
}

export async function importSettings(client: LcuClient, backupDir: string): Promise<RestoreResult[]> {
  const results: RestoreResult[] = [];

  for (const section of SETTINGS_SECTIONS) {
    const backup = await loadBackupFile(backupFilePath(backupDir, section));
    if (!backup.success || !backup.data) {
      results.push({ section, attempted: false, success: false, error: backup.error });
      continue;
    }

    const response = await client.patchSettings(section, backup.data);
    results.push({
      section,
      attempted: true,
      success: response.success,
      status: response.status,
      error: response.error,
    });
  }

  return results;
}

export function formatRestoreResults(results: RestoreResult[]): string {
  return results
    .map((r) => {
      if (!r.attempted) return `${r.section} skipped: ${r.error ?? 'unknown error'}`;
      if (r.status === undefined) return `${r.section} failed: ${r.error ?? 'unknown error'}`;
      return `${r.section} req status: ${r.status}${r.error ? ` (${r.error})` : ''}`;
    })
    .join('\n');
}
