/**
 * Lockfile discovery
 * The running client writes `<name>:<pid>:<port>:<password>:<protocol>`
 * into a lockfile next to its executable.
 */

import { access, readFile } from 'fs/promises';
import { join } from 'path';

import type { AppConfig } from '../config.js';
import type { LcuCredentials } from '../types.js';
import { errorMessage } from '../utils/errors.js';

export interface LockfileData {
  processName: string;
  pid: number;
  port: number;
  password: string;
  protocol: string;
}

export class LockfileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LockfileError';
  }
}

const DEFAULT_PATHS: Partial<Record<NodeJS.Platform, string[]>> = {
  win32: ['C:\\Riot Games\\League of Legends\\lockfile'],
  darwin: ['/Applications/League of Legends.app/Contents/LoL/lockfile'],
};

export function parseLockfile(content: string): LockfileData {
  const parts = content.trim().split(':');
  if (parts.length !== 5) {
    throw new LockfileError(`Malformed lockfile: expected 5 fields, got ${parts.length}`);
  }

  const [processName, pidText, portText, password, protocol] = parts;
  const pid = Number(pidText);
  const port = Number(portText);

  if (!Number.isInteger(pid) || pid < 0) {
    throw new LockfileError(`Malformed lockfile: invalid pid "${pidText}"`);
  }
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new LockfileError(`Malformed lockfile: invalid port "${portText}"`);
  }
  if (!password) {
    throw new LockfileError('Malformed lockfile: empty password');
  }

  return { processName, pid, port, password, protocol: protocol || 'https' };
}

export function defaultLockfilePaths(platform: NodeJS.Platform = process.platform): string[] {
  return DEFAULT_PATHS[platform] ?? [];
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve the lockfile location: explicit path, then install dir, then the
 * platform defaults.
 */
export async function resolveLockfilePath(
  config: Pick<AppConfig, 'lockfilePath' | 'installDir'>,
  platform: NodeJS.Platform = process.platform
): Promise<string> {
  if (config.lockfilePath) return config.lockfilePath;
  if (config.installDir) return join(config.installDir, 'lockfile');

  for (const candidate of defaultLockfilePaths(platform)) {
    if (await exists(candidate)) return candidate;
  }

  throw new LockfileError(
    'Could not locate the League client lockfile. Set LCU_LOCKFILE_PATH or LOL_INSTALL_DIR.'
  );
}

export async function readLockfile(path: string): Promise<LockfileData> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new LockfileError(
      `League client is not running (cannot read ${path}): ${errorMessage(error)}`
    );
  }
  return parseLockfile(content);
}

export function toCredentials(lockfile: LockfileData): LcuCredentials {
  const token = Buffer.from(`riot:${lockfile.password}`).toString('base64');
  return {
    baseUrl: `${lockfile.protocol}://127.0.0.1:${lockfile.port}`,
    authorization: `Basic ${token}`,
  };
}
