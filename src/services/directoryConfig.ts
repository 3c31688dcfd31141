import os from 'node:os';
import path from 'node:path';

import { DEFAULT_BUILD_TIMEOUT_MS } from './buildExecutor';
import { DEFAULT_WORKER_LIMIT } from './orchestrator';
import { DEFAULT_SYNC_TIMEOUT_MS } from './repositorySync';
import { DEFAULT_THUMBNAIL_SIZE, isThumbnailSize } from './thumbnailHook';

export type DirectoryConfig = {
  manifestPath: string;
  publicRootPath: string;
  stateRootPath: string;
  workRootPath: string;
  workerLimit: number;
  buildTimeoutMs: number;
  syncTimeoutMs: number;
  thumbnailCommand: string | null;
  thumbnailSize: string;
  rebuildIntervalHours: number;
  failOnGameError: boolean;
  port: number;
};

export const DEFAULT_MANIFEST_PATH = 'config/games.json';
export const DEFAULT_PUBLIC_ROOT = 'public';
export const DEFAULT_STATE_ROOT = 'state';
export const DEFAULT_REBUILD_INTERVAL_HOURS = 6;
export const DEFAULT_PORT = 3000;
// Timer delays above 2^31 - 1 ms overflow and fire immediately.
export const MAX_REBUILD_INTERVAL_HOURS = Math.floor((2 ** 31 - 1) / (60 * 60 * 1000));

function readNonEmptyEnvOrDefault(value: string | undefined, defaultValue: string): string {
  if (typeof value !== 'string') {
    return defaultValue;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : defaultValue;
}

function readPositiveNumberOrDefault(value: string | undefined, defaultValue: number): number {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return defaultValue;
  }

  const parsed = Number(value.trim());
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
}

function readPositiveIntegerOrDefault(value: string | undefined, defaultValue: number): number {
  const parsed = readPositiveNumberOrDefault(value, defaultValue);
  return Number.isInteger(parsed) ? parsed : defaultValue;
}

function readOptionalCommand(value: string | undefined): string | null {
  const normalized = readNonEmptyEnvOrDefault(value, '');
  return normalized.length > 0 ? normalized : null;
}

export function readDirectoryConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  repoRootPath: string = process.cwd()
): DirectoryConfig {
  const resolveFromRoot = (value: string): string => path.resolve(repoRootPath, value);
  const thumbnailSize = readNonEmptyEnvOrDefault(env.GAME_DIRECTORY_THUMBNAIL_SIZE, DEFAULT_THUMBNAIL_SIZE);

  return {
    manifestPath: resolveFromRoot(readNonEmptyEnvOrDefault(env.GAME_DIRECTORY_MANIFEST_PATH, DEFAULT_MANIFEST_PATH)),
    publicRootPath: resolveFromRoot(readNonEmptyEnvOrDefault(env.GAME_DIRECTORY_PUBLIC_ROOT, DEFAULT_PUBLIC_ROOT)),
    stateRootPath: resolveFromRoot(readNonEmptyEnvOrDefault(env.GAME_DIRECTORY_STATE_ROOT, DEFAULT_STATE_ROOT)),
    workRootPath: resolveFromRoot(
      readNonEmptyEnvOrDefault(env.GAME_DIRECTORY_WORK_ROOT, path.join(os.tmpdir(), 'game-directory-work'))
    ),
    workerLimit: readPositiveIntegerOrDefault(env.GAME_DIRECTORY_WORKER_LIMIT, DEFAULT_WORKER_LIMIT),
    buildTimeoutMs: readPositiveIntegerOrDefault(env.GAME_DIRECTORY_BUILD_TIMEOUT_MS, DEFAULT_BUILD_TIMEOUT_MS),
    syncTimeoutMs: readPositiveIntegerOrDefault(env.GAME_DIRECTORY_SYNC_TIMEOUT_MS, DEFAULT_SYNC_TIMEOUT_MS),
    thumbnailCommand: readOptionalCommand(env.GAME_DIRECTORY_THUMBNAIL_COMMAND),
    thumbnailSize: isThumbnailSize(thumbnailSize) ? thumbnailSize : DEFAULT_THUMBNAIL_SIZE,
    rebuildIntervalHours: Math.min(
      readPositiveNumberOrDefault(env.GAME_DIRECTORY_REBUILD_INTERVAL_HOURS, DEFAULT_REBUILD_INTERVAL_HOURS),
      MAX_REBUILD_INTERVAL_HOURS
    ),
    failOnGameError: env.GAME_DIRECTORY_FAIL_ON_GAME_ERROR === '1',
    port: readPositiveIntegerOrDefault(env.PORT, DEFAULT_PORT)
  };
}
