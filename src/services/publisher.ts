import { randomUUID } from 'node:crypto';
import { promises as fs, type Stats } from 'node:fs';
import path from 'node:path';

import { describeError, hasErrorCode, removePath } from './fsUtils';
import { PublishFailedError } from './pipelineErrors';
import { silentLogger, type PipelineLogger } from './pipelineLogger';
import { DEFAULT_THUMBNAIL_SIZE, type ThumbnailHook } from './thumbnailHook';
import type { PublishedVersionStore } from './versionStore';
import { renderGameInfoPage } from '../views';
import type { BuildArtifact, GameSpec, PublishedVersionRecord } from '../types';

export const RELEASES_DIRECTORY_NAME = '.releases';

export type PublishGameOptions = {
  publicRootPath: string;
  store: PublishedVersionStore;
  artifact: BuildArtifact;
  spec: GameSpec;
  now?: () => Date;
  releaseIdFactory?: () => string;
  thumbnailHook?: ThumbnailHook | null;
  thumbnailSize?: string;
  logger?: PipelineLogger;
};

export function gameReleasesPath(publicRootPath: string, name: string): string {
  return path.join(publicRootPath, RELEASES_DIRECTORY_NAME, name);
}

export function liveGamePath(publicRootPath: string, name: string): string {
  return path.join(publicRootPath, name);
}

function createReleaseId(now: Date): string {
  return `${now.getTime()}-${randomUUID().slice(0, 8)}`;
}

async function stageRelease(releasePath: string, artifact: BuildArtifact, spec: GameSpec): Promise<void> {
  await fs.mkdir(path.dirname(releasePath), { recursive: true });
  await fs.cp(artifact.outputPath, releasePath, { recursive: true });

  const infoDirectoryPath = path.join(releasePath, 'info');
  await fs.mkdir(infoDirectoryPath, { recursive: true });
  await fs.writeFile(path.join(infoDirectoryPath, 'index.html'), renderGameInfoPage(spec), 'utf8');
}

type PreviousLiveState = {
  linkTarget: string | null;
  legacyPath: string | null;
};

async function readLiveLinkTarget(livePath: string): Promise<string | null> {
  try {
    return await fs.readlink(livePath);
  } catch (error: unknown) {
    // EINVAL: the live path exists but is not a link.
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'EINVAL')) {
      return null;
    }

    throw error;
  }
}

// A real directory at the live path predates link-based publishing; move it aside so rename can replace it.
async function moveLegacyDirectoryAside(livePath: string, releasesPath: string): Promise<string | null> {
  let stats: Stats;
  try {
    stats = await fs.lstat(livePath);
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }

    throw error;
  }

  if (!stats.isDirectory()) {
    return null;
  }

  const legacyPath = path.join(releasesPath, `legacy-${randomUUID().slice(0, 8)}`);
  await fs.rename(livePath, legacyPath);
  return legacyPath;
}

async function pointLiveLink(publicRootPath: string, name: string, linkTarget: string): Promise<void> {
  const temporaryLinkPath = path.join(publicRootPath, `.${name}.link-${randomUUID().slice(0, 8)}`);
  try {
    await fs.symlink(linkTarget, temporaryLinkPath, 'dir');
    await fs.rename(temporaryLinkPath, liveGamePath(publicRootPath, name));
  } catch (error: unknown) {
    await removePath(temporaryLinkPath);
    throw error;
  }
}

async function swapLiveLink(publicRootPath: string, name: string, releasePath: string): Promise<PreviousLiveState> {
  const livePath = liveGamePath(publicRootPath, name);
  const linkTarget = await readLiveLinkTarget(livePath);
  const legacyPath = await moveLegacyDirectoryAside(livePath, path.dirname(releasePath));

  try {
    await pointLiveLink(publicRootPath, name, path.relative(publicRootPath, releasePath));
  } catch (error: unknown) {
    if (legacyPath) {
      await fs.rename(legacyPath, livePath);
    }

    throw error;
  }

  return { linkTarget, legacyPath };
}

async function restoreLiveState(publicRootPath: string, name: string, previous: PreviousLiveState): Promise<void> {
  if (previous.linkTarget !== null) {
    await pointLiveLink(publicRootPath, name, previous.linkTarget);
    return;
  }

  const livePath = liveGamePath(publicRootPath, name);
  await removePath(livePath);
  if (previous.legacyPath) {
    await fs.rename(previous.legacyPath, livePath);
  }
}

async function pruneReleases(releasesPath: string, keepReleaseId: string): Promise<void> {
  const entries = await fs.readdir(releasesPath);
  for (const entry of entries) {
    if (entry !== keepReleaseId) {
      await removePath(path.join(releasesPath, entry));
    }
  }
}

export async function publishGame(options: PublishGameOptions): Promise<PublishedVersionRecord> {
  const {
    publicRootPath,
    store,
    artifact,
    spec,
    now = () => new Date(),
    releaseIdFactory = () => createReleaseId(now()),
    thumbnailHook = null,
    thumbnailSize = DEFAULT_THUMBNAIL_SIZE,
    logger = silentLogger
  } = options;

  const releasesPath = gameReleasesPath(publicRootPath, spec.name);
  const releaseId = releaseIdFactory();
  const releasePath = path.join(releasesPath, releaseId);

  let previous: PreviousLiveState;
  try {
    await stageRelease(releasePath, artifact, spec);
    previous = await swapLiveLink(publicRootPath, spec.name, releasePath);
  } catch (error: unknown) {
    await removePath(releasePath);
    throw new PublishFailedError(`Unable to publish ${spec.name}: ${describeError(error)}`, { cause: error });
  }

  const record: PublishedVersionRecord = {
    name: spec.name,
    version: artifact.version,
    description: spec.description,
    tags: [...spec.tags],
    publishedTime: now().toISOString()
  };

  try {
    await store.write(record);
  } catch (error: unknown) {
    // The record still names the previous version, so the previous release goes back live.
    try {
      await restoreLiveState(publicRootPath, spec.name, previous);
      await removePath(releasePath);
    } catch (rollbackError: unknown) {
      logger.error(`Unable to restore the previous release of ${spec.name}`, rollbackError);
    }

    throw new PublishFailedError(
      `Could not record version ${artifact.version} of ${spec.name}: ${describeError(error)}`,
      { cause: error }
    );
  }

  try {
    await pruneReleases(releasesPath, releaseId);
  } catch (error: unknown) {
    logger.error(`Unable to remove previous releases of ${spec.name}`, error);
  }

  if (thumbnailHook) {
    try {
      await thumbnailHook.capture(liveGamePath(publicRootPath, spec.name), thumbnailSize);
    } catch (error: unknown) {
      logger.error(`Thumbnail capture failed for ${spec.name}`, error);
    }
  }

  return record;
}
