import { promises as fs } from 'node:fs';

import pLimit from 'p-limit';

import { executeBuild, DEFAULT_BUILD_TIMEOUT_MS } from './buildExecutor';
import { detectChange } from './changeDetector';
import type { CommandRunner } from './commandRunner';
import type { DirectoryConfig } from './directoryConfig';
import { describeError } from './fsUtils';
import { defaultSiteAssetsPath, ensureSiteAssets, generateIndex } from './indexGenerator';
import { loadManifest } from './manifest';
import { isPipelineError } from './pipelineErrors';
import { consoleLogger, scopedLogger, type PipelineLogger } from './pipelineLogger';
import { publishGame } from './publisher';
import {
  acquireWorkingCopy,
  createRepositorySynchronizer,
  releaseWorkingCopy,
  type RepositorySynchronizer
} from './repositorySync';
import { CommandThumbnailHook, DEFAULT_THUMBNAIL_SIZE, type ThumbnailHook } from './thumbnailHook';
import { FilePublishedVersionStore, type PublishedVersionStore } from './versionStore';
import type {
  GameSpec,
  PipelineErrorKind,
  PipelineOutcome,
  PipelineStage,
  PipelineState,
  RunSummary,
  WorkingCopy
} from '../types';

export type StateChangeListener = (name: string, state: PipelineState) => void;

export type OrchestratorOptions = {
  manifestPath: string;
  publicRootPath: string;
  workRootPath: string;
  store: PublishedVersionStore;
  synchronizer: RepositorySynchronizer;
  workerLimit?: number;
  buildTimeoutMs?: number;
  buildKillGraceMs?: number;
  buildRunner?: CommandRunner;
  thumbnailHook?: ThumbnailHook | null;
  thumbnailSize?: string;
  siteAssetsPath?: string;
  logger?: PipelineLogger;
  onStateChange?: StateChangeListener;
  now?: () => Date;
};

type PipelineContext = {
  publicRootPath: string;
  workRootPath: string;
  store: PublishedVersionStore;
  synchronizer: RepositorySynchronizer;
  buildTimeoutMs: number;
  buildKillGraceMs: number | undefined;
  buildRunner: CommandRunner | undefined;
  thumbnailHook: ThumbnailHook | null;
  thumbnailSize: string;
  logger: PipelineLogger;
  onStateChange: StateChangeListener | undefined;
  now: () => Date;
};

const failedStateByStage: Record<PipelineStage, PipelineState> = {
  sync: 'sync-failed',
  detect: 'sync-failed',
  build: 'build-failed',
  publish: 'publish-failed'
};

const fallbackKindByStage: Record<PipelineStage, PipelineErrorKind> = {
  sync: 'SyncCorrupt',
  detect: 'SyncCorrupt',
  build: 'BuildNonZeroExit',
  publish: 'PublishFailed'
};

export const DEFAULT_WORKER_LIMIT = 2;

function notifyStateChange(context: PipelineContext, name: string, state: PipelineState): void {
  if (!context.onStateChange) {
    return;
  }

  try {
    context.onStateChange(name, state);
  } catch (error: unknown) {
    context.logger.error(`State listener failed for ${name} (${state})`, error);
  }
}

export function toFailedOutcome(name: string, stage: PipelineStage, error: unknown): PipelineOutcome {
  if (isPipelineError(error)) {
    return {
      status: 'failed',
      name,
      stage,
      kind: error.kind,
      message: error.message,
      ...(error.diagnostics ? { diagnostics: error.diagnostics } : {})
    };
  }

  return {
    status: 'failed',
    name,
    stage,
    kind: fallbackKindByStage[stage],
    message: describeError(error)
  };
}

async function runGamePipeline(spec: GameSpec, context: PipelineContext): Promise<PipelineOutcome> {
  const logger = scopedLogger(context.logger, spec.name);
  let stage: PipelineStage = 'sync';
  let workingCopy: WorkingCopy | null = null;

  try {
    notifyStateChange(context, spec.name, 'syncing');
    workingCopy = await acquireWorkingCopy(context.workRootPath, spec.name);
    const version = await context.synchronizer.sync(spec, workingCopy);
    logger.info(`sync: at ${version}`);

    stage = 'detect';
    notifyStateChange(context, spec.name, 'detecting');
    const decision = await detectChange(context.store, spec.name, version);
    if (decision === 'skip-unchanged') {
      notifyStateChange(context, spec.name, 'skipped');
      logger.info('detect: unchanged since last publish, skipping build');
      return { status: 'skipped', name: spec.name, version };
    }

    stage = 'build';
    notifyStateChange(context, spec.name, 'building');
    logger.info(`build: running "${spec.buildCommand}"`);
    const artifact = await executeBuild({
      workingCopy,
      buildCommand: spec.buildCommand,
      version,
      timeoutMs: context.buildTimeoutMs,
      killGraceMs: context.buildKillGraceMs,
      run: context.buildRunner
    });

    stage = 'publish';
    notifyStateChange(context, spec.name, 'publishing');
    await publishGame({
      publicRootPath: context.publicRootPath,
      store: context.store,
      artifact,
      spec,
      now: context.now,
      thumbnailHook: context.thumbnailHook,
      thumbnailSize: context.thumbnailSize,
      logger
    });
    notifyStateChange(context, spec.name, 'published');
    logger.info(`publish: ${version} is live`);
    return { status: 'published', name: spec.name, version };
  } catch (error: unknown) {
    const outcome = toFailedOutcome(spec.name, stage, error);
    notifyStateChange(context, spec.name, failedStateByStage[stage]);
    logger.error(`${stage}: failed`, error);
    return outcome;
  } finally {
    if (workingCopy) {
      try {
        await releaseWorkingCopy(workingCopy);
      } catch (error: unknown) {
        logger.error(`Unable to remove working copy ${workingCopy.rootPath}`, error);
      }
    }
  }
}

/**
 * Runs every game in the manifest through sync, change detection, build and publish,
 * then regenerates the index once all pipelines have settled.
 *
 * Throws when the manifest cannot be loaded, or when the public tree itself cannot be
 * created or indexed; per-game failures are reported in the returned summary.
 */
export async function runOnce(options: OrchestratorOptions): Promise<RunSummary> {
  const {
    manifestPath,
    publicRootPath,
    workRootPath,
    store,
    synchronizer,
    workerLimit = DEFAULT_WORKER_LIMIT,
    buildTimeoutMs = DEFAULT_BUILD_TIMEOUT_MS,
    buildKillGraceMs,
    buildRunner,
    thumbnailHook = null,
    thumbnailSize = DEFAULT_THUMBNAIL_SIZE,
    siteAssetsPath = defaultSiteAssetsPath(),
    logger = consoleLogger,
    onStateChange,
    now = () => new Date()
  } = options;

  const startedTime = now().toISOString();
  const specs = await loadManifest(manifestPath);
  logger.info(`Loaded ${specs.length} game(s) from ${manifestPath}`);

  await fs.mkdir(publicRootPath, { recursive: true });
  await fs.mkdir(workRootPath, { recursive: true });
  try {
    await ensureSiteAssets(publicRootPath, siteAssetsPath);
  } catch (error: unknown) {
    // Pages still render without the stylesheet and placeholder thumbnail.
    logger.error(`Unable to install site assets from ${siteAssetsPath}`, error);
  }

  const context: PipelineContext = {
    publicRootPath,
    workRootPath,
    store,
    synchronizer,
    buildTimeoutMs,
    buildKillGraceMs,
    buildRunner,
    thumbnailHook,
    thumbnailSize,
    logger,
    onStateChange,
    now
  };

  for (const spec of specs) {
    notifyStateChange(context, spec.name, 'pending');
  }

  const limit = pLimit(Math.max(1, Math.floor(workerLimit)));
  const outcomes = await Promise.all(specs.map((spec) => limit(() => runGamePipeline(spec, context))));

  const indexPath = await generateIndex({ publicRootPath, store, specs });
  const summary: RunSummary = {
    startedTime,
    finishedTime: now().toISOString(),
    outcomes,
    indexPath
  };

  for (const line of formatRunSummary(summary)) {
    logger.info(line);
  }

  return summary;
}

function shortVersion(version: string): string {
  return version.replace(/^sha256:/, '').slice(0, 12);
}

export function formatOutcome(outcome: PipelineOutcome): string {
  switch (outcome.status) {
    case 'published':
      return `${outcome.name}: published ${shortVersion(outcome.version)}`;
    case 'skipped':
      return `${outcome.name}: skipped, unchanged at ${shortVersion(outcome.version)}`;
    case 'failed':
      return `${outcome.name}: failed at ${outcome.stage} (${outcome.kind}): ${outcome.message}`;
  }
}

export function formatRunSummary(summary: RunSummary): string[] {
  const counts = { published: 0, skipped: 0, failed: 0 };
  for (const outcome of summary.outcomes) {
    counts[outcome.status] += 1;
  }

  return [
    `Run finished: ${counts.published} published, ${counts.skipped} skipped, ${counts.failed} failed`,
    ...summary.outcomes.map((outcome) => `  ${formatOutcome(outcome)}`)
  ];
}

export function hasFailures(summary: RunSummary): boolean {
  return summary.outcomes.some((outcome) => outcome.status === 'failed');
}

export function createOrchestratorOptions(
  config: DirectoryConfig,
  logger: PipelineLogger = consoleLogger
): OrchestratorOptions {
  return {
    manifestPath: config.manifestPath,
    publicRootPath: config.publicRootPath,
    workRootPath: config.workRootPath,
    store: new FilePublishedVersionStore(config.stateRootPath),
    synchronizer: createRepositorySynchronizer({ syncTimeoutMs: config.syncTimeoutMs, logger }),
    workerLimit: config.workerLimit,
    buildTimeoutMs: config.buildTimeoutMs,
    thumbnailHook: config.thumbnailCommand ? new CommandThumbnailHook({ command: config.thumbnailCommand }) : null,
    thumbnailSize: config.thumbnailSize,
    logger
  };
}
