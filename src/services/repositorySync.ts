import { createHash } from 'node:crypto';
import { type Dirent, promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { formatCommandFailure, runCommand, type CommandResult, type CommandRunner } from './commandRunner';
import { describeError, hasErrorCode, pathExists, removePath } from './fsUtils';
import { SyncCorruptError, SyncUnreachableError, isPipelineError } from './pipelineErrors';
import { silentLogger, type PipelineLogger } from './pipelineLogger';
import type { ContentVersion, GameSpec, WorkingCopy } from '../types';

export const DEFAULT_SYNC_TIMEOUT_MS = 120_000;

const SOURCE_DIRECTORY_NAME = 'source';
const excludedSourceEntries = new Set(['.git', 'node_modules', 'dist']);
const commitHashPattern = /^(?:[0-9a-f]{40}|[0-9a-f]{64})$/;
const unreachablePatterns = [
  /could not resolve host/i,
  /repository not found/i,
  /authentication failed/i,
  /does not appear to be a git repository/i,
  /unable to access/i,
  /connection refused/i,
  /connection timed out/i,
  /could not read username/i,
  /returned error: 404/i
];

export interface RepositorySynchronizer {
  sync(spec: GameSpec, workingCopy: WorkingCopy): Promise<ContentVersion>;
}

export async function acquireWorkingCopy(workRootPath: string, gameName: string): Promise<WorkingCopy> {
  await fs.mkdir(workRootPath, { recursive: true });
  const rootPath = await fs.mkdtemp(path.join(workRootPath, `${gameName}-`));
  return {
    gameName,
    rootPath,
    sourcePath: path.join(rootPath, SOURCE_DIRECTORY_NAME)
  };
}

export async function releaseWorkingCopy(workingCopy: WorkingCopy): Promise<void> {
  await removePath(workingCopy.rootPath);
}

export function isUnreachableGitFailure(output: string): boolean {
  return unreachablePatterns.some((pattern) => pattern.test(output));
}

type GitRepositorySynchronizerOptions = {
  run?: CommandRunner;
  timeoutMs?: number;
  logger?: PipelineLogger;
};

export class GitRepositorySynchronizer implements RepositorySynchronizer {
  private readonly run: CommandRunner;
  private readonly timeoutMs: number;
  private readonly logger: PipelineLogger;

  constructor(options: GitRepositorySynchronizerOptions = {}) {
    this.run = options.run ?? runCommand;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SYNC_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  async sync(spec: GameSpec, workingCopy: WorkingCopy): Promise<ContentVersion> {
    const hasExistingCheckout = await pathExists(path.join(workingCopy.sourcePath, '.git'));
    if (!hasExistingCheckout) {
      await this.clone(spec, workingCopy);
      return this.readHeadVersion(workingCopy);
    }

    try {
      await this.update(workingCopy);
      return await this.readHeadVersion(workingCopy);
    } catch (error: unknown) {
      if (!(error instanceof SyncCorruptError)) {
        throw error;
      }

      this.logger.error(`Working copy for ${spec.name} is unusable, fetching it again`, error);
      await removePath(workingCopy.sourcePath);
      await this.clone(spec, workingCopy);
      return this.readHeadVersion(workingCopy);
    }
  }

  private async git(args: readonly string[], cwd?: string): Promise<CommandResult> {
    try {
      return await this.run('git', args, {
        cwd,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
        timeoutMs: this.timeoutMs
      });
    } catch (error: unknown) {
      throw new SyncCorruptError(`Unable to run git: ${describeError(error)}`, { cause: error });
    }
  }

  private failure(args: readonly string[], result: CommandResult): SyncCorruptError | SyncUnreachableError {
    const message = formatCommandFailure('git', args, result);
    if (result.timedOut || isUnreachableGitFailure(result.stderr)) {
      return new SyncUnreachableError(message, { diagnostics: result });
    }

    return new SyncCorruptError(message, { diagnostics: result });
  }

  private async clone(spec: GameSpec, workingCopy: WorkingCopy): Promise<void> {
    const args = ['clone', '--depth', '1', spec.sourceUrl, workingCopy.sourcePath];
    const result = await this.git(args, workingCopy.rootPath);
    if (result.exitCode !== 0) {
      throw this.failure(args, result);
    }
  }

  private async update(workingCopy: WorkingCopy): Promise<void> {
    const fetchArgs = ['fetch', '--depth', '1', 'origin'];
    const fetchResult = await this.git(fetchArgs, workingCopy.sourcePath);
    if (fetchResult.exitCode !== 0) {
      throw this.failure(fetchArgs, fetchResult);
    }

    const resetArgs = ['reset', '--hard', 'FETCH_HEAD'];
    const resetResult = await this.git(resetArgs, workingCopy.sourcePath);
    if (resetResult.exitCode !== 0) {
      throw new SyncCorruptError(formatCommandFailure('git', resetArgs, resetResult), { diagnostics: resetResult });
    }
  }

  private async readHeadVersion(workingCopy: WorkingCopy): Promise<ContentVersion> {
    const args = ['rev-parse', 'HEAD'];
    const result = await this.git(args, workingCopy.sourcePath);
    const version = result.stdout.trim();
    if (result.exitCode !== 0 || !commitHashPattern.test(version)) {
      throw new SyncCorruptError(`Unable to read HEAD commit: ${formatCommandFailure('git', args, result)}`, {
        diagnostics: result
      });
    }

    return version;
  }
}

async function listSourceFiles(rootPath: string, relativeDirectory = ''): Promise<string[]> {
  const entries: Dirent[] = await fs.readdir(path.join(rootPath, relativeDirectory), { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    if (excludedSourceEntries.has(entry.name)) {
      continue;
    }

    const relativePath = path.posix.join(relativeDirectory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listSourceFiles(rootPath, relativePath)));
    } else if (entry.isFile()) {
      files.push(relativePath);
    }
  }

  return files;
}

export async function hashDirectoryContents(rootPath: string): Promise<ContentVersion> {
  const files = await listSourceFiles(rootPath);
  files.sort();

  const hash = createHash('sha256');
  for (const relativePath of files) {
    const contents = await fs.readFile(path.join(rootPath, relativePath));
    hash.update(relativePath);
    hash.update('\0');
    hash.update(String(contents.length));
    hash.update('\0');
    hash.update(contents);
  }

  return `sha256:${hash.digest('hex')}`;
}

export function resolveLocalSourcePath(sourceUrl: string): string | null {
  if (sourceUrl.startsWith('file://')) {
    return fileURLToPath(sourceUrl);
  }

  if (path.isAbsolute(sourceUrl) || sourceUrl.startsWith('./') || sourceUrl.startsWith('../')) {
    return path.resolve(sourceUrl);
  }

  return null;
}

export class LocalDirectorySynchronizer implements RepositorySynchronizer {
  async sync(spec: GameSpec, workingCopy: WorkingCopy): Promise<ContentVersion> {
    const sourceRootPath = resolveLocalSourcePath(spec.sourceUrl);
    if (!sourceRootPath) {
      throw new SyncUnreachableError(`Not a local source path: ${spec.sourceUrl}`);
    }

    try {
      const stats = await fs.stat(sourceRootPath);
      if (!stats.isDirectory()) {
        throw new SyncUnreachableError(`Local source is not a directory: ${sourceRootPath}`);
      }
    } catch (error: unknown) {
      if (isPipelineError(error)) {
        throw error;
      }

      if (hasErrorCode(error, 'ENOENT')) {
        throw new SyncUnreachableError(`Local source does not exist: ${sourceRootPath}`, { cause: error });
      }

      throw new SyncUnreachableError(`Unable to read local source ${sourceRootPath}: ${describeError(error)}`, {
        cause: error
      });
    }

    try {
      await removePath(workingCopy.sourcePath);
      await fs.cp(sourceRootPath, workingCopy.sourcePath, {
        recursive: true,
        filter: (copiedPath) => copiedPath === sourceRootPath || !excludedSourceEntries.has(path.basename(copiedPath))
      });
      return await hashDirectoryContents(workingCopy.sourcePath);
    } catch (error: unknown) {
      throw new SyncCorruptError(`Unable to copy local source ${sourceRootPath}: ${describeError(error)}`, {
        cause: error
      });
    }
  }
}

type DispatchingRepositorySynchronizerOptions = {
  git?: RepositorySynchronizer;
  local?: RepositorySynchronizer;
};

export class DispatchingRepositorySynchronizer implements RepositorySynchronizer {
  private readonly git: RepositorySynchronizer;
  private readonly local: RepositorySynchronizer;

  constructor(options: DispatchingRepositorySynchronizerOptions = {}) {
    this.git = options.git ?? new GitRepositorySynchronizer();
    this.local = options.local ?? new LocalDirectorySynchronizer();
  }

  async sync(spec: GameSpec, workingCopy: WorkingCopy): Promise<ContentVersion> {
    return this.select(spec).sync(spec, workingCopy);
  }

  select(spec: GameSpec): RepositorySynchronizer {
    return resolveLocalSourcePath(spec.sourceUrl) ? this.local : this.git;
  }
}

type CreateRepositorySynchronizerOptions = {
  syncTimeoutMs?: number;
  logger?: PipelineLogger;
};

export function createRepositorySynchronizer(
  options: CreateRepositorySynchronizerOptions = {}
): RepositorySynchronizer {
  return new DispatchingRepositorySynchronizer({
    git: new GitRepositorySynchronizer({ timeoutMs: options.syncTimeoutMs, logger: options.logger }),
    local: new LocalDirectorySynchronizer()
  });
}
