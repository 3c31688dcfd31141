import path from 'node:path';

import { runCommand, type CommandResult, type CommandRunner } from './commandRunner';
import { describeError, isNonEmptyDirectory } from './fsUtils';
import { BuildNonZeroExitError, BuildOutputMissingError, BuildTimedOutError } from './pipelineErrors';
import type { BuildArtifact, ContentVersion, WorkingCopy } from '../types';

/**
 * Directory, relative to the checkout root, that every build command must populate.
 * This name is the only contract between the orchestrator and external build tooling.
 */
export const BUILD_OUTPUT_DIRECTORY_NAME = 'dist';
export const DEFAULT_BUILD_TIMEOUT_MS = 10 * 60 * 1000;

export type ExecuteBuildOptions = {
  workingCopy: WorkingCopy;
  buildCommand: string;
  version: ContentVersion;
  timeoutMs?: number;
  killGraceMs?: number;
  run?: CommandRunner;
  env?: NodeJS.ProcessEnv;
};

function describeExit(result: CommandResult): string {
  if (result.signal) {
    return `was killed by ${result.signal}`;
  }

  return `exited with code ${result.exitCode ?? 'unknown'}`;
}

export function buildOutputPath(workingCopy: WorkingCopy): string {
  return path.join(workingCopy.sourcePath, BUILD_OUTPUT_DIRECTORY_NAME);
}

export async function executeBuild(options: ExecuteBuildOptions): Promise<BuildArtifact> {
  const {
    workingCopy,
    buildCommand,
    version,
    timeoutMs = DEFAULT_BUILD_TIMEOUT_MS,
    killGraceMs,
    run = runCommand,
    env = process.env
  } = options;

  let result: CommandResult;
  try {
    result = await run('sh', ['-c', buildCommand], {
      cwd: workingCopy.sourcePath,
      env: { ...env, CI: '1' },
      timeoutMs,
      killGraceMs
    });
  } catch (error: unknown) {
    throw new BuildNonZeroExitError(`Unable to start build command: ${describeError(error)}`, { cause: error });
  }

  if (result.timedOut) {
    throw new BuildTimedOutError(timeoutMs, result);
  }

  if (result.exitCode !== 0) {
    throw new BuildNonZeroExitError(`Build command ${describeExit(result)}`, { diagnostics: result });
  }

  const outputPath = buildOutputPath(workingCopy);
  if (!(await isNonEmptyDirectory(outputPath))) {
    throw new BuildOutputMissingError(outputPath, result);
  }

  return {
    gameName: workingCopy.gameName,
    outputPath,
    version
  };
}
