import type { CommandDiagnostics, PipelineErrorKind } from '../types';

type PipelineErrorOptions = {
  cause?: unknown;
  diagnostics?: CommandDiagnostics;
};

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly diagnostics: CommandDiagnostics | undefined;

  constructor(kind: PipelineErrorKind, message: string, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = `${kind}Error`;
    this.kind = kind;
    this.diagnostics = options.diagnostics;
  }
}

export class ManifestInvalidError extends PipelineError {
  readonly problems: readonly string[];

  constructor(problems: readonly string[], options: PipelineErrorOptions = {}) {
    super('ManifestInvalid', `Manifest is invalid: ${problems.join('; ')}`, options);
    this.problems = problems;
  }
}

export class SyncUnreachableError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super('SyncUnreachable', message, options);
  }
}

export class SyncCorruptError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super('SyncCorrupt', message, options);
  }
}

export class BuildTimedOutError extends PipelineError {
  constructor(timeoutMs: number, diagnostics: CommandDiagnostics) {
    super('BuildTimedOut', `Build exceeded ${timeoutMs}ms and was terminated`, { diagnostics });
  }
}

export class BuildNonZeroExitError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super('BuildNonZeroExit', message, options);
  }
}

export class BuildOutputMissingError extends PipelineError {
  constructor(outputPath: string, diagnostics: CommandDiagnostics) {
    super('BuildOutputMissing', `Build exited 0 but produced no output at ${outputPath}`, { diagnostics });
  }
}

export class PublishFailedError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super('PublishFailed', message, options);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
