export type GameSpec = Readonly<{
  name: string;
  sourceUrl: string;
  description: string;
  tags: readonly string[];
  buildCommand: string;
}>;

export type ContentVersion = string;

export type WorkingCopy = {
  gameName: string;
  rootPath: string;
  sourcePath: string;
};

export type BuildArtifact = {
  gameName: string;
  outputPath: string;
  version: ContentVersion;
};

export type PublishedVersionRecord = {
  name: string;
  version: ContentVersion;
  description: string;
  tags: string[];
  publishedTime: string;
};

export type ChangeDecision = 'build-needed' | 'skip-unchanged';

export type PipelineStage = 'sync' | 'detect' | 'build' | 'publish';

export type PipelineState =
  | 'pending'
  | 'syncing'
  | 'sync-failed'
  | 'detecting'
  | 'skipped'
  | 'building'
  | 'build-failed'
  | 'publishing'
  | 'publish-failed'
  | 'published';

export type PipelineErrorKind =
  | 'ManifestInvalid'
  | 'SyncUnreachable'
  | 'SyncCorrupt'
  | 'BuildTimedOut'
  | 'BuildNonZeroExit'
  | 'BuildOutputMissing'
  | 'PublishFailed';

export type CommandDiagnostics = {
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  durationMs: number;
};

export type PipelineOutcome =
  | { status: 'published'; name: string; version: ContentVersion }
  | { status: 'skipped'; name: string; version: ContentVersion }
  | {
      status: 'failed';
      name: string;
      stage: PipelineStage;
      kind: PipelineErrorKind;
      message: string;
      diagnostics?: CommandDiagnostics;
    };

export type RunSummary = {
  startedTime: string;
  finishedTime: string;
  outcomes: PipelineOutcome[];
  indexPath: string;
};
