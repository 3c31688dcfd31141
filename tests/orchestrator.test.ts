import { promises as fs } from 'node:fs';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { pathExists } from '../src/services/fsUtils';
import { defaultSiteAssetsPath } from '../src/services/indexGenerator';
import { formatRunSummary, hasFailures, runOnce, type OrchestratorOptions } from '../src/services/orchestrator';
import { ManifestInvalidError } from '../src/services/pipelineErrors';
import { hashDirectoryContents, LocalDirectorySynchronizer } from '../src/services/repositorySync';
import { InMemoryPublishedVersionStore } from '../src/services/versionStore';
import type { PipelineState, RunSummary } from '../src/types';
import {
  createRecordingLogger,
  createTempDirectory,
  readTree,
  writeFiles,
  writeJsonFile,
  type ManifestEntryFixture
} from './testHelpers';

const COPY_BUILD = 'mkdir -p dist && cp index.html dist/';
const FIXED_NOW = new Date('2026-05-10T10:00:00.000Z');

type Workspace = {
  rootPath: string;
  manifestPath: string;
  publicRootPath: string;
  workRootPath: string;
  sourcePath: (name: string) => string;
};

async function createWorkspace(): Promise<Workspace> {
  const rootPath = await createTempDirectory('game-directory-run-');
  return {
    rootPath,
    manifestPath: path.join(rootPath, 'games.json'),
    publicRootPath: path.join(rootPath, 'public'),
    workRootPath: path.join(rootPath, 'work'),
    sourcePath: (name) => path.join(rootPath, 'sources', name)
  };
}

function manifestEntry(workspace: Workspace, name: string, overrides: Partial<ManifestEntryFixture> = {}): ManifestEntryFixture {
  return {
    name,
    repo_url: workspace.sourcePath(name),
    description: `${name} description`,
    build_command: COPY_BUILD,
    ...overrides
  };
}

function createOptions(
  workspace: Workspace,
  store: InMemoryPublishedVersionStore,
  overrides: Partial<OrchestratorOptions> = {}
): OrchestratorOptions {
  return {
    manifestPath: workspace.manifestPath,
    publicRootPath: workspace.publicRootPath,
    workRootPath: workspace.workRootPath,
    store,
    synchronizer: new LocalDirectorySynchronizer(),
    siteAssetsPath: defaultSiteAssetsPath(),
    logger: createRecordingLogger(),
    now: () => FIXED_NOW,
    ...overrides
  };
}

function recordStates(): { states: Map<string, PipelineState[]>; listener: (name: string, state: PipelineState) => void } {
  const states = new Map<string, PipelineState[]>();
  return {
    states,
    listener: (name, state) => {
      states.set(name, [...(states.get(name) ?? []), state]);
    }
  };
}

describe('orchestrator', () => {
  it('skips unchanged games, publishes changed ones and indexes both in manifest order', async () => {
    const workspace = await createWorkspace();
    await writeFiles(workspace.sourcePath('g1'), { 'index.html': 'g1 v1' });
    await writeFiles(workspace.sourcePath('g2'), { 'index.html': 'g2 v2' });
    await writeFiles(workspace.publicRootPath, { 'g1/index.html': 'g1 v1', 'g2/index.html': 'g2 v1' });
    await writeJsonFile(workspace.manifestPath, [manifestEntry(workspace, 'g1'), manifestEntry(workspace, 'g2')]);

    const g1Version = await hashDirectoryContents(workspace.sourcePath('g1'));
    const store = new InMemoryPublishedVersionStore([
      { name: 'g1', version: g1Version, description: 'g1 description', tags: [], publishedTime: '2026-05-01T00:00:00.000Z' },
      { name: 'g2', version: 'sha256:old', description: 'g2 description', tags: [], publishedTime: '2026-05-01T00:00:00.000Z' }
    ]);
    const { states, listener } = recordStates();

    const summary = await runOnce(createOptions(workspace, store, { onStateChange: listener }));

    const g2Version = await hashDirectoryContents(workspace.sourcePath('g2'));
    expect(summary.outcomes).toEqual([
      { status: 'skipped', name: 'g1', version: g1Version },
      { status: 'published', name: 'g2', version: g2Version }
    ]);
    expect(states.get('g1')).toEqual(['pending', 'syncing', 'detecting', 'skipped']);
    expect(states.get('g2')).toEqual(['pending', 'syncing', 'detecting', 'building', 'publishing', 'published']);
    expect(store.versionOf('g1')).toBe(g1Version);
    expect(store.versionOf('g2')).toBe(g2Version);
    expect(await fs.readFile(path.join(workspace.publicRootPath, 'g1', 'index.html'), 'utf8')).toBe('g1 v1');
    expect(await fs.readFile(path.join(workspace.publicRootPath, 'g2', 'index.html'), 'utf8')).toBe('g2 v2');

    expect(summary.indexPath).toBe(path.join(workspace.publicRootPath, 'index.html'));
    const index = await fs.readFile(summary.indexPath, 'utf8');
    const g1Position = index.indexOf('data-game-name="g1"');
    const g2Position = index.indexOf('data-game-name="g2"');
    expect(g1Position).toBeGreaterThan(-1);
    expect(g2Position).toBeGreaterThan(g1Position);
    expect(summary.startedTime).toBe('2026-05-10T10:00:00.000Z');
    expect(hasFailures(summary)).toBe(false);
  });

  it('keeps the previous release live when a rebuild fails', async () => {
    const workspace = await createWorkspace();
    const store = new InMemoryPublishedVersionStore();
    await writeFiles(workspace.sourcePath('alpha'), { 'index.html': 'alpha v1' });
    await writeJsonFile(workspace.manifestPath, [manifestEntry(workspace, 'alpha')]);
    await runOnce(createOptions(workspace, store));
    const publishedVersion = store.versionOf('alpha');
    const treeBefore = await readTree(workspace.publicRootPath);

    await writeFiles(workspace.sourcePath('alpha'), { 'index.html': 'alpha v2' });
    await writeJsonFile(workspace.manifestPath, [
      manifestEntry(workspace, 'alpha', { build_command: 'echo "type error in main.ts" >&2; exit 3' })
    ]);
    const summary = await runOnce(createOptions(workspace, store));

    expect(summary.outcomes).toEqual([
      {
        status: 'failed',
        name: 'alpha',
        stage: 'build',
        kind: 'BuildNonZeroExit',
        message: 'Build command exited with code 3',
        diagnostics: expect.objectContaining({ exitCode: 3, stderr: 'type error in main.ts\n' })
      }
    ]);
    expect(store.versionOf('alpha')).toBe(publishedVersion);
    expect(await readTree(workspace.publicRootPath)).toEqual(treeBefore);
    expect(hasFailures(summary)).toBe(true);
  });

  it('terminates slow builds and removes their working copies', async () => {
    const workspace = await createWorkspace();
    const store = new InMemoryPublishedVersionStore();
    await writeFiles(workspace.sourcePath('slow'), { 'index.html': 'slow' });
    await writeJsonFile(workspace.manifestPath, [manifestEntry(workspace, 'slow', { build_command: 'sleep 5' })]);
    const { states, listener } = recordStates();

    const summary = await runOnce(
      createOptions(workspace, store, { buildTimeoutMs: 200, buildKillGraceMs: 200, onStateChange: listener })
    );

    expect(summary.outcomes).toEqual([
      expect.objectContaining({
        status: 'failed',
        name: 'slow',
        stage: 'build',
        kind: 'BuildTimedOut',
        message: 'Build exceeded 200ms and was terminated'
      })
    ]);
    expect(states.get('slow')?.at(-1)).toBe('build-failed');
    expect(await fs.readdir(workspace.workRootPath)).toEqual([]);
    expect(store.versionOf('slow')).toBeNull();
  });

  it('isolates an unreachable source from the other games', async () => {
    const workspace = await createWorkspace();
    const store = new InMemoryPublishedVersionStore();
    await writeFiles(workspace.sourcePath('healthy'), { 'index.html': 'healthy' });
    await writeJsonFile(workspace.manifestPath, [manifestEntry(workspace, 'missing'), manifestEntry(workspace, 'healthy')]);
    const { states, listener } = recordStates();

    const summary = await runOnce(createOptions(workspace, store, { onStateChange: listener }));

    expect(summary.outcomes.map((outcome) => outcome.status)).toEqual(['failed', 'published']);
    expect(summary.outcomes[0]).toEqual({
      status: 'failed',
      name: 'missing',
      stage: 'sync',
      kind: 'SyncUnreachable',
      message: `Local source does not exist: ${workspace.sourcePath('missing')}`
    });
    expect(states.get('missing')).toEqual(['pending', 'syncing', 'sync-failed']);
    expect(await pathExists(path.join(workspace.publicRootPath, 'missing'))).toBe(false);

    const index = await fs.readFile(summary.indexPath, 'utf8');
    expect(index).toContain('data-game-name="healthy"');
    expect(index).not.toContain('data-game-name="missing"');
  });

  it('bounds concurrent pipelines by the worker limit without mixing outputs', async () => {
    const workspace = await createWorkspace();
    const store = new InMemoryPublishedVersionStore();
    const names = ['one', 'two', 'three', 'four'];
    for (const name of names) {
      await writeFiles(workspace.sourcePath(name), { 'index.html': `${name} content` });
    }
    await writeJsonFile(
      workspace.manifestPath,
      names.map((name) => manifestEntry(workspace, name, { build_command: `sleep 0.1 && ${COPY_BUILD}` }))
    );

    const terminalStates = new Set<PipelineState>(['skipped', 'published', 'sync-failed', 'build-failed', 'publish-failed']);
    let active = 0;
    let maxActive = 0;
    const summary = await runOnce(
      createOptions(workspace, store, {
        workerLimit: 2,
        onStateChange: (_name, state) => {
          if (state === 'syncing') {
            active += 1;
            maxActive = Math.max(maxActive, active);
          } else if (terminalStates.has(state)) {
            active -= 1;
          }
        }
      })
    );

    expect(summary.outcomes.map((outcome) => outcome.status)).toEqual(['published', 'published', 'published', 'published']);
    expect(maxActive).toBe(2);
    for (const name of names) {
      expect(await fs.readFile(path.join(workspace.publicRootPath, name, 'index.html'), 'utf8')).toBe(`${name} content`);
    }
  });

  it('aborts before touching the public tree when the manifest is invalid', async () => {
    const workspace = await createWorkspace();
    await writeJsonFile(workspace.manifestPath, [{ name: '../escape', repo_url: './x', build_command: 'true' }]);

    await expect(runOnce(createOptions(workspace, new InMemoryPublishedVersionStore()))).rejects.toBeInstanceOf(
      ManifestInvalidError
    );
    expect(await pathExists(workspace.publicRootPath)).toBe(false);
  });

  it('publishes games even when the shared site assets cannot be installed', async () => {
    const workspace = await createWorkspace();
    const store = new InMemoryPublishedVersionStore();
    await writeFiles(workspace.sourcePath('alpha'), { 'index.html': 'alpha' });
    await writeJsonFile(workspace.manifestPath, [manifestEntry(workspace, 'alpha')]);
    const missingAssetsPath = path.join(workspace.rootPath, 'no-assets');
    const logger = createRecordingLogger();

    const summary = await runOnce(createOptions(workspace, store, { siteAssetsPath: missingAssetsPath, logger }));

    expect(summary.outcomes.map((outcome) => outcome.status)).toEqual(['published']);
    expect(await fs.readFile(summary.indexPath, 'utf8')).toContain('data-game-name="alpha"');
    expect(logger.entries.filter((entry) => entry.level === 'error').map((entry) => entry.message)).toEqual([
      `Unable to install site assets from ${missingAssetsPath}`
    ]);
  });

  it('keeps running when a state listener throws', async () => {
    const workspace = await createWorkspace();
    const store = new InMemoryPublishedVersionStore();
    await writeFiles(workspace.sourcePath('alpha'), { 'index.html': 'alpha' });
    await writeJsonFile(workspace.manifestPath, [manifestEntry(workspace, 'alpha')]);
    const logger = createRecordingLogger();

    const summary = await runOnce(
      createOptions(workspace, store, {
        logger,
        onStateChange: (_name, state) => {
          if (state === 'building') {
            throw new Error('listener exploded');
          }
        }
      })
    );

    expect(summary.outcomes.map((outcome) => outcome.status)).toEqual(['published']);
    expect(logger.entries.filter((entry) => entry.level === 'error').map((entry) => entry.message)).toEqual([
      'State listener failed for alpha (building)'
    ]);
  });
});

describe('run summary formatting', () => {
  it('prints counts followed by one line per game', () => {
    const summary: RunSummary = {
      startedTime: '2026-05-10T10:00:00.000Z',
      finishedTime: '2026-05-10T10:01:00.000Z',
      indexPath: '/srv/public/index.html',
      outcomes: [
        { status: 'published', name: 'alpha', version: 'sha256:0123456789abcdef0123' },
        { status: 'skipped', name: 'beta', version: 'fedcba9876543210fedcba9876543210fedcba98' },
        {
          status: 'failed',
          name: 'gamma',
          stage: 'sync',
          kind: 'SyncUnreachable',
          message: 'Local source does not exist: /srv/games/gamma'
        }
      ]
    };

    expect(formatRunSummary(summary)).toEqual([
      'Run finished: 1 published, 1 skipped, 1 failed',
      '  alpha: published 0123456789ab',
      '  beta: skipped, unchanged at fedcba987654',
      '  gamma: failed at sync (SyncUnreachable): Local source does not exist: /srv/games/gamma'
    ]);
  });
});
