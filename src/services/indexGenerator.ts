import { promises as fs } from 'node:fs';
import path from 'node:path';

import { pathExists, writeFileAtomically } from './fsUtils';
import { liveGamePath } from './publisher';
import { THUMBNAIL_FILE_NAME } from './thumbnailHook';
import type { PublishedVersionStore } from './versionStore';
import { renderIndexDocument, type PublishedGameEntry } from '../views';
import type { GameSpec } from '../types';

export const INDEX_DOCUMENT_NAME = 'index.html';
export const SITE_ASSET_FILE_NAMES = ['style.css', 'default-thumb.png'] as const;

// Resolved beside this module so runs do not depend on the working directory; `npm run build` copies it into dist.
export function defaultSiteAssetsPath(): string {
  return path.resolve(__dirname, '..', 'public');
}

export async function listPublishedGames(
  publicRootPath: string,
  store: PublishedVersionStore,
  specs: readonly GameSpec[]
): Promise<PublishedGameEntry[]> {
  const entries: PublishedGameEntry[] = [];
  for (const spec of specs) {
    const record = await store.read(spec.name);
    if (!record) {
      continue;
    }

    const gamePath = liveGamePath(publicRootPath, spec.name);
    if (!(await pathExists(gamePath))) {
      continue;
    }

    entries.push({
      name: record.name,
      description: record.description,
      tags: record.tags,
      hasThumbnail: await pathExists(path.join(gamePath, THUMBNAIL_FILE_NAME))
    });
  }

  return entries;
}

type GenerateIndexOptions = {
  publicRootPath: string;
  store: PublishedVersionStore;
  specs: readonly GameSpec[];
};

export async function generateIndex(options: GenerateIndexOptions): Promise<string> {
  const { publicRootPath, store, specs } = options;
  const entries = await listPublishedGames(publicRootPath, store, specs);
  const indexPath = path.join(publicRootPath, INDEX_DOCUMENT_NAME);
  await writeFileAtomically(indexPath, renderIndexDocument(entries));
  return indexPath;
}

export async function ensureSiteAssets(publicRootPath: string, siteAssetsPath: string): Promise<void> {
  const staticDirectoryPath = path.join(publicRootPath, 'static');
  await fs.mkdir(staticDirectoryPath, { recursive: true });

  for (const fileName of SITE_ASSET_FILE_NAMES) {
    const targetPath = path.join(staticDirectoryPath, fileName);
    if (await pathExists(targetPath)) {
      continue;
    }

    await fs.copyFile(path.join(siteAssetsPath, fileName), targetPath);
  }
}
