import { promises as fs } from 'node:fs';
import path from 'node:path';

import request from 'supertest';
import { describe, expect, it } from 'vitest';

import { cacheControlForPath, createSiteApp } from '../src/app';
import { createTempDirectory, writeFiles } from './testHelpers';

async function createPublishedTree(): Promise<string> {
  const publicRootPath = await createTempDirectory('game-directory-site-');
  await writeFiles(publicRootPath, {
    'index.html': '<h1>Game Directory</h1>',
    'static/style.css': 'body {}',
    '.releases/alpha/r1/index.html': '<canvas id="alpha"></canvas>',
    '.releases/alpha/r1/game.js': 'start();'
  });
  await fs.symlink(path.join('.releases', 'alpha', 'r1'), path.join(publicRootPath, 'alpha'), 'dir');
  return publicRootPath;
}

describe('site app', () => {
  it('serves the index without caching', async () => {
    const app = createSiteApp({ publicRootPath: await createPublishedTree() });

    const response = await request(app).get('/');

    expect(response.status).toBe(200);
    expect(response.text).toBe('<h1>Game Directory</h1>');
    expect(response.headers['cache-control']).toBe('no-cache');
    expect(response.headers['x-powered-by']).toBeUndefined();
  });

  it('serves game files through the live link with asset caching', async () => {
    const app = createSiteApp({ publicRootPath: await createPublishedTree(), assetMaxAgeSeconds: 120 });

    const page = await request(app).get('/alpha/');
    const script = await request(app).get('/alpha/game.js');

    expect(page.status).toBe(200);
    expect(page.text).toBe('<canvas id="alpha"></canvas>');
    expect(script.status).toBe(200);
    expect(script.headers['cache-control']).toBe('public, max-age=120');
  });

  it('redirects a bare game path to its directory', async () => {
    const app = createSiteApp({ publicRootPath: await createPublishedTree() });

    const response = await request(app).get('/alpha');

    expect(response.status).toBe(301);
    expect(response.headers.location).toBe('/alpha/');
  });

  it('hides staged releases and unknown paths', async () => {
    const app = createSiteApp({ publicRootPath: await createPublishedTree() });

    const hidden = await request(app).get('/.releases/alpha/r1/index.html');
    const unknown = await request(app).get('/missing/');

    expect(hidden.status).toBe(404);
    expect(hidden.text).toBe('Not found');
    expect(unknown.status).toBe(404);
  });

  it('only disables caching for html documents', () => {
    expect(cacheControlForPath('/srv/public/alpha/INDEX.HTML', 60)).toBe('no-cache');
    expect(cacheControlForPath('/srv/public/static/style.css', 60)).toBe('public, max-age=60');
  });
});
