import express from 'express';
import path from 'node:path';

type SiteAppOptions = {
  publicRootPath: string;
  assetMaxAgeSeconds?: number;
};

export const DEFAULT_ASSET_MAX_AGE_SECONDS = 60 * 60;

export function cacheControlForPath(filePath: string, assetMaxAgeSeconds: number): string {
  if (path.extname(filePath).toLowerCase() === '.html') {
    return 'no-cache';
  }

  return `public, max-age=${assetMaxAgeSeconds}`;
}

// Serves the published tree as-is. `/<name>` redirects to `/<name>/`; dotfiles such as
// `.releases` stay hidden even though game links resolve into them.
export function createSiteApp(options: SiteAppOptions): express.Express {
  const { publicRootPath, assetMaxAgeSeconds = DEFAULT_ASSET_MAX_AGE_SECONDS } = options;
  const app = express();
  app.disable('x-powered-by');

  app.use(
    express.static(publicRootPath, {
      dotfiles: 'ignore',
      index: ['index.html'],
      redirect: true,
      setHeaders: (response, filePath) => {
        response.setHeader('Cache-Control', cacheControlForPath(filePath, assetMaxAgeSeconds));
      }
    })
  );

  app.use((_request, response) => {
    response.status(404).type('text/plain').send('Not found');
  });

  return app;
}
