export type PublishedGameEntry = {
  name: string;
  description: string;
  tags: readonly string[];
  hasThumbnail: boolean;
};

export const DEFAULT_THUMBNAIL_PATH = '/static/default-thumb.png';
export const SITE_TITLE = 'Game Directory';

export function escapeHtml(value: string): string {
  return value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#39;');
}

export function gameHref(name: string): string {
  return `/${encodeURIComponent(name)}/`;
}

export function gameInfoHref(name: string): string {
  return `/${encodeURIComponent(name)}/info/`;
}

function renderTags(tags: readonly string[]): string {
  if (tags.length === 0) {
    return '';
  }

  const items = tags.map((tag) => `<span class="tag">${escapeHtml(tag)}</span>`).join('');
  return `<div class="tags">${items}</div>`;
}

function renderGameCard(entry: PublishedGameEntry): string {
  const name = escapeHtml(entry.name);
  const thumbnailSrc = entry.hasThumbnail ? `${gameHref(entry.name)}thumbnail.png` : DEFAULT_THUMBNAIL_PATH;
  return `
        <div class="game-card" data-game-name="${name}">
          <a href="${gameHref(entry.name)}">
            <div class="game-thumb"><img src="${thumbnailSrc}" alt="${name}" /></div>
            <div class="game-info">
              <h2>${name}</h2>
              <p>${escapeHtml(entry.description)}</p>
            </div>
          </a>
          ${renderTags(entry.tags)}
          <a class="info-link" href="${gameInfoHref(entry.name)}">Info</a>
        </div>`;
}

export function renderIndexDocument(entries: readonly PublishedGameEntry[]): string {
  const content =
    entries.length > 0
      ? `<div class="game-grid" role="list">${entries.map(renderGameCard).join('')}
      </div>`
      : '<p class="empty-state">No games have been published yet.</p>';

  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${SITE_TITLE}</title>
    <link rel="stylesheet" href="/static/style.css" />
  </head>
  <body>
    <header>
      <h1>${SITE_TITLE}</h1>
    </header>
    <main>
      ${content}
    </main>
  </body>
</html>
`;
}

type GameInfoView = {
  name: string;
  description: string;
  tags: readonly string[];
};

export function renderGameInfoPage(game: GameInfoView): string {
  const name = escapeHtml(game.name);
  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${name} - Info</title>
    <link rel="stylesheet" href="/static/style.css" />
  </head>
  <body>
    <header>
      <nav>
        <a href="/">Home</a>
        <a href="${gameHref(game.name)}">Play</a>
      </nav>
    </header>
    <main class="info-container">
      <h1>${name}</h1>
      <p class="description">${escapeHtml(game.description)}</p>
      ${renderTags(game.tags)}
    </main>
  </body>
</html>
`;
}
