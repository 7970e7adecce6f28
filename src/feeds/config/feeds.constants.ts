import path from 'node:path';

function readNumber(
  envName: string,
  fallback: number,
  options: { min?: number; integer?: boolean } = {},
): number {
  const raw = (process.env[envName] ?? '').trim();
  if (!raw) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  const value = options.integer ? Math.floor(parsed) : parsed;
  return Math.max(options.min ?? 0, value);
}

function readString(envName: string, fallback: string): string {
  const raw = (process.env[envName] ?? '').trim();
  return raw || fallback;
}

export const SERVICE_NAME = 'feed-categorizer';
export const SERVICE_VERSION = '1.0.0';
export const UNCATEGORIZED_LABEL = 'Uncategorized';

const dataDir = readString('DATA_DIR', path.join(process.cwd(), 'data'));
export const CACHE_FILE = readString(
  'CACHE_FILE',
  path.join(dataDir, 'processed_articles.json'),
);
export const CACHE_EXPIRE_DAYS = readNumber('CACHE_EXPIRE_DAYS', 3, {
  min: 0,
});
export const CACHE_TTL_SEC = CACHE_EXPIRE_DAYS * 86400;

export const FEED_LIST_URL = (process.env.FEED_LIST_URL ?? '').trim();
export const FEED_LIST_PATH = readString(
  'FEED_LIST_PATH',
  path.join(dataDir, 'feeds.opml'),
);
export const FEED_LIST_REFRESH_SEC = readNumber(
  'FEED_LIST_REFRESH_SEC',
  86400,
  { min: 60 },
);
export const FEED_LIMIT = readNumber('FEED_LIMIT', 20, {
  min: 1,
  integer: true,
});
export const DEFAULT_FEED_URLS: readonly string[] = [
  'https://www.ansa.it/sito/ansait_rss.xml',
  'https://www.repubblica.it/rss.xml',
];

export const ARTICLES_PER_FEED = readNumber('ARTICLES_PER_FEED', 10, {
  min: 1,
  integer: true,
});
export const REQUEST_TIMEOUT_SEC = readNumber('REQUEST_TIMEOUT_SEC', 10, {
  min: 1,
});
export const FEED_COOLDOWN_SEC = readNumber('FEED_COOLDOWN_SEC', 300, {
  min: 0,
});
export const MAX_CONCURRENCY = readNumber('MAX_CONCURRENCY', 3, {
  min: 1,
  integer: true,
});
export const TITLE_MAX_CHARS = readNumber('TITLE_MAX_CHARS', 200, {
  min: 1,
  integer: true,
});

export const CHECK_INTERVAL_SEC = readNumber('CHECK_INTERVAL_SEC', 3600, {
  min: 1,
});
export const MIN_SLEEP_SEC = readNumber('MIN_SLEEP_SEC', 60, { min: 0 });
export const PUBLISH_INTERVAL_SEC = readNumber('PUBLISH_INTERVAL_SEC', 21600, {
  min: 60,
});
export const PUBLISH_MAX_ENTRIES = readNumber('PUBLISH_MAX_ENTRIES', 100, {
  min: 1,
  integer: true,
});

export const SYNC_ENABLED = process.env.SYNC_ENABLED !== '0';
export const SYNC_REPO_PATH = readString(
  'SYNC_REPO_PATH',
  path.join(dataDir, 'mirror'),
);
export const OUTPUT_DIR = readString(
  'OUTPUT_DIR',
  path.join(SYNC_REPO_PATH, 'categorized_feeds'),
);
export const SYNC_REMOTE_URL = (process.env.SYNC_REMOTE_URL ?? '').trim();
export const SYNC_SSH_KEY_PATH = (process.env.SYNC_SSH_KEY_PATH ?? '').trim();
export const GIT_USER_NAME = readString('GIT_USER_NAME', SERVICE_NAME);
export const GIT_USER_EMAIL = readString(
  'GIT_USER_EMAIL',
  `${SERVICE_NAME}@localhost`,
);

export const PORT = readNumber('PORT', 3000, { min: 0, integer: true });
export const LOG_LEVEL = readString('LOG_LEVEL', 'log').toLowerCase();
