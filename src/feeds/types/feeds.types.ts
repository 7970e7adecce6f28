export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface FeedEntry {
  title: string;
  description: string;
  link: string;
  feedUrl: string;
}

export interface CacheRecord {
  /** Epoch seconds, set once at insertion. */
  timestamp: number;
  category: string;
  title: string;
  link: string;
}

export interface KeywordRule {
  terms: readonly string[];
  weight: number;
}

export interface CategoryRule {
  label: string;
  keywords: readonly KeywordRule[];
  exclude?: readonly string[];
  threshold: number;
}

export interface CategoryScores {
  scores: Record<string, number>;
  excluded: string[];
  qualifying: string[];
}

export interface FeedHealth {
  lastFetchedAt?: number;
  coolDownUntil?: number;
}

export type FetchErrorKind = 'http_status' | 'network' | 'timeout' | 'parse';

export interface FetchError {
  kind: FetchErrorKind;
  message: string;
  status?: number;
}

export type FetchOutcome =
  | { status: 'fetched'; entries: FeedEntry[] }
  | { status: 'not_modified' };

export interface CacheError {
  kind: 'missing' | 'corrupt' | 'io';
  message: string;
}

export interface FeedListError {
  kind: 'remote' | 'parse' | 'empty';
  message: string;
}

export interface PublishError {
  category: string;
  message: string;
}

export interface SyncError {
  kind: 'disabled' | 'setup' | 'command';
  message: string;
}

export interface PublishedDocument {
  category: string;
  path: string;
  entries: number;
}

export interface CycleReport {
  startedAt: string;
  feeds: number;
  fetched: number;
  classified: number;
  skipped: number;
  elapsedMs: number;
  published: boolean;
}

export interface PipelineStatus {
  cacheSize: number;
  categories: Record<string, number>;
  feeds: string[];
  lastCycle: CycleReport | null;
}
