import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import {
  DEFAULT_FEED_URLS,
  FEED_LIMIT,
  FEED_LIST_PATH,
  FEED_LIST_REFRESH_SEC,
  FEED_LIST_URL,
  REQUEST_TIMEOUT_SEC,
} from '../config/feeds.constants';
import { FeedListError, Result } from '../types/feeds.types';
import { writeFileAtomic } from '../utils/fs.util';
import { buildOpmlDocument, parseOpmlFeedUrls } from '../utils/opml.util';
import { err, errorMessage, ok } from '../utils/result.util';

@Injectable()
export class FeedListService {
  private readonly logger = new Logger(FeedListService.name);
  private feeds: string[] = [];
  private lastRefreshAt = 0;

  /** Current feed list; refreshed when empty or older than the refresh interval. */
  async getFeedUrls(): Promise<string[]> {
    const stale = Date.now() - this.lastRefreshAt > FEED_LIST_REFRESH_SEC * 1000;
    if (this.feeds.length === 0 || stale) {
      await this.refresh();
    }
    return [...this.feeds];
  }

  currentFeeds(): string[] {
    return [...this.feeds];
  }

  async refresh(): Promise<string[]> {
    const remote = await this.downloadRemote();
    if (remote.ok) {
      this.logger.log(`feed list updated from remote: feeds=${remote.value}`);
    } else {
      this.logger.warn(
        `feed list remote unavailable, using local file: ${remote.error.message}`,
      );
      await this.ensureLocalFile();
    }

    const local = await this.readLocal();
    if (local.ok) {
      this.feeds = local.value.slice(0, FEED_LIMIT);
    } else {
      this.logger.error(
        `feed list parse error, using defaults: kind=${local.error.kind} ${local.error.message}`,
      );
      this.feeds = [...DEFAULT_FEED_URLS];
    }
    this.lastRefreshAt = Date.now();
    this.logger.log(`feed list ready: feeds=${this.feeds.length}`);
    return [...this.feeds];
  }

  private async downloadRemote(): Promise<Result<number, FeedListError>> {
    if (!FEED_LIST_URL) {
      return err({ kind: 'remote', message: 'FEED_LIST_URL not set' });
    }

    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(),
      REQUEST_TIMEOUT_SEC * 1000,
    );
    try {
      const res = await fetch(FEED_LIST_URL, { signal: controller.signal });
      if (!res.ok) {
        return err({ kind: 'remote', message: `status=${res.status}` });
      }
      const xml = await res.text();
      const parsed = parseOpmlFeedUrls(xml);
      if (!parsed.ok) {
        return parsed;
      }
      await writeFileAtomic(FEED_LIST_PATH, xml);
      return ok(parsed.value.length);
    } catch (error) {
      return err({ kind: 'remote', message: errorMessage(error) });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async ensureLocalFile(): Promise<void> {
    const exists = await fs.access(FEED_LIST_PATH).then(
      () => true,
      () => false,
    );
    if (exists) {
      return;
    }

    const document = buildOpmlDocument(
      'Default feeds',
      DEFAULT_FEED_URLS.map((url) => {
        const host = new URL(url).hostname;
        return { text: host, title: host, xmlUrl: url };
      }),
    );
    try {
      await writeFileAtomic(FEED_LIST_PATH, document);
      this.logger.log(`default feed list written: ${FEED_LIST_PATH}`);
    } catch (error) {
      this.logger.warn(`default feed list write failed: ${errorMessage(error)}`);
    }
  }

  private async readLocal(): Promise<Result<string[], FeedListError>> {
    try {
      const xml = await fs.readFile(FEED_LIST_PATH, 'utf-8');
      return parseOpmlFeedUrls(xml);
    } catch (error) {
      return err({ kind: 'parse', message: errorMessage(error) });
    }
  }
}
