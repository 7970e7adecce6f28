import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import {
  CHECK_INTERVAL_SEC,
  MAX_CONCURRENCY,
  MIN_SLEEP_SEC,
  PUBLISH_INTERVAL_SEC,
  TITLE_MAX_CHARS,
} from '../config/feeds.constants';
import { CycleReport, FeedEntry, PipelineStatus } from '../types/feeds.types';
import { mapWithConcurrency } from '../utils/concurrency.util';
import { nowSeconds } from '../utils/date.util';
import { computeFingerprint } from '../utils/fingerprint.util';
import { truncate } from '../utils/text.util';
import { FeedCacheService } from './feed-cache.service';
import { FeedClassifierService } from './feed-classifier.service';
import { FeedListService } from './feed-list.service';
import { GitSyncService } from './git-sync.service';
import { OpmlPublisherService } from './opml-publisher.service';
import { RssFeedService } from './rss-feed.service';

export function computeSleepMs(elapsedMs: number): number {
  return Math.max(CHECK_INTERVAL_SEC * 1000 - elapsedMs, MIN_SLEEP_SEC * 1000);
}

/**
 * Drives the fetch → classify → persist → publish cycle.
 *
 * `run()` loops until `stop()` (or application shutdown) and rejects on any
 * error the collaborators did not absorb themselves; the caller treats that
 * as fatal.
 */
@Injectable()
export class FeedPipelineService implements OnApplicationShutdown {
  private readonly logger = new Logger(FeedPipelineService.name);
  private readonly pending = new Set<string>();
  private running = false;
  private stopRequested = false;
  private lastPublishAt = Date.now();
  private lastCycle: CycleReport | null = null;
  private wake: (() => void) | null = null;
  private stopped: Promise<void> = Promise.resolve();

  constructor(
    private readonly feedListService: FeedListService,
    private readonly rssFeedService: RssFeedService,
    private readonly classifier: FeedClassifierService,
    private readonly cacheService: FeedCacheService,
    private readonly publisher: OpmlPublisherService,
    private readonly gitSyncService: GitSyncService,
  ) {}

  async run(): Promise<void> {
    if (this.running) {
      throw new Error('pipeline already running');
    }
    this.running = true;
    this.stopRequested = false;
    this.lastPublishAt = Date.now();
    let markStopped: () => void = () => undefined;
    this.stopped = new Promise<void>((resolve) => {
      markStopped = resolve;
    });

    this.logger.log(
      `pipeline start: intervalSec=${CHECK_INTERVAL_SEC} publishIntervalSec=${PUBLISH_INTERVAL_SEC} concurrency=${MAX_CONCURRENCY}`,
    );
    try {
      while (!this.stopRequested) {
        const report = await this.runCycle();
        if (this.stopRequested) {
          break;
        }
        const sleepMs = computeSleepMs(report.elapsedMs);
        this.logger.debug(
          `cycle elapsedMs=${report.elapsedMs} sleeping ms=${sleepMs}`,
        );
        await this.sleep(sleepMs);
      }
    } finally {
      this.running = false;
      markStopped();
    }
  }

  stop(): void {
    this.stopRequested = true;
    this.wake?.();
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    if (!this.running) {
      return;
    }
    this.logger.log(
      `shutdown requested: signal=${signal ?? 'none'}, waiting for the current cycle`,
    );
    this.stop();
    await this.stopped;
    this.logger.log('final publish attempt');
    await this.publishAndSync();
    this.logger.log('pipeline stopped');
  }

  async runCycle(): Promise<CycleReport> {
    const startedAt = Date.now();
    const feeds = await this.feedListService.getFeedUrls();
    this.logger.debug(`stage fetch start: feeds=${feeds.length}`);

    const entries: FeedEntry[] = [];
    await mapWithConcurrency(
      feeds,
      MAX_CONCURRENCY,
      (url) => this.rssFeedService.fetch(url),
      (fetched, url) => {
        this.logger.debug(`feed returned items=${fetched.length} url=${url}`);
        entries.push(...fetched);
      },
    );

    const outcomes = await mapWithConcurrency(
      entries,
      MAX_CONCURRENCY,
      (entry) => this.processEntry(entry),
    );
    const classified = outcomes.filter((category) => category !== null).length;
    await this.cacheService.save();

    let published = false;
    if (Date.now() - this.lastPublishAt > PUBLISH_INTERVAL_SEC * 1000) {
      await this.publishAndSync();
      published = true;
    }

    const report: CycleReport = {
      startedAt: new Date(startedAt).toISOString(),
      feeds: feeds.length,
      fetched: entries.length,
      classified,
      skipped: entries.length - classified,
      elapsedMs: Date.now() - startedAt,
      published,
    };
    this.lastCycle = report;
    this.logger.log(
      `cycle done: feeds=${report.feeds} fetched=${report.fetched} classified=${report.classified} skipped=${report.skipped} elapsedMs=${report.elapsedMs} published=${published ? 1 : 0}`,
    );
    return report;
  }

  /** Classifies an unseen entry and caches it; returns null for duplicates. */
  async processEntry(entry: FeedEntry): Promise<string | null> {
    const fingerprint = computeFingerprint(
      entry.title,
      entry.description,
      entry.link,
    );
    const claimed = await this.cacheService.runExclusive(() => {
      if (
        this.cacheService.contains(fingerprint) ||
        this.pending.has(fingerprint)
      ) {
        return false;
      }
      this.pending.add(fingerprint);
      return true;
    });
    if (!claimed) {
      return null;
    }

    try {
      const category = this.classifier.classify(
        `${entry.title} ${entry.description}`,
      );
      await this.cacheService.runExclusive(() => {
        this.cacheService.insert(fingerprint, {
          timestamp: nowSeconds(),
          category,
          title: truncate(entry.title, TITLE_MAX_CHARS),
          link: entry.link,
        });
      });
      this.logger.verbose(`entry classified: category=${category} link=${entry.link}`);
      return category;
    } finally {
      this.pending.delete(fingerprint);
    }
  }

  async publishAndSync(): Promise<void> {
    const documents = await this.publisher.publishAll(this.cacheService.values());
    const written = documents.filter((result) => result.ok).length;
    const sync = await this.gitSyncService.sync();
    this.lastPublishAt = Date.now();
    this.logger.log(
      `publish cycle done: documents=${written}/${documents.length} synced=${sync.ok ? 1 : 0}`,
    );
  }

  getStatus(): PipelineStatus {
    return {
      cacheSize: this.cacheService.size(),
      categories: this.cacheService.countByCategory(),
      feeds: this.feedListService.currentFeeds(),
      lastCycle: this.lastCycle,
    };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
