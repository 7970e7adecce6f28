import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import { CACHE_FILE, CACHE_TTL_SEC } from '../config/feeds.constants';
import { CacheError, CacheRecord, Result } from '../types/feeds.types';
import { ExclusiveLock } from '../utils/concurrency.util';
import { nowSeconds } from '../utils/date.util';
import { writeFileAtomic } from '../utils/fs.util';
import { err, errorMessage, ok } from '../utils/result.util';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCacheRecord(value: unknown): value is CacheRecord {
  return (
    isPlainObject(value) &&
    typeof value.timestamp === 'number' &&
    Number.isFinite(value.timestamp) &&
    typeof value.category === 'string' &&
    typeof value.title === 'string' &&
    typeof value.link === 'string'
  );
}

/**
 * Fingerprint → CacheRecord map persisted as one JSON document.
 *
 * Expired records are dropped only by `load()`; within a run the map only grows.
 * Callers that check-then-insert from concurrent workers wrap the sequence in
 * `runExclusive`.
 */
@Injectable()
export class FeedCacheService implements OnModuleInit {
  private readonly logger = new Logger(FeedCacheService.name);
  private readonly lock = new ExclusiveLock();
  private records = new Map<string, CacheRecord>();

  private readonly filePath = CACHE_FILE;
  private readonly ttlSec = CACHE_TTL_SEC;

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  async load(): Promise<Result<number, CacheError>> {
    const now = nowSeconds();
    const parsed = await this.readStore();
    if (!parsed.ok) {
      this.records = new Map();
      if (parsed.error.kind === 'missing') {
        this.logger.log(`cache store not found, starting empty: ${this.filePath}`);
      } else {
        this.logger.warn(
          `cache load failed, starting empty: kind=${parsed.error.kind} ${parsed.error.message}`,
        );
      }
      return parsed;
    }

    const fresh = new Map<string, CacheRecord>();
    let expired = 0;
    let invalid = 0;
    for (const [fingerprint, value] of Object.entries(parsed.value)) {
      if (!isCacheRecord(value)) {
        invalid += 1;
        continue;
      }
      if (now - value.timestamp > this.ttlSec) {
        expired += 1;
        continue;
      }
      fresh.set(fingerprint, value);
    }
    this.records = fresh;
    this.logger.log(
      `cache loaded: records=${fresh.size} expired=${expired} invalid=${invalid}`,
    );
    return ok(fresh.size);
  }

  contains(fingerprint: string): boolean {
    return this.records.has(fingerprint);
  }

  get(fingerprint: string): CacheRecord | undefined {
    return this.records.get(fingerprint);
  }

  insert(fingerprint: string, record: CacheRecord): void {
    this.records.set(fingerprint, { ...record });
  }

  values(): CacheRecord[] {
    return Array.from(this.records.values(), (record) => ({ ...record }));
  }

  size(): number {
    return this.records.size;
  }

  countByCategory(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const record of this.records.values()) {
      counts[record.category] = (counts[record.category] ?? 0) + 1;
    }
    return counts;
  }

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    return this.lock.runExclusive(task);
  }

  async save(): Promise<Result<void, CacheError>> {
    const payload = Object.fromEntries(this.records);
    try {
      await writeFileAtomic(
        this.filePath,
        `${JSON.stringify(payload, null, 2)}\n`,
      );
      this.logger.debug(`cache saved: records=${this.records.size}`);
      return ok(undefined);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`cache save failed, keeping in-memory state: ${message}`);
      return err({ kind: 'io', message });
    }
  }

  private async readStore(): Promise<
    Result<Record<string, unknown>, CacheError>
  > {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      const code =
        error instanceof Error && 'code' in error ? error.code : undefined;
      return err({
        kind: code === 'ENOENT' ? 'missing' : 'io',
        message: errorMessage(error),
      });
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (!isPlainObject(parsed)) {
        return err({ kind: 'corrupt', message: 'cache store is not an object' });
      }
      return ok(parsed);
    } catch (error) {
      return err({ kind: 'corrupt', message: errorMessage(error) });
    }
  }
}
