import { Inject, Injectable, Logger } from '@nestjs/common';
import path from 'node:path';
import { CATEGORY_RULES } from '../config/category-rules';
import { OUTPUT_DIR, PUBLISH_MAX_ENTRIES } from '../config/feeds.constants';
import {
  CacheRecord,
  CategoryRule,
  PublishError,
  PublishedDocument,
  Result,
} from '../types/feeds.types';
import { writeFileAtomic } from '../utils/fs.util';
import { buildOpmlDocument } from '../utils/opml.util';
import { err, errorMessage, ok } from '../utils/result.util';

@Injectable()
export class OpmlPublisherService {
  private readonly logger = new Logger(OpmlPublisherService.name);
  private readonly categories: string[];

  constructor(@Inject(CATEGORY_RULES) rules: readonly CategoryRule[]) {
    this.categories = rules.map((rule) => rule.label);
  }

  static fileNameFor(category: string): string {
    const slug = category
      .toLowerCase()
      .replace(/[^\p{L}\p{N}_-]+/gu, '_')
      .replace(/^_+|_+$/g, '');
    return `${slug || 'category'}_feeds.opml`;
  }

  /** Newest records of `category` first, capped at the per-document limit. */
  static selectEntries(
    category: string,
    records: readonly CacheRecord[],
  ): CacheRecord[] {
    return records
      .filter((record) => record.category === category)
      .sort((a, b) => b.timestamp - a.timestamp)
      .slice(0, PUBLISH_MAX_ENTRIES);
  }

  async publishAll(
    records: readonly CacheRecord[],
  ): Promise<Result<PublishedDocument, PublishError>[]> {
    const results: Result<PublishedDocument, PublishError>[] = [];
    for (const category of this.categories) {
      results.push(
        await this.publish(
          category,
          OpmlPublisherService.selectEntries(category, records),
        ),
      );
    }
    const failed = results.filter((result) => !result.ok).length;
    this.logger.log(
      `publish done: documents=${results.length - failed} failed=${failed} dir=${OUTPUT_DIR}`,
    );
    return results;
  }

  async publish(
    category: string,
    entries: readonly CacheRecord[],
  ): Promise<Result<PublishedDocument, PublishError>> {
    const capped = entries.slice(0, PUBLISH_MAX_ENTRIES);
    const filePath = path.join(
      OUTPUT_DIR,
      OpmlPublisherService.fileNameFor(category),
    );
    const document = buildOpmlDocument(
      `${category} Feed`,
      capped.map((entry) => ({
        text: entry.title,
        title: entry.title,
        xmlUrl: entry.link,
      })),
    );

    try {
      await writeFileAtomic(filePath, document);
      return ok({ category, path: filePath, entries: capped.length });
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`opml generation error: category=${category} ${message}`);
      return err({ category, message });
    }
  }
}
