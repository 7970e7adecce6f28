import { Injectable, Logger } from '@nestjs/common';
import {
  ARTICLES_PER_FEED,
  FEED_COOLDOWN_SEC,
  REQUEST_TIMEOUT_SEC,
  SERVICE_NAME,
  SERVICE_VERSION,
} from '../config/feeds.constants';
import {
  FeedEntry,
  FeedHealth,
  FetchError,
  FetchOutcome,
  Result,
} from '../types/feeds.types';
import { formatHttpDate } from '../utils/date.util';
import { err, errorMessage, ok } from '../utils/result.util';
import { cleanText, describeUrl, escapeRegExp } from '../utils/text.util';

const FEED_ROOT_RE = /<(?:rss|rdf:RDF|feed)\b/i;
const ITEM_RE = /<(item|entry)\b[\s\S]*?<\/\1>/gi;
const ATOM_LINK_RE = /<link\b([^>]*?)\/?>/gi;

@Injectable()
export class RssFeedService {
  private readonly logger = new Logger(RssFeedService.name);
  private readonly health = new Map<string, FeedHealth>();

  async fetch(url: string): Promise<FeedEntry[]> {
    const state = this.health.get(url) ?? {};
    if (state.coolDownUntil !== undefined && state.coolDownUntil > Date.now()) {
      this.logger.debug(
        `rss fetch skipped (cooling down): untilMs=${state.coolDownUntil} ${describeUrl(url)}`,
      );
      return [];
    }

    const startedAt = Date.now();
    const result = await this.fetchOnce(url, state.lastFetchedAt);

    if (!result.ok) {
      const coolDownUntil = Date.now() + FEED_COOLDOWN_SEC * 1000;
      this.health.set(url, { lastFetchedAt: state.lastFetchedAt, coolDownUntil });
      this.logger.warn(
        `rss fetch error: kind=${result.error.kind} ${result.error.message} cooldownSec=${FEED_COOLDOWN_SEC} ${url}`,
      );
      return [];
    }

    if (result.value.status === 'not_modified') {
      this.health.set(url, { lastFetchedAt: state.lastFetchedAt });
      this.logger.debug(`rss not modified: ${describeUrl(url)}`);
      return [];
    }

    const entries = result.value.entries;
    this.health.set(url, { lastFetchedAt: Date.now() });
    this.logger.log(
      `rss fetch done: items=${entries.length} elapsedMs=${Date.now() - startedAt} ${describeUrl(url)}`,
    );
    return entries;
  }

  getHealth(url: string): FeedHealth {
    return { ...(this.health.get(url) ?? {}) };
  }

  private async fetchOnce(
    url: string,
    lastFetchedAt?: number,
  ): Promise<Result<FetchOutcome, FetchError>> {
    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(),
      REQUEST_TIMEOUT_SEC * 1000,
    );
    const headers: Record<string, string> = {
      'User-Agent': `${SERVICE_NAME}/${SERVICE_VERSION}`,
      Accept:
        'application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8',
    };
    if (lastFetchedAt !== undefined) {
      headers['If-Modified-Since'] = formatHttpDate(lastFetchedAt);
    }

    try {
      const res = await fetch(url, { headers, signal: controller.signal });

      if (res.status === 304) {
        return ok({ status: 'not_modified' });
      }
      if (!res.ok) {
        return err({
          kind: 'http_status',
          status: res.status,
          message: `status=${res.status}`,
        });
      }

      const xml = await res.text();
      const parsed = this.parseFeed(xml, url);
      if (!parsed.ok) {
        return parsed;
      }
      return ok({
        status: 'fetched',
        entries: parsed.value.slice(0, ARTICLES_PER_FEED),
      });
    } catch (error) {
      if (controller.signal.aborted) {
        return err({
          kind: 'timeout',
          message: `timeoutSec=${REQUEST_TIMEOUT_SEC}`,
        });
      }
      return err({ kind: 'network', message: errorMessage(error) });
    } finally {
      clearTimeout(timeout);
    }
  }

  private parseFeed(xml: string, feedUrl: string): Result<FeedEntry[], FetchError> {
    if (!FEED_ROOT_RE.test(xml)) {
      return err({ kind: 'parse', message: 'no rss, rdf or atom root element' });
    }

    const items = xml.match(ITEM_RE) ?? [];
    const entries = items
      .map((itemXml) => ({
        title: this.extractTag(itemXml, 'title'),
        description:
          this.extractTag(itemXml, 'description') ||
          this.extractTag(itemXml, 'summary') ||
          this.extractTag(itemXml, 'content') ||
          this.extractTag(itemXml, 'content:encoded'),
        link: this.extractTag(itemXml, 'link') || this.extractAtomLink(itemXml),
        feedUrl,
      }))
      .filter((entry) => entry.title || entry.description);
    return ok(entries);
  }

  private extractTag(xml: string, tagName: string): string {
    const escapedTag = escapeRegExp(tagName);
    const regex = new RegExp(
      `<${escapedTag}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${escapedTag}>`,
      'i',
    );
    const match = xml.match(regex);
    if (!match?.[1]) {
      return '';
    }
    return cleanText(match[1]);
  }

  private extractAtomLink(xml: string): string {
    let fallback = '';
    for (const match of xml.matchAll(ATOM_LINK_RE)) {
      const attrs = match[1] ?? '';
      const href = /\bhref\s*=\s*["']([^"']+)["']/i.exec(attrs)?.[1];
      if (!href) {
        continue;
      }
      const rel = /\brel\s*=\s*["']([^"']+)["']/i.exec(attrs)?.[1];
      if (!rel || rel === 'alternate') {
        return cleanText(href);
      }
      fallback = fallback || cleanText(href);
    }
    return fallback;
  }
}
