import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { FeedListError, Result } from '../types/feeds.types';
import { err, ok } from './result.util';
import { escapeXml } from './text.util';

export interface OpmlOutline {
  text: string;
  title: string;
  xmlUrl: string;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  isArray: (name) => name === 'outline',
});

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function collectFeedUrls(node: unknown, out: string[]): void {
  if (Array.isArray(node)) {
    node.forEach((child) => collectFeedUrls(child, out));
    return;
  }
  if (!isObject(node)) {
    return;
  }
  const xmlUrl = node['@_xmlUrl'];
  if (typeof xmlUrl === 'string' && xmlUrl.trim()) {
    out.push(xmlUrl.trim());
  }
  collectFeedUrls(node.outline, out);
}

/**
 * Feed URLs of every `<outline xmlUrl>` in document order, nested groups
 * included. A URL listed under several groups is kept at its first position.
 */
export function parseOpmlFeedUrls(xml: string): Result<string[], FeedListError> {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    return err({
      kind: 'parse',
      message: `${validation.err.msg} (line ${validation.err.line})`,
    });
  }

  const doc: unknown = parser.parse(xml);
  const opml = isObject(doc) ? doc.opml : undefined;
  const body = isObject(opml) ? opml.body : undefined;
  if (!isObject(body)) {
    return err({ kind: 'parse', message: 'missing opml body' });
  }

  const urls: string[] = [];
  collectFeedUrls(body.outline, urls);
  if (urls.length === 0) {
    return err({ kind: 'empty', message: 'no outline with xmlUrl' });
  }
  return ok([...new Set(urls)]);
}

export function buildOpmlDocument(
  title: string,
  outlines: readonly OpmlOutline[],
): string {
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<opml version="1.0">',
    '<head>',
    `<title>${escapeXml(title)}</title>`,
    '</head>',
    '<body>',
    ...outlines.map(
      (outline) =>
        `<outline type="rss" text="${escapeXml(outline.text)}" title="${escapeXml(outline.title)}" xmlUrl="${escapeXml(outline.xmlUrl)}"/>`,
    ),
    '</body>',
    '</opml>',
  ];
  return `${lines.join('\n')}\n`;
}
