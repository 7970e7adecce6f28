const WS_RE = /\s+/g;
const TAG_RE = /<[^>]+>/g;
const LINE_BREAK_RE = /[\n\r\t]+/g;
const MATCH_NOISE_RE = /<[^>]+>|http\S+|[^\p{L}\p{N}_\s]/gu;

const ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
  '&agrave;': 'à',
  '&Agrave;': 'À',
  '&egrave;': 'è',
  '&Egrave;': 'È',
  '&eacute;': 'é',
  '&Eacute;': 'É',
  '&igrave;': 'ì',
  '&ograve;': 'ò',
  '&ugrave;': 'ù',
  '&laquo;': '«',
  '&raquo;': '»',
  '&lsquo;': '\u2018',
  '&rsquo;': '\u2019',
  '&ldquo;': '\u201c',
  '&rdquo;': '\u201d',
  '&ndash;': '\u2013',
  '&mdash;': '\u2014',
  '&hellip;': '\u2026',
  '&euro;': '\u20ac',
};

export function decodeHtmlEntities(value: string): string {
  if (!value) {
    return '';
  }
  return value
    .replace(/&(#39|[A-Za-z]+);/g, (match) => {
      return ENTITY_MAP[match] ?? match;
    })
    .replace(/&#(\d+|[xX][0-9a-fA-F]+);/g, (match, code: string) => {
      const parsed = /^x/i.test(code)
        ? Number.parseInt(code.slice(1), 16)
        : Number(code);
      return Number.isInteger(parsed) && parsed <= 0x10ffff
        ? String.fromCodePoint(parsed)
        : match;
    });
}

export function stripCdata(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(/^\s*<!\[CDATA\[([\s\S]*?)\]\]>\s*$/i, '$1');
}

export function cleanText(value: string): string {
  if (!value) {
    return '';
  }
  // Entities are decoded twice: feeds often escape markup that itself contains entities.
  const decoded = decodeHtmlEntities(stripCdata(value));
  return decodeHtmlEntities(decoded.replace(TAG_RE, ' '))
    .replace(TAG_RE, ' ')
    .replace(WS_RE, ' ')
    .trim();
}

/**
 * Lowercased, punctuation-free form used for keyword matching and fingerprints.
 * Markup, URLs and every non-word character become spaces.
 */
export function normalizeForMatching(value: string): string {
  if (!value) {
    return '';
  }
  return value
    .replace(LINE_BREAK_RE, ' ')
    .replace(MATCH_NOISE_RE, ' ')
    .replace(WS_RE, ' ')
    .toLowerCase()
    .trim();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function truncate(value: string, maxChars: number): string {
  const chars = Array.from(value);
  return chars.length > maxChars ? chars.slice(0, maxChars).join('') : value;
}

export function describeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `host=${parsed.hostname} path=${parsed.pathname.slice(0, 48)}`;
  } catch {
    return `url=${url.slice(0, 80)}`;
  }
}
