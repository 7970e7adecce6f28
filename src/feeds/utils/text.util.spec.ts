import {
  cleanText,
  decodeHtmlEntities,
  describeUrl,
  escapeXml,
  normalizeForMatching,
  truncate,
} from './text.util';

describe('text util', () => {
  it('unwraps CDATA and decodes double-escaped markup', () => {
    expect(cleanText('<![CDATA[<p>Roma &amp;amp; Milano</p>]]>')).toBe(
      'Roma & Milano',
    );
  });

  it('decodes numeric entities within the unicode range only', () => {
    expect(decodeHtmlEntities('l&#8217;Italia')).toBe('l’Italia');
    expect(decodeHtmlEntities('&#1114112;')).toBe('&#1114112;');
  });

  it('decodes hex and accented named entities', () => {
    expect(decodeHtmlEntities('l&#x2019;Italia, citt&agrave; perch&eacute;')).toBe(
      'l\u2019Italia, città perché',
    );
    expect(decodeHtmlEntities('&#x110000; &bogus;')).toBe('&#x110000; &bogus;');
  });

  it('normalizes markup, urls and punctuation away for matching', () => {
    expect(
      normalizeForMatching('Il Senato, oggi: <b>ok</b> https://x.it/a?b=1 U.S.A.!'),
    ).toBe('il senato oggi ok u s a');
    expect(normalizeForMatching('Perché\nè così')).toBe('perché è così');
  });

  it('escapes xml attribute characters', () => {
    expect(escapeXml(`a&b<"c">'`)).toBe('a&amp;b&lt;&quot;c&quot;&gt;&apos;');
  });

  it('truncates by characters rather than code units', () => {
    expect(truncate('àèìòù', 3)).toBe('àèì');
    expect(truncate('abc', 5)).toBe('abc');
  });

  it('describes urls for log lines', () => {
    expect(describeUrl('https://example.com/rss/feed.xml')).toBe(
      'host=example.com path=/rss/feed.xml',
    );
    expect(describeUrl('not a url')).toBe('url=not a url');
  });
});
