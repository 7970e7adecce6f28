import { computeFingerprint } from './fingerprint.util';

describe('computeFingerprint', () => {
  it('ignores case, punctuation and the link when the text has words', () => {
    expect(
      computeFingerprint('Il Senato approva!', 'Roma.', 'https://example.com/a'),
    ).toBe(computeFingerprint('il senato approva', 'roma', 'https://example.com/b'));
  });

  it('keys entries without matchable text by their link', () => {
    const first = computeFingerprint('🔥🔥', '', 'https://example.com/a');
    const second = computeFingerprint('https://example.com/b', '', 'https://example.com/b');

    expect(first).not.toBe(second);
    expect(first).toBe(computeFingerprint('✨', '!!', 'https://example.com/a'));
    expect(first).toMatch(/^[0-9a-f]{64}$/);
  });
});
