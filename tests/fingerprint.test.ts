import { decode } from '../src/parser';
import { compareFingerprints, ecPointFormats, extensionTypes, fingerprint, ja3String } from '../src/fingerprint';
import { body, bytes, ext, fullHandshake, handshake, minimalHandshake, sniExt, u16ListExt } from './helpers';

describe('JA3 fingerprinting', () => {
  it('fingerprints the full hello with GREASE removed', () => {
    const fp = fingerprint(decode(bytes(fullHandshake())));
    expect(fp.ja3).toBe('771,4865-4866-4867,0-16-43-10-13-51-45-65281-66,29-23,');
    expect(fp.ja3Hash).toBe('3c22fcf53101e98780917a2e1037cb8c');
    expect(fp.extensionTypes).toEqual([0, 16, 43, 10, 13, 51, 45, 65281, 66]);
    expect(fp.extOrderSha256).toBe('1c9ac63fbad33e88e091a6d91e77312a295441490b6a5dd7a2f7183d44f29eb7');
    expect(fp.alpn).toEqual(['h2', 'http/1.1']);
  });

  it('leaves empty fields for a hello without extensions', () => {
    const fp = fingerprint(decode(bytes(minimalHandshake())));
    expect(fp.ja3).toBe('771,4865,,,');
    expect(fp.ja3Hash).toBe('ea1e247991e541e39bf918cb7cfa5139');
    expect(fp.extOrderSha256).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('reads EC point formats and skips GREASE extension types', () => {
    const hello = decode(bytes(handshake(body({
      extensions: [
        ext(0x0a0a, []),
        sniExt('a.test'),
        ext(0x000b, [0x02, 0x00, 0x01]),
        u16ListExt(0x000a, [0x001d])
      ]
    }))));
    expect(extensionTypes(hello)).toEqual([0, 11, 10]);
    expect(ecPointFormats(hello)).toEqual([0, 1]);
    expect(ja3String(hello)).toBe('771,4865,0-11-10,29,0-1');
    expect(fingerprint(hello).ja3Hash).toBe('60ec9e504279413f97e095ca409a5235');
  });

  it('reads only the point formats actually present', () => {
    const short = decode(bytes(handshake(body({ extensions: [ext(0x000b, [0x05, 0x00])] }))));
    expect(ecPointFormats(short)).toEqual([0]);
    const empty = decode(bytes(handshake(body({ extensions: [ext(0x000b, [])] }))));
    expect(ecPointFormats(empty)).toEqual([]);
  });
});

describe('compareFingerprints', () => {
  const base = fingerprint(decode(bytes(fullHandshake())));

  it('matches identical fingerprints', () => {
    expect(compareFingerprints(base, { ...base })).toEqual({ match: true });
  });

  it('reports ALPN order changes', () => {
    const observed = { ...base, alpn: ['http/1.1', 'h2'] };
    expect(compareFingerprints(base, observed)).toEqual({ match: false, mismatchReason: 'ALPN_ORDER_MISMATCH' });
  });

  it('reports ALPN set changes', () => {
    const observed = { ...base, alpn: ['h2'] };
    expect(compareFingerprints(base, observed)).toEqual({ match: false, mismatchReason: 'ALPN_SET_DIFF' });
  });

  it('reports extension sequence changes', () => {
    const observed = { ...base, extOrderSha256: 'cafebabe' };
    expect(compareFingerprints(base, observed)).toEqual({ match: false, mismatchReason: 'EXT_SEQUENCE_MISMATCH' });
  });

  it('falls back to the JA3 string', () => {
    const observed = { ...base, ja3: '771,4865,,,' };
    expect(compareFingerprints(base, observed)).toEqual({ match: false, mismatchReason: 'JA3_MISMATCH' });
  });
});
