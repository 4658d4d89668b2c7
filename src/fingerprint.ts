import * as crypto from 'crypto';
import { Cursor } from './cursor';
import { ClientHello } from './client-hello';
import { isGrease } from './grease';
import { EXT_EC_POINT_FORMATS } from './constants';

export interface ClientHelloFingerprint {
  ja3: string;
  ja3Hash: string;
  extensionTypes: number[];
  extOrderSha256: string;
  alpn: string[];
}

export type FingerprintMismatch =
  | 'ALPN_ORDER_MISMATCH'
  | 'ALPN_SET_DIFF'
  | 'EXT_SEQUENCE_MISMATCH'
  | 'JA3_MISMATCH';

export interface FingerprintComparison {
  match: boolean;
  mismatchReason?: FingerprintMismatch;
}

// Extension types in wire order with GREASE ids dropped (JA3 convention)
export function extensionTypes(hello: ClientHello): number[] {
  return hello.extensions.map(e => e.type).filter(t => !isGrease(t));
}

// ec_point_formats is not decoded structurally; read its 1-byte list from the raw body.
// A short body yields whatever bytes are actually there.
export function ecPointFormats(hello: ClientHello): number[] {
  const body = hello.findExtension(EXT_EC_POINT_FORMATS);
  if (!body || body.length < 1) return [];
  const r = new Cursor(body);
  const len = r.readU8('EC point formats length');
  return Array.from(r.readBytes(Math.min(len, r.remaining()), 'EC point formats'));
}

// JA3 canonical: SSLVersion,CipherSuites,Extensions,EllipticCurves,EllipticCurvePointFormats
export function ja3String(hello: ClientHello): string {
  return [
    hello.legacyVersion,
    hello.cipherSuites.join('-'),
    extensionTypes(hello).join('-'),
    hello.supportedGroups().join('-'),
    ecPointFormats(hello).join('-')
  ].join(',');
}

export function fingerprint(hello: ClientHello): ClientHelloFingerprint {
  const ja3 = ja3String(hello);
  const types = extensionTypes(hello);
  return {
    ja3,
    ja3Hash: crypto.createHash('md5').update(ja3).digest('hex'),
    extensionTypes: types,
    extOrderSha256: crypto.createHash('sha256').update(types.join(',')).digest('hex'),
    alpn: hello.alpnProtocols().map(p => Buffer.from(p).toString('utf8'))
  };
}

/**
 * Compare an observed fingerprint against an expected baseline. The first
 * difference found decides the reason: ALPN order, ALPN set, extension
 * sequence, then the JA3 string itself.
 */
export function compareFingerprints(expected: ClientHelloFingerprint, observed: ClientHelloFingerprint): FingerprintComparison {
  if (expected.alpn.join(',') !== observed.alpn.join(',')) {
    const setDiff = [...new Set(expected.alpn)].sort().join(',') !== [...new Set(observed.alpn)].sort().join(',');
    return { match: false, mismatchReason: setDiff ? 'ALPN_SET_DIFF' : 'ALPN_ORDER_MISMATCH' };
  }
  if (expected.extOrderSha256 !== observed.extOrderSha256) return { match: false, mismatchReason: 'EXT_SEQUENCE_MISMATCH' };
  if (expected.ja3 !== observed.ja3) return { match: false, mismatchReason: 'JA3_MISMATCH' };
  return { match: true };
}
