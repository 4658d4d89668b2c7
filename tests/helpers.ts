// Byte builders for ClientHello fixtures. Everything works on plain number
// arrays; wrap with bytes() right before decoding.

import { ClientHelloError } from '../src/errors';

export function u16(n: number): number[] {
  return [(n >> 8) & 0xff, n & 0xff];
}

export function u24(n: number): number[] {
  return [(n >> 16) & 0xff, (n >> 8) & 0xff, n & 0xff];
}

export function ascii(s: string): number[] {
  return Array.from(Buffer.from(s, 'latin1'));
}

export function bytes(parts: number[]): Uint8Array {
  return Uint8Array.from(parts);
}

export function ext(type: number, data: number[]): number[] {
  return [...u16(type), ...u16(data.length), ...data];
}

export function sniExt(host: string, nameType = 0x00): number[] {
  const name = ascii(host);
  const entry = [nameType, ...u16(name.length), ...name];
  return ext(0x0000, [...u16(entry.length), ...entry]);
}

export function alpnExt(protocols: string[]): number[] {
  const list: number[] = [];
  for (const p of protocols) {
    const b = ascii(p);
    list.push(b.length, ...b);
  }
  return ext(0x0010, [...u16(list.length), ...list]);
}

export function u16ListExt(type: number, values: number[]): number[] {
  const list = values.flatMap(u16);
  return ext(type, [...u16(list.length), ...list]);
}

export function supportedVersionsExt(versions: number[]): number[] {
  const list = versions.flatMap(u16);
  return ext(0x002b, [list.length, ...list]);
}

export function keyShareExt(entries: { group: number; key: number[] }[]): number[] {
  const list = entries.flatMap(e => [...u16(e.group), ...u16(e.key.length), ...e.key]);
  return ext(0x0033, [...u16(list.length), ...list]);
}

export interface BodyOptions {
  version?: number;
  random?: number[];
  sessionId?: number[];
  ciphers?: number[];
  compression?: number[];
  // undefined: no extensions block at all
  extensions?: number[][];
}

export function body(opts: BodyOptions = {}): number[] {
  const {
    version = 0x0303,
    random = new Array<number>(32).fill(0),
    sessionId = [],
    ciphers = [0x1301],
    compression = [0x00],
    extensions
  } = opts;
  const out = [...u16(version), ...random, sessionId.length, ...sessionId];
  const suites = ciphers.flatMap(u16);
  out.push(...u16(suites.length), ...suites);
  out.push(compression.length, ...compression);
  if (extensions) {
    const block = extensions.flat();
    out.push(...u16(block.length), ...block);
  }
  return out;
}

export function handshake(b: number[]): number[] {
  return [0x01, ...u24(b.length), ...b];
}

export function record(hs: number[]): number[] {
  return [0x16, 0x03, 0x01, ...u16(hs.length), ...hs];
}

export function minimalHandshake(): number[] {
  return handshake(body());
}

// A browser-like hello: GREASE in suites, versions and key shares, nine extensions
export function fullExtensions(): number[][] {
  return [
    sniExt('example.com'),
    alpnExt(['h2', 'http/1.1']),
    supportedVersionsExt([0x3a3a, 0x0304, 0x0303]),
    u16ListExt(0x000a, [0x001d, 0x0017]),
    u16ListExt(0x000d, [0x0403, 0x0804]),
    keyShareExt([
      { group: 0x1a1a, key: [0x00] },
      { group: 0x001d, key: new Array<number>(32).fill(0xee) }
    ]),
    ext(0x002d, [0x01, 0x01]),
    ext(0xff01, [0x00]),
    ext(0x0042, [0xde, 0xad, 0xbe])
  ];
}

export function fullHandshake(): number[] {
  return handshake(body({
    random: new Array<number>(32).fill(0xab),
    sessionId: new Array<number>(32).fill(0xcd),
    ciphers: [0x0a0a, 0x1301, 0x1302, 0x1303],
    extensions: fullExtensions()
  }));
}

export function fullRecord(): number[] {
  return record(fullHandshake());
}

export function captureError(fn: () => unknown): ClientHelloError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ClientHelloError) return e;
    throw e;
  }
  throw new Error('expected a ClientHelloError');
}
