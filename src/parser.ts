import { Cursor } from './cursor';
import { ClientHello } from './client-hello';
import { ClientHelloError, isClientHelloError } from './errors';
import { decodeExtension, Extension, GreaseState } from './extensions';
import { isGrease } from './grease';
import {
  CLIENT_RANDOM_LENGTH,
  CONTENT_TYPE_HANDSHAKE,
  DEFAULT_VERBOSE,
  HANDSHAKE_TYPE_CLIENT_HELLO,
  RECORD_HEADER_LENGTH
} from './constants';

export interface DecodeOptions {
  /** Return a ClientHello that owns copies of all its bytes */
  copy?: boolean;
  /** Log decode failures to the console (defaults to CLIENTHELLO_VERBOSE) */
  verbose?: boolean;
}

export type DecodeResult =
  | { ok: true; hello: ClientHello }
  | { ok: false; error: ClientHelloError };

/**
 * Decode a bare handshake message (first byte 0x01), as carried in QUIC
 * CRYPTO frames. Bytes after the declared handshake length are ignored.
 *
 * The result borrows from `data` unless `options.copy` is set.
 */
export function decode(data: Uint8Array, options: DecodeOptions = {}): ClientHello {
  return run(() => decodeHandshake(data), 'handshake', options);
}

/**
 * Decode a TLS record (first byte 0x16) holding a ClientHello handshake.
 */
export function decodeRecord(data: Uint8Array, options: DecodeOptions = {}): ClientHello {
  return run(() => decodeHandshake(stripRecord(data)), 'record', options);
}

export function safeDecode(data: Uint8Array, options: DecodeOptions = {}): DecodeResult {
  return settle(() => decode(data, options));
}

export function safeDecodeRecord(data: Uint8Array, options: DecodeOptions = {}): DecodeResult {
  return settle(() => decodeRecord(data, options));
}

function run(step: () => ClientHello, shape: 'handshake' | 'record', options: DecodeOptions): ClientHello {
  const verbose = options.verbose ?? DEFAULT_VERBOSE;
  try {
    const hello = step();
    return options.copy ? hello.toOwned() : hello;
  } catch (e: unknown) {
    if (verbose && isClientHelloError(e)) console.warn(`⚠️  ClientHello ${shape} decode failed: ${e.message}`);
    throw e;
  }
}

// Only decode failures become results; anything else is a bug and propagates.
function settle(step: () => ClientHello): DecodeResult {
  try {
    return { ok: true, hello: step() };
  } catch (e: unknown) {
    if (isClientHelloError(e)) return { ok: false, error: e };
    throw e;
  }
}

function stripRecord(data: Uint8Array): Uint8Array {
  if (data.length < RECORD_HEADER_LENGTH) throw ClientHelloError.inputTooShort(RECORD_HEADER_LENGTH, data.length);
  const r = new Cursor(data);
  const contentType = r.readU8('record content type');
  if (contentType !== CONTENT_TYPE_HANDSHAKE) throw ClientHelloError.unexpectedContentType(contentType);
  r.readU16('record protocol version');
  const recordLen = r.readU16('record length');
  return r.readBytes(recordLen, 'record payload');
}

function decodeHandshake(data: Uint8Array): ClientHello {
  if (data.length < 1) throw ClientHelloError.inputTooShort(1, 0);
  const r = new Cursor(data);
  const hsType = r.readU8('handshake type');
  if (hsType !== HANDSHAKE_TYPE_CLIENT_HELLO) throw ClientHelloError.unexpectedHandshakeType(hsType);
  const bodyLen = r.readU24('handshake length');
  return decodeBody(r.readBytes(bodyLen, 'handshake body'));
}

function decodeBody(body: Uint8Array): ClientHello {
  const r = new Cursor(body);
  const state: GreaseState = { hasGrease: false };

  const legacyVersion = r.readU16('legacy version');
  const random = r.readBytes(CLIENT_RANDOM_LENGTH, 'client random');

  const sidLen = r.readU8('session ID length');
  const sessionId = r.readBytes(sidLen, 'session ID');

  const cipherSuites = decodeCipherSuites(r, state);

  const compLen = r.readU8('compression methods length');
  const compressionMethods = r.readBytes(compLen, 'compression methods');

  // A ClientHello without an extensions block is legal (pre-TLS 1.2 clients)
  const extensions = r.remaining() >= 2 ? decodeExtensions(r, state) : [];

  return new ClientHello({
    legacyVersion,
    random,
    sessionId,
    cipherSuites,
    compressionMethods,
    extensions,
    hasGrease: state.hasGrease
  });
}

function decodeCipherSuites(r: Cursor, state: GreaseState): number[] {
  const len = r.readU16('cipher suites length');
  const list = new Cursor(r.readBytes(len, 'cipher suites data'));
  const suites: number[] = [];
  while (list.remaining() >= 2) {
    const suite = list.readU16('cipher suite');
    if (isGrease(suite)) {
      state.hasGrease = true;
    } else {
      suites.push(suite);
    }
  }
  return suites;
}

function decodeExtensions(r: Cursor, state: GreaseState): Extension[] {
  const len = r.readU16('extensions length');
  const block = new Cursor(r.readBytes(len, 'extensions data'));
  const extensions: Extension[] = [];
  while (block.remaining() >= 4) {
    const type = block.readU16('extension type');
    const extLen = block.readU16('extension length');
    extensions.push(decodeExtension(type, block.readBytes(extLen, 'extension body'), state));
  }
  return extensions;
}
