import { Cursor } from './cursor';
import { isGrease } from './grease';
import {
  EXT_ALPN,
  EXT_KEY_SHARE,
  EXT_PSK_KEY_EXCHANGE_MODES,
  EXT_RENEGOTIATION_INFO,
  EXT_SERVER_NAME,
  EXT_SIGNATURE_ALGORITHMS,
  EXT_SUPPORTED_GROUPS,
  EXT_SUPPORTED_VERSIONS
} from './constants';

export interface ServerName {
  /** 0x00 is a DNS hostname */
  readonly nameType: number;
  readonly name: Uint8Array;
}

export type Extension =
  | { readonly kind: 'server_name'; readonly type: typeof EXT_SERVER_NAME; readonly names: readonly ServerName[] }
  | { readonly kind: 'supported_groups'; readonly type: typeof EXT_SUPPORTED_GROUPS; readonly groups: readonly number[] }
  | { readonly kind: 'signature_algorithms'; readonly type: typeof EXT_SIGNATURE_ALGORITHMS; readonly algorithms: readonly number[] }
  | { readonly kind: 'alpn'; readonly type: typeof EXT_ALPN; readonly protocols: readonly Uint8Array[] }
  | { readonly kind: 'supported_versions'; readonly type: typeof EXT_SUPPORTED_VERSIONS; readonly versions: readonly number[] }
  | { readonly kind: 'psk_exchange_modes'; readonly type: typeof EXT_PSK_KEY_EXCHANGE_MODES; readonly modes: Uint8Array }
  | { readonly kind: 'key_share_groups'; readonly type: typeof EXT_KEY_SHARE; readonly groups: readonly number[] }
  | { readonly kind: 'renegotiation_info'; readonly type: typeof EXT_RENEGOTIATION_INFO; readonly data: Uint8Array }
  | { readonly kind: 'unknown'; readonly type: number; readonly data: Uint8Array };

export type ExtensionKind = Extension['kind'];

// Shared across one decode; set whenever a GREASE value is dropped.
export interface GreaseState {
  hasGrease: boolean;
}

export function decodeExtension(type: number, body: Uint8Array, state: GreaseState): Extension {
  if (isGrease(type)) {
    state.hasGrease = true;
    return { kind: 'unknown', type, data: body };
  }
  switch (type) {
    case EXT_SERVER_NAME:
      return { kind: 'server_name', type: EXT_SERVER_NAME, names: decodeServerNames(body) };
    case EXT_SUPPORTED_GROUPS:
      return { kind: 'supported_groups', type: EXT_SUPPORTED_GROUPS, groups: decodeSupportedGroups(body, state) };
    case EXT_SIGNATURE_ALGORITHMS:
      return { kind: 'signature_algorithms', type: EXT_SIGNATURE_ALGORITHMS, algorithms: decodeSignatureAlgorithms(body) };
    case EXT_ALPN:
      return { kind: 'alpn', type: EXT_ALPN, protocols: decodeAlpn(body) };
    case EXT_SUPPORTED_VERSIONS:
      return { kind: 'supported_versions', type: EXT_SUPPORTED_VERSIONS, versions: decodeSupportedVersions(body, state) };
    case EXT_PSK_KEY_EXCHANGE_MODES:
      return { kind: 'psk_exchange_modes', type: EXT_PSK_KEY_EXCHANGE_MODES, modes: decodePskModes(body) };
    case EXT_KEY_SHARE:
      return { kind: 'key_share_groups', type: EXT_KEY_SHARE, groups: decodeKeyShareGroups(body, state) };
    case EXT_RENEGOTIATION_INFO:
      return { kind: 'renegotiation_info', type: EXT_RENEGOTIATION_INFO, data: body };
    default:
      return { kind: 'unknown', type, data: body };
  }
}

// Opens the length-prefixed list at the start of an extension body and
// returns a cursor bounded to it. Anything after the list is ignored.
function openList(body: Uint8Array, prefixBytes: 1 | 2, lengthField: string, dataField: string): Cursor {
  const outer = new Cursor(body);
  const len = prefixBytes === 1 ? outer.readU8(lengthField) : outer.readU16(lengthField);
  return new Cursor(outer.readBytes(len, dataField));
}

function decodeServerNames(body: Uint8Array): ServerName[] {
  const list = openList(body, 2, 'SNI list length', 'SNI list data');
  const names: ServerName[] = [];
  while (list.remaining() > 0) {
    const nameType = list.readU8('SNI name type');
    const nameLen = list.readU16('SNI name length');
    names.push({ nameType, name: list.readBytes(nameLen, 'SNI name') });
  }
  return names;
}

function decodeAlpn(body: Uint8Array): Uint8Array[] {
  const list = openList(body, 2, 'ALPN list length', 'ALPN list data');
  const protocols: Uint8Array[] = [];
  while (list.remaining() > 0) {
    const protoLen = list.readU8('ALPN protocol length');
    protocols.push(list.readBytes(protoLen, 'ALPN protocol'));
  }
  return protocols;
}

// 2-byte entries; a dangling odd byte at the end of the list is left unread.
function readU16Entries(list: Cursor, entryField: string, state?: GreaseState): number[] {
  const values: number[] = [];
  while (list.remaining() >= 2) {
    const value = list.readU16(entryField);
    if (state && isGrease(value)) {
      state.hasGrease = true;
    } else {
      values.push(value);
    }
  }
  return values;
}

function decodeSupportedGroups(body: Uint8Array, state: GreaseState): number[] {
  const list = openList(body, 2, 'supported groups length', 'supported groups data');
  return readU16Entries(list, 'supported group', state);
}

// Deliberately unfiltered: GREASE-shaped algorithm ids are kept as sent.
function decodeSignatureAlgorithms(body: Uint8Array): number[] {
  const list = openList(body, 2, 'signature algorithms length', 'signature algorithms data');
  return readU16Entries(list, 'signature algorithm');
}

function decodeSupportedVersions(body: Uint8Array, state: GreaseState): number[] {
  const list = openList(body, 1, 'supported versions length', 'supported versions data');
  return readU16Entries(list, 'supported version', state);
}

// The one variant that owns its bytes rather than viewing the input.
function decodePskModes(body: Uint8Array): Uint8Array {
  const outer = new Cursor(body);
  const len = outer.readU8('PSK modes length');
  return outer.readBytes(len, 'PSK modes data').slice();
}

function decodeKeyShareGroups(body: Uint8Array, state: GreaseState): number[] {
  const list = openList(body, 2, 'key share list length', 'key share list data');
  const groups: number[] = [];
  while (list.remaining() >= 4) {
    const group = list.readU16('key share group');
    const keyLen = list.readU16('key share key length');
    list.readBytes(keyLen, 'key share key data');
    if (isGrease(group)) {
      state.hasGrease = true;
    } else {
      groups.push(group);
    }
  }
  return groups;
}
