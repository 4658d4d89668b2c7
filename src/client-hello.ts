import { isUtf8 } from 'buffer';
import { Extension, ServerName } from './extensions';
import { EXT_RENEGOTIATION_INFO, SNI_HOST_NAME } from './constants';

export interface ClientHelloFields {
  legacyVersion: number;
  random: Uint8Array;
  sessionId: Uint8Array;
  cipherSuites: readonly number[];
  compressionMethods: Uint8Array;
  extensions: readonly Extension[];
  hasGrease: boolean;
}

const NO_NUMBERS: readonly number[] = Object.freeze([]);
const NO_PROTOCOLS: readonly Uint8Array[] = Object.freeze([]);
const NO_BYTES = new Uint8Array(0);

/**
 * A decoded ClientHello.
 *
 * `random`, `sessionId`, `compressionMethods` and the byte fields inside
 * `extensions` are views into the buffer that was decoded. They stay valid
 * only while that buffer is alive and unchanged; use {@link toOwned} to
 * detach from it.
 */
export class ClientHello {
  /** Usually 0x0303 */
  readonly legacyVersion: number;
  readonly random: Uint8Array;
  readonly sessionId: Uint8Array;
  /** GREASE values removed */
  readonly cipherSuites: readonly number[];
  readonly compressionMethods: Uint8Array;
  /** Wire order, duplicates kept */
  readonly extensions: readonly Extension[];
  /** Any GREASE value seen in suites, extension types, versions, groups or key shares */
  readonly hasGrease: boolean;

  constructor(fields: ClientHelloFields) {
    this.legacyVersion = fields.legacyVersion;
    this.random = fields.random;
    this.sessionId = fields.sessionId;
    this.cipherSuites = fields.cipherSuites;
    this.compressionMethods = fields.compressionMethods;
    this.extensions = fields.extensions;
    this.hasGrease = fields.hasGrease;
  }

  // First DNS hostname from the first SNI extension; undefined if missing or not UTF-8
  serverName(): string | undefined {
    for (const ext of this.extensions) {
      if (ext.kind !== 'server_name') continue;
      const host = ext.names.find(n => n.nameType === SNI_HOST_NAME);
      if (!host) continue;
      if (!isUtf8(host.name)) return undefined;
      return Buffer.from(host.name.buffer, host.name.byteOffset, host.name.length).toString('utf8');
    }
    return undefined;
  }

  alpnProtocols(): readonly Uint8Array[] {
    for (const ext of this.extensions) {
      if (ext.kind === 'alpn') return ext.protocols;
    }
    return NO_PROTOCOLS;
  }

  supportedVersions(): readonly number[] {
    for (const ext of this.extensions) {
      if (ext.kind === 'supported_versions') return ext.versions;
    }
    return NO_NUMBERS;
  }

  supportedGroups(): readonly number[] {
    for (const ext of this.extensions) {
      if (ext.kind === 'supported_groups') return ext.groups;
    }
    return NO_NUMBERS;
  }

  signatureAlgorithms(): readonly number[] {
    for (const ext of this.extensions) {
      if (ext.kind === 'signature_algorithms') return ext.algorithms;
    }
    return NO_NUMBERS;
  }

  keyShareGroups(): readonly number[] {
    for (const ext of this.extensions) {
      if (ext.kind === 'key_share_groups') return ext.groups;
    }
    return NO_NUMBERS;
  }

  pskExchangeModes(): Uint8Array {
    for (const ext of this.extensions) {
      if (ext.kind === 'psk_exchange_modes') return ext.modes;
    }
    return NO_BYTES;
  }

  hasRenegotiationInfo(): boolean {
    return this.extensions.some(ext => ext.kind === 'renegotiation_info');
  }

  /**
   * Raw body of an extension the decoder kept as bytes: renegotiation_info
   * (when asked for 0xff01) or any unknown type. Types decoded into a
   * structured variant are only reachable through their accessor.
   */
  findExtension(type: number): Uint8Array | undefined {
    for (const ext of this.extensions) {
      if (ext.kind === 'renegotiation_info' && type === EXT_RENEGOTIATION_INFO) return ext.data;
      if (ext.kind === 'unknown' && ext.type === type) return ext.data;
    }
    return undefined;
  }

  // Same value with every byte view copied out of the source buffer.
  toOwned(): ClientHello {
    return new ClientHello({
      legacyVersion: this.legacyVersion,
      random: this.random.slice(),
      sessionId: this.sessionId.slice(),
      cipherSuites: [...this.cipherSuites],
      compressionMethods: this.compressionMethods.slice(),
      extensions: this.extensions.map(copyExtension),
      hasGrease: this.hasGrease
    });
  }
}

function copyExtension(ext: Extension): Extension {
  switch (ext.kind) {
    case 'server_name':
      return { ...ext, names: ext.names.map((n): ServerName => ({ nameType: n.nameType, name: n.name.slice() })) };
    case 'alpn':
      return { ...ext, protocols: ext.protocols.map(p => p.slice()) };
    case 'supported_groups':
    case 'key_share_groups':
      return { ...ext, groups: [...ext.groups] };
    case 'signature_algorithms':
      return { ...ext, algorithms: [...ext.algorithms] };
    case 'supported_versions':
      return { ...ext, versions: [...ext.versions] };
    case 'psk_exchange_modes':
      return { ...ext, modes: ext.modes.slice() };
    case 'renegotiation_info':
    case 'unknown':
      return { ...ext, data: ext.data.slice() };
  }
}
