// Human / machine readable summaries of a decoded ClientHello, for logs and
// capture tooling. Output formats mirror each other: json, yaml, text.

import * as yaml from 'js-yaml';
import { ClientHello } from './client-hello';
import { fingerprint } from './fingerprint';
import { isGrease } from './grease';
import { hex16 } from './constants';
import extensionNames from './data/extension-names.json';

export type ReportFormat = 'json' | 'yaml' | 'text';

export interface ClientHelloSummary {
  legacyVersion: string;
  random: string;
  sessionId: string;
  cipherSuites: string[];
  compressionMethods: string;
  serverName: string | null;
  alpn: string[];
  supportedVersions: string[];
  supportedGroups: string[];
  signatureAlgorithms: string[];
  keyShareGroups: string[];
  renegotiationInfo: boolean;
  hasGrease: boolean;
  extensions: { type: string; name: string }[];
  ja3: string;
  ja3Hash: string;
}

const NAMES: Record<string, string> = extensionNames;

export function extensionName(type: number): string {
  if (isGrease(type)) return 'grease';
  return NAMES[String(type)] ?? 'unknown';
}

function hexBytes(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

export function summarize(hello: ClientHello): ClientHelloSummary {
  const fp = fingerprint(hello);
  return {
    legacyVersion: hex16(hello.legacyVersion),
    random: hexBytes(hello.random),
    sessionId: hexBytes(hello.sessionId),
    cipherSuites: hello.cipherSuites.map(hex16),
    compressionMethods: hexBytes(hello.compressionMethods),
    serverName: hello.serverName() ?? null,
    alpn: fp.alpn,
    supportedVersions: hello.supportedVersions().map(hex16),
    supportedGroups: hello.supportedGroups().map(hex16),
    signatureAlgorithms: hello.signatureAlgorithms().map(hex16),
    keyShareGroups: hello.keyShareGroups().map(hex16),
    renegotiationInfo: hello.hasRenegotiationInfo(),
    hasGrease: hello.hasGrease,
    extensions: hello.extensions.map(e => ({ type: hex16(e.type), name: extensionName(e.type) })),
    ja3: fp.ja3,
    ja3Hash: fp.ja3Hash
  };
}

function list(values: string[]): string {
  return values.length ? values.join(', ') : '(none)';
}

function textLines(s: ClientHelloSummary): string[] {
  return [
    `Legacy version: ${s.legacyVersion}`,
    `Random: ${s.random}`,
    `Session ID (${s.sessionId.length / 2} bytes): ${s.sessionId || '(empty)'}`,
    `Cipher suites: ${list(s.cipherSuites)}`,
    `Compression methods: ${s.compressionMethods || '(none)'}`,
    `SNI: ${s.serverName ?? '(none)'}`,
    `ALPN: ${list(s.alpn)}`,
    `Supported versions: ${list(s.supportedVersions)}`,
    `Supported groups: ${list(s.supportedGroups)}`,
    `Signature algorithms: ${list(s.signatureAlgorithms)}`,
    `Key share groups: ${list(s.keyShareGroups)}`,
    `Renegotiation info: ${s.renegotiationInfo}`,
    `Has GREASE: ${s.hasGrease}`,
    `Extensions (${s.extensions.length}): ${list(s.extensions.map(e => `${e.name}(${e.type})`))}`,
    `JA3: ${s.ja3}`,
    `JA3 hash: ${s.ja3Hash}`
  ];
}

export function formatSummary(summary: ClientHelloSummary, format: ReportFormat = 'text'): string {
  switch (format) {
    case 'json':
      return JSON.stringify(summary, null, 2);
    case 'yaml':
      return yaml.dump(summary);
    case 'text':
      return textLines(summary).join('\n');
  }
}
