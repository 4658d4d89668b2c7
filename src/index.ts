export { decode, decodeRecord, safeDecode, safeDecodeRecord, DecodeOptions, DecodeResult } from './parser';
export { ClientHello, ClientHelloFields } from './client-hello';
export { Extension, ExtensionKind, ServerName } from './extensions';
export { ClientHelloError, ClientHelloErrorDetail, ClientHelloErrorKind, isClientHelloError } from './errors';
export { isGrease, greaseValues } from './grease';
export { Cursor } from './cursor';
export {
  fingerprint,
  ja3String,
  extensionTypes,
  ecPointFormats,
  compareFingerprints,
  ClientHelloFingerprint,
  FingerprintComparison,
  FingerprintMismatch
} from './fingerprint';
export { summarize, formatSummary, extensionName, ClientHelloSummary, ReportFormat } from './report';
export * from './constants';
