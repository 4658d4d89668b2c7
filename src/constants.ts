// Wire constants for TLS record / handshake framing and the extension types
// the decoder knows how to unpack.

export const CONTENT_TYPE_HANDSHAKE = 0x16;
export const HANDSHAKE_TYPE_CLIENT_HELLO = 0x01;

export const RECORD_HEADER_LENGTH = 5;
export const CLIENT_RANDOM_LENGTH = 32;

// SNI name_type for a DNS hostname (RFC 6066)
export const SNI_HOST_NAME = 0x00;

export const EXT_SERVER_NAME = 0x0000;
export const EXT_SUPPORTED_GROUPS = 0x000a;
export const EXT_EC_POINT_FORMATS = 0x000b;
export const EXT_SIGNATURE_ALGORITHMS = 0x000d;
export const EXT_ALPN = 0x0010;
export const EXT_SUPPORTED_VERSIONS = 0x002b;
export const EXT_PSK_KEY_EXCHANGE_MODES = 0x002d;
export const EXT_KEY_SHARE = 0x0033;
export const EXT_RENEGOTIATION_INFO = 0xff01;

// Failure logging default. Per-call DecodeOptions.verbose wins over this.
export const DEFAULT_VERBOSE = (() => {
  const env = (process.env.CLIENTHELLO_VERBOSE || '').trim().toLowerCase();
  return env === '1' || env === 'true';
})();

// Render a 16-bit protocol value the way reports and error messages show it (0x0303)
export function hex16(value: number): string {
  return '0x' + value.toString(16).padStart(4, '0');
}

export function hex8(value: number): string {
  return '0x' + value.toString(16).padStart(2, '0');
}
