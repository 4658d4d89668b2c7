import { hex8 } from './constants';

export type ClientHelloErrorKind =
  | 'input_too_short'
  | 'unexpected_content_type'
  | 'unexpected_handshake_type'
  | 'truncated';

export type ClientHelloErrorDetail =
  | { kind: 'input_too_short'; need: number; have: number }
  | { kind: 'unexpected_content_type'; actual: number }
  | { kind: 'unexpected_handshake_type'; actual: number }
  | { kind: 'truncated'; field: string };

function messageFor(detail: ClientHelloErrorDetail): string {
  switch (detail.kind) {
    case 'input_too_short':
      return `buffer too short: need ${detail.need} bytes, have ${detail.have}`;
    case 'unexpected_content_type':
      return `unexpected content type: expected 0x16 (Handshake), got ${hex8(detail.actual)}`;
    case 'unexpected_handshake_type':
      return `unexpected handshake type: expected 0x01 (ClientHello), got ${hex8(detail.actual)}`;
    case 'truncated':
      return `truncated ${detail.field}`;
  }
}

/**
 * Raised for any input that does not hold a decodable ClientHello.
 * `detail` is the discriminated payload; errors never wrap a cause.
 */
export class ClientHelloError extends Error {
  readonly detail: ClientHelloErrorDetail;

  constructor(detail: ClientHelloErrorDetail) {
    super(messageFor(detail));
    this.name = 'ClientHelloError';
    this.detail = detail;
  }

  get kind(): ClientHelloErrorKind {
    return this.detail.kind;
  }

  static inputTooShort(need: number, have: number): ClientHelloError {
    return new ClientHelloError({ kind: 'input_too_short', need, have });
  }

  static unexpectedContentType(actual: number): ClientHelloError {
    return new ClientHelloError({ kind: 'unexpected_content_type', actual });
  }

  static unexpectedHandshakeType(actual: number): ClientHelloError {
    return new ClientHelloError({ kind: 'unexpected_handshake_type', actual });
  }

  static truncated(field: string): ClientHelloError {
    return new ClientHelloError({ kind: 'truncated', field });
  }
}

export function isClientHelloError(e: unknown): e is ClientHelloError {
  return e instanceof ClientHelloError;
}
