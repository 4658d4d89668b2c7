import { ClientHelloError } from './errors';

// Sequential big-endian reader over a borrowed byte view. Every read is
// bounds checked and only advances on success; byte reads hand back
// subarray views into the same underlying memory.
export class Cursor {
  private pos = 0;

  constructor(private readonly data: Uint8Array) {}

  remaining(): number {
    return this.data.length - this.pos;
  }

  readU8(field: string): number {
    this.require(1, field);
    const value = this.data[this.pos];
    this.pos += 1;
    return value;
  }

  readU16(field: string): number {
    this.require(2, field);
    const value = (this.data[this.pos] << 8) | this.data[this.pos + 1];
    this.pos += 2;
    return value;
  }

  readU24(field: string): number {
    this.require(3, field);
    const value = (this.data[this.pos] << 16) | (this.data[this.pos + 1] << 8) | this.data[this.pos + 2];
    this.pos += 3;
    return value;
  }

  readBytes(n: number, field: string): Uint8Array {
    this.require(n, field);
    const view = this.data.subarray(this.pos, this.pos + n);
    this.pos += n;
    return view;
  }

  private require(n: number, field: string): void {
    if (this.remaining() < n) throw ClientHelloError.truncated(field);
  }
}
