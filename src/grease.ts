// RFC 8701 GREASE: 0x0A0A, 0x1A1A, ... 0xFAFA. Both bytes equal, low nibble 0xA.
export function isGrease(value: number): boolean {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) return false;
  return (value & 0x0f0f) === 0x0a0a && (value >> 8) === (value & 0xff);
}

export function greaseValues(values: readonly number[]): number[] {
  return values.filter(isGrease);
}
