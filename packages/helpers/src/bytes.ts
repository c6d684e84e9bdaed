/**
 * Returns true when `length` bytes starting at `offset` fit inside a buffer
 * of `total` bytes.
 */
export function hasAvailable(total: number, offset: number, length: number): boolean {
  return offset >= 0 && length >= 0 && offset + length <= total;
}

export function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function isUint8(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xff;
}

export function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffffffff;
}
