/**
 * Big-endian byte reader for the VAA and governance wire formats.
 */

export class ByteReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly data: Uint8Array) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  u8(field: string): number {
    this.require(1, field);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  u16(field: string): number {
    this.require(2, field);
    const value = this.view.getUint16(this.offset);
    this.offset += 2;
    return value;
  }

  u32(field: string): number {
    this.require(4, field);
    const value = this.view.getUint32(this.offset);
    this.offset += 4;
    return value;
  }

  u64(field: string): bigint {
    this.require(8, field);
    const value = this.view.getBigUint64(this.offset);
    this.offset += 8;
    return value;
  }

  bytes(length: number, field: string): Uint8Array {
    this.require(length, field);
    const value = this.data.slice(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  /** Everything not yet read. */
  rest(): Uint8Array {
    const value = this.data.slice(this.offset);
    this.offset = this.data.length;
    return value;
  }

  /** Current read position. */
  get position(): number {
    return this.offset;
  }

  /**
   * @throws Error if unread bytes remain
   */
  end(): void {
    if (this.remaining !== 0) {
      throw new Error(`${this.remaining} trailing byte(s) after last field`);
    }
  }

  private require(length: number, field: string): void {
    if (this.remaining < length) {
      throw new Error(
        `truncated input reading ${field}: need ${length} byte(s) at offset ${this.offset}, have ${this.remaining}`,
      );
    }
  }
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Drop leading zero bytes (left padding of fixed-width fields).
 */
export function stripLeadingZeros(bytes: Uint8Array): Uint8Array {
  let start = 0;
  while (start < bytes.length && bytes[start] === 0) start++;
  return bytes.slice(start);
}
