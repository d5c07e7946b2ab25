/**
 * Read-only access to the heap that pointer words refer to. Reads outside the
 * heap, or word reads at unaligned addresses, return `undefined`.
 */
export interface HeapView {
  readonly byteLength: number;
  readWord(address: number): bigint | undefined;
  readBytes(address: number, length: number): Uint8Array | undefined;
}

/**
 * A heap held in a single byte buffer, words stored little-endian.
 */
export class HeapImage implements HeapView {
  private readonly view: DataView;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get byteLength(): number {
    return this.bytes.byteLength;
  }

  readWord(address: number): bigint | undefined {
    if (!Number.isInteger(address) || address < 0 || address % 8 !== 0) {
      return undefined;
    }
    if (address + 8 > this.bytes.byteLength) {
      return undefined;
    }
    return this.view.getBigUint64(address, true);
  }

  readBytes(address: number, length: number): Uint8Array | undefined {
    if (!Number.isInteger(address) || !Number.isInteger(length) || address < 0 || length < 0) {
      return undefined;
    }
    if (address + length > this.bytes.byteLength) {
      return undefined;
    }
    return this.bytes.subarray(address, address + length);
  }
}
